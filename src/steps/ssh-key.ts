import { appendFile, chmod, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { ProvisionContext } from "../context.js";
import type { ProvisionStep } from "../types/step.js";
import { done, skipped } from "../types/step.js";
import { askYesNo } from "../prompt/confirm.js";
import { chownRecursive } from "../host/ownership.js";

export const SSH_KEY_QUESTION = "Would you like to add a public SSH key?";
export const SSH_KEY_PASTE_PROMPT = "Paste your public SSH key: ";

/**
 * Where the key comes from: configuration first, then the operator.
 * Null means the step should not run.
 */
async function obtainKey(ctx: ProvisionContext): Promise<string | null> {
  const configured = ctx.config.ssh_key.public_key;
  if (configured !== null) {
    ctx.logger.info("Using SSH public key from configuration.");
    return configured.trim();
  }
  if (!ctx.config.ssh_key.prompt) return null;
  if (!(await askYesNo(ctx.prompter, SSH_KEY_QUESTION))) return null;
  return (await ctx.prompter.ask(SSH_KEY_PASTE_PROMPT)).trim();
}

/** Append one key line to ~/.ssh/authorized_keys; key material is written as given. */
export async function registerAuthorizedKey(ctx: ProvisionContext, key: string): Promise<string> {
  const sshDir = join(ctx.user.home, ".ssh");
  const authorizedKeys = join(sshDir, "authorized_keys");

  await mkdir(sshDir, { recursive: true });
  await appendFile(authorizedKeys, `${key}\n`);
  await chownRecursive(sshDir, ctx.user.uid, ctx.user.gid);
  await chmod(sshDir, 0o700);
  await chmod(authorizedKeys, 0o600);
  return authorizedKeys;
}

export const sshKeyStep: ProvisionStep = {
  id: "ssh-key",
  title: "SSH public key",
  fatal: false,
  async run(ctx) {
    const key = await obtainKey(ctx);
    if (key === null) {
      ctx.logger.info("No SSH public key added.");
      return skipped("declined");
    }

    const authorizedKeys = await registerAuthorizedKey(ctx, key);
    ctx.logger.info({ path: authorizedKeys }, "SSH public key added.");
    return done(`appended to ${authorizedKeys}`);
  },
};
