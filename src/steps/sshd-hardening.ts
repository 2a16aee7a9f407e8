import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import type { ProvisionStep } from "../types/step.js";
import { done, failed, skipped } from "../types/step.js";
import { KEY_ONLY_AUTH, hardenSshdConfig } from "../sshd/config-file.js";

/** Key-only authentication, then a restart so the running daemon picks it up. */
export const sshdHardeningStep: ProvisionStep = {
  id: "sshd-hardening",
  title: "SSH key-only authentication",
  fatal: false,
  async run(ctx) {
    const path = ctx.config.sshd_config_path;
    if (!existsSync(path)) {
      ctx.logger.warn({ path }, "sshd_config file not found.");
      return skipped("sshd_config not found");
    }

    // writeFile on an existing path keeps its mode and owner.
    await writeFile(path, hardenSshdConfig(await readFile(path, "utf-8"), KEY_ONLY_AUTH));
    ctx.logger.debug({ path, directives: KEY_ONLY_AUTH }, "sshd_config rewritten");

    const restart = await ctx.host.restartService(ctx.sshService);
    if (!restart.ok) {
      ctx.logger.error({ unit: ctx.sshService, exitCode: restart.exitCode, stderr: restart.stderr }, `Failed to restart ${ctx.sshService}.`);
      return failed(`restart of ${ctx.sshService} failed`);
    }

    ctx.logger.info({ unit: ctx.sshService }, "SSH configured to accept key-based authentication only.");
    return done(`${path} hardened, ${ctx.sshService} restarted`);
  },
};
