// Privilege and target-user resolution. The process runs as root, but every per-user
// file (rc files, ~/.ssh) belongs to the human who escalated; TargetUser carries that
// identity through the run so no step consults process-wide state on its own.
import type { Executor } from "../execution/executor.js";
import { ProvisionError, ProvisionErrorCode } from "../errors.js";

export interface TargetUser {
  readonly username: string;
  readonly uid: number;
  readonly gid: number;
  readonly home: string;
}

/** Effective uid 0. Platforms without geteuid are never superuser. */
export function isSuperuser(euid: number | undefined = process.geteuid?.()): boolean {
  return euid === 0;
}

/** Parse one /etc/passwd-format line. Null when it has fewer than 7 fields or non-numeric ids. */
export function parsePasswdLine(line: string): TargetUser | null {
  const parts = line.trim().split(":");
  if (parts.length < 7) return null;
  const [username = "", , uid = "", gid = "", , home = ""] = parts;
  if (!/^\d+$/.test(uid) || !/^\d+$/.test(gid) || !username || !home) return null;
  return { username, uid: Number(uid), gid: Number(gid), home };
}

/**
 * Login name of whoever started the session: logname first, then SUDO_USER.
 * Null if neither yields a name.
 */
export async function resolveLoginName(executor: Executor, env: NodeJS.ProcessEnv): Promise<string | null> {
  const r = await executor.execute({ argv: ["logname"] });
  const fromLogname = r.exitCode === 0 ? r.stdout.trim() : "";
  if (fromLogname) return fromLogname;
  const fromSudo = env.SUDO_USER?.trim();
  return fromSudo ? fromSudo : null;
}

/** Resolve the operator account the per-user steps act on. Never returns root. */
export async function resolveTargetUser(executor: Executor, env: NodeJS.ProcessEnv = process.env): Promise<TargetUser> {
  const name = await resolveLoginName(executor, env);
  if (!name) {
    throw new ProvisionError(ProvisionErrorCode.USER_UNRESOLVED, "Could not determine the logged-in user (logname failed and SUDO_USER is unset)");
  }

  const r = await executor.execute({ argv: ["getent", "passwd", name] });
  const entry = r.exitCode === 0 ? parsePasswdLine(r.stdout.split("\n")[0] ?? "") : null;
  if (!entry) {
    throw new ProvisionError(ProvisionErrorCode.USER_UNRESOLVED, `No passwd entry for ${name}`, { exitCode: r.exitCode });
  }
  if (entry.uid === 0) {
    throw new ProvisionError(ProvisionErrorCode.USER_UNRESOLVED, `Logged-in user ${name} is root; run this from a regular account via sudo`);
  }
  return entry;
}
