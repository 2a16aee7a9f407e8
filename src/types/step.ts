import type { ProvisionContext } from "../context.js";

export type StepStatus = "done" | "skipped" | "failed";

export interface StepOutcome {
  readonly status: StepStatus;
  readonly detail: string;
}

export type StepId =
  | "system-upgrade"
  | "packages"
  | "motd"
  | "bashrc"
  | "nanorc"
  | "ssh-key"
  | "sshd-hardening";

/**
 * One provisioning action. Steps share nothing but the context; a failed
 * non-fatal step is logged and the next one still runs.
 */
export interface ProvisionStep {
  readonly id: StepId;
  readonly title: string;
  /** A failure of a fatal step ends the run with a non-zero exit. */
  readonly fatal: boolean;
  run(ctx: ProvisionContext): Promise<StepOutcome>;
}

export function done(detail: string): StepOutcome {
  return { status: "done", detail };
}

export function skipped(detail: string): StepOutcome {
  return { status: "skipped", detail };
}

export function failed(detail: string): StepOutcome {
  return { status: "failed", detail };
}
