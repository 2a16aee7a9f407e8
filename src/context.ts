import type { ProvisionConfig } from "./types/config.js";
import type { HostCapabilities } from "./host/capabilities.js";
import type { TargetUser } from "./host/identity.js";
import type { Prompter } from "./prompt/confirm.js";
import type { Logger } from "./logger.js";

/**
 * Shared run context, built once in cli.ts after the guard passes and handed
 * to every step. Steps read paths from config and act on files as `user`.
 */
export interface ProvisionContext {
  readonly config: ProvisionConfig;
  readonly user: TargetUser;
  readonly host: HostCapabilities;
  readonly prompter: Prompter;
  readonly logger: Logger;
  /** SSH unit restarted after hardening. */
  readonly sshService: string;
}
