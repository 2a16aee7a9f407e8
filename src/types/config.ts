import type { DistroFamily } from "./distro.js";

/** How an rc overlay lands in the user's rc file. */
export type RcAppendMode = "append" | "managed";

/** Full provisioning configuration. */
export interface ProvisionConfig {
  log_dir: string;
  config_dir: string;
  packages_file: string;
  motd_path: string;
  sshd_config_path: string;
  /** SSH unit to restart; null picks the distro default. */
  ssh_service: string | null;
  rc_append_mode: RcAppendMode;
  ssh_key: {
    prompt: boolean;
    public_key: string | null;
  };
  distro?: Partial<{
    family: DistroFamily;
  }>;
}
