import type { Command } from "../../types/command.js";

/**
 * Distro-specific command dispatch.
 * Host code calls these methods to express intent; implementations translate
 * to the distro's package and service tooling. The process already runs as
 * root, so nothing here is prefixed with sudo.
 */
export interface DistroCommands {
  /** Exits 0 only when the package is installed. */
  packageQuery(pkg: string): Command;
  packageInstall(pkg: string): Command;
  packageIndexRefresh(): Command;
  packageUpgradeAll(): Command;

  serviceRestart(unit: string): Command;
  /** Unit name of the OpenSSH server on this family. */
  readonly sshServiceUnit: string;
}
