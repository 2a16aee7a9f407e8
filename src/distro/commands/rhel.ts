import type { Command } from "../../types/command.js";
import type { DistroCommands } from "./interface.js";

/** RHEL/Fedora command implementations. */
export class RHELCommands implements DistroCommands {
  readonly sshServiceUnit = "sshd";

  packageQuery(pkg: string): Command {
    return { argv: ["rpm", "-q", pkg] };
  }

  packageInstall(pkg: string): Command {
    return { argv: ["dnf", "install", "-y", pkg] };
  }

  packageIndexRefresh(): Command {
    return { argv: ["dnf", "makecache"] };
  }

  packageUpgradeAll(): Command {
    return { argv: ["dnf", "upgrade", "-y"] };
  }

  serviceRestart(unit: string): Command {
    return { argv: ["systemctl", "restart", unit] };
  }
}
