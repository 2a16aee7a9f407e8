import type { Command } from "../../types/command.js";
import type { DistroCommands } from "./interface.js";

/** Debian/Ubuntu command implementations. */
export class DebianCommands implements DistroCommands {
  private readonly env = { DEBIAN_FRONTEND: "noninteractive" };
  // Keep locally modified conffiles (an edited sshd_config, say) rather than stopping to ask.
  private readonly dpkgOptions = ["-o", "Dpkg::Options::=--force-confdef", "-o", "Dpkg::Options::=--force-confold"];
  readonly sshServiceUnit = "ssh";

  packageQuery(pkg: string): Command {
    return { argv: ["dpkg", "-s", pkg] };
  }

  packageInstall(pkg: string): Command {
    return { argv: ["apt-get", "install", "-y", ...this.dpkgOptions, pkg], env: this.env };
  }

  packageIndexRefresh(): Command {
    return { argv: ["apt-get", "update"], env: this.env };
  }

  packageUpgradeAll(): Command {
    return { argv: ["apt-get", "upgrade", "-y", ...this.dpkgOptions], env: this.env };
  }

  serviceRestart(unit: string): Command {
    return { argv: ["systemctl", "restart", unit] };
  }
}
