// Factory for distro-specific command adapters.
// Called from cli.ts after detectDistro(); the returned DistroCommands backs the
// CommandHost every step talks to. Adding a family means a new Commands class,
// a new case here, and a new branch in resolveFamily().

import type { DistroContext } from "../../types/distro.js";
import type { DistroCommands } from "./interface.js";
import { DebianCommands } from "./debian.js";
import { RHELCommands } from "./rhel.js";

/** Create the DistroCommands implementation for the detected distro. */
export function createDistroCommands(distro: DistroContext): DistroCommands {
  switch (distro.family) {
    case "debian": return new DebianCommands();
    case "rhel": return new RHELCommands();
  }
}
