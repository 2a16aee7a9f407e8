import type { ProvisionStep } from "../types/step.js";
import { systemUpgradeStep } from "./system-upgrade.js";
import { packagesStep } from "./packages.js";
import { motdStep } from "./motd.js";
import { bashrcStep, nanorcStep } from "./rc-overlays.js";
import { sshKeyStep } from "./ssh-key.js";
import { sshdHardeningStep } from "./sshd-hardening.js";

/** Run order. Nothing reorders or parallelises these. */
export const PROVISION_STEPS: readonly ProvisionStep[] = [
  systemUpgradeStep,
  packagesStep,
  motdStep,
  bashrcStep,
  nanorcStep,
  sshKeyStep,
  sshdHardeningStep,
];
