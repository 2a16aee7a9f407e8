import type { ProvisionStep } from "../types/step.js";
import { done } from "../types/step.js";
import { ProvisionError, ProvisionErrorCode } from "../errors.js";

/**
 * Index refresh, then a full upgrade. Either failing ends the run: every later
 * install assumes a fresh index.
 */
export const systemUpgradeStep: ProvisionStep = {
  id: "system-upgrade",
  title: "System update",
  fatal: true,
  async run(ctx) {
    ctx.logger.info("Updating system packages...");

    const refresh = await ctx.host.refreshIndex();
    if (!refresh.ok) {
      throw new ProvisionError(ProvisionErrorCode.UPGRADE_FAILED, "An error occurred while refreshing the package index", {
        exitCode: refresh.exitCode, stderr: refresh.stderr,
      });
    }

    const upgrade = await ctx.host.upgradeAll();
    if (!upgrade.ok) {
      throw new ProvisionError(ProvisionErrorCode.UPGRADE_FAILED, "An error occurred while upgrading installed packages", {
        exitCode: upgrade.exitCode, stderr: upgrade.stderr,
      });
    }

    ctx.logger.info("System packages are up to date.");
    return done("index refreshed and packages upgraded");
  },
};
