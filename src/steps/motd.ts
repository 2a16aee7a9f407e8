import { existsSync } from "node:fs";
import { copyFile } from "node:fs/promises";
import { join } from "node:path";
import type { ProvisionStep } from "../types/step.js";
import { done, skipped } from "../types/step.js";

export const MOTD_SOURCE = "motd.txt";

export const motdStep: ProvisionStep = {
  id: "motd",
  title: "Message of the day",
  fatal: false,
  async run(ctx) {
    const source = join(ctx.config.config_dir, MOTD_SOURCE);
    if (!existsSync(source)) {
      ctx.logger.warn({ path: source }, `${MOTD_SOURCE} not found.`);
      return skipped(`${MOTD_SOURCE} not found`);
    }

    await copyFile(source, ctx.config.motd_path);
    ctx.logger.info({ dest: ctx.config.motd_path }, "MOTD updated.");
    return done(`copied to ${ctx.config.motd_path}`);
  },
};
