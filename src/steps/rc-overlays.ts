import { existsSync } from "node:fs";
import { chown, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { ProvisionStep, StepId } from "../types/step.js";
import { done, skipped } from "../types/step.js";
import { applyRcOverlay } from "../overlays/rc-file.js";

interface RcOverlay {
  readonly id: StepId;
  readonly title: string;
  /** File name inside config_dir. */
  readonly source: string;
  /** File name inside the target user's home. */
  readonly target: string;
}

/** Append an overlay from config_dir to a dotfile in the target user's home, owned by that user. */
export function rcOverlayStep(overlay: RcOverlay): ProvisionStep {
  return {
    id: overlay.id,
    title: overlay.title,
    fatal: false,
    async run(ctx) {
      const source = join(ctx.config.config_dir, overlay.source);
      if (!existsSync(source)) {
        ctx.logger.warn({ path: source }, `${overlay.source} not found.`);
        return skipped(`${overlay.source} not found`);
      }

      const dest = join(ctx.user.home, overlay.target);
      await applyRcOverlay(dest, await readFile(source), ctx.config.rc_append_mode);
      await chown(dest, ctx.user.uid, ctx.user.gid);
      ctx.logger.info({ dest, mode: ctx.config.rc_append_mode }, `${overlay.target} customized.`);
      return done(`${ctx.config.rc_append_mode} to ${dest}`);
    },
  };
}

export const bashrcStep = rcOverlayStep({ id: "bashrc", title: "Shell rc overlay", source: "bashrc.append", target: ".bashrc" });

export const nanorcStep = rcOverlayStep({ id: "nanorc", title: "Editor rc overlay", source: "nanorc.append", target: ".nanorc" });
