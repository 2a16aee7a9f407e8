import type { ProvisionStep } from "../types/step.js";
import { done, skipped } from "../types/step.js";
import { installPackageList } from "../packages/installer.js";

export const packagesStep: ProvisionStep = {
  id: "packages",
  title: "Package installation",
  fatal: false,
  async run(ctx) {
    const summary = await installPackageList(ctx, ctx.config.packages_file);
    if (!summary.found) return skipped("package list not found");

    const failures = summary.results.filter((r) => r.result === "failed").length;
    return done(`${summary.results.length} package(s) processed, ${failures} failed`);
  },
};
