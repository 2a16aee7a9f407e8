import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type { ProvisionContext } from "../context.js";
import { parsePackageList } from "./package-list.js";

export type InstallResult = "already-installed" | "installed" | "failed";

export interface PackageListSummary {
  /** False when the list file was missing and nothing ran. */
  readonly found: boolean;
  readonly results: ReadonlyArray<{ readonly pkg: string; readonly result: InstallResult }>;
}

/** Install one package unless it is already present. A failed install is logged, never thrown. */
export async function checkAndInstall(ctx: ProvisionContext, pkg: string): Promise<InstallResult> {
  if (await ctx.host.isInstalled(pkg)) {
    ctx.logger.info({ pkg }, `${pkg} is already installed.`);
    return "already-installed";
  }

  ctx.logger.info({ pkg }, `Installing ${pkg}...`);
  const outcome = await ctx.host.install(pkg);
  if (outcome.ok) {
    ctx.logger.info({ pkg }, `${pkg} successfully installed.`);
    return "installed";
  }
  ctx.logger.error({ pkg, exitCode: outcome.exitCode, stderr: outcome.stderr }, `Failed to install ${pkg}.`);
  return "failed";
}

/** One package at a time, in file order. */
export async function installPackageList(ctx: ProvisionContext, listPath: string): Promise<PackageListSummary> {
  if (!existsSync(listPath)) {
    ctx.logger.warn({ path: listPath }, `Package list file ${listPath} not found. Skipping package installation.`);
    return { found: false, results: [] };
  }

  ctx.logger.info({ path: listPath }, `Reading package list from ${listPath}`);
  const packages = parsePackageList(await readFile(listPath, "utf-8"));
  const results: { pkg: string; result: InstallResult }[] = [];
  for (const pkg of packages) {
    results.push({ pkg, result: await checkAndInstall(ctx, pkg) });
  }
  return { found: true, results };
}
