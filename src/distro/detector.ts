import { readFileSync } from "node:fs";
import type { DistroContext, DistroFamily } from "../types/distro.js";
import type { Logger } from "../logger.js";

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Resolve distro family from os-release fields; null when unrecognised. */
export function resolveFamily(osRelease: Record<string, string>): DistroFamily | null {
  const idLike = (osRelease.ID_LIKE ?? "").toLowerCase();
  const id = (osRelease.ID ?? "").toLowerCase();
  if (id === "debian" || id === "ubuntu" || idLike.includes("debian") || idLike.includes("ubuntu")) return "debian";
  if (id === "fedora" || id === "rhel" || id === "centos" || id === "rocky" || id === "almalinux" || idLike.includes("rhel") || idLike.includes("fedora")) return "rhel";
  return null;
}

/**
 * Detect the local distro. An explicit family from config wins over detection.
 */
export function detectDistro(
  logger: Logger,
  familyOverride?: DistroFamily,
  osReleasePath = "/etc/os-release",
): DistroContext {
  let osRelease: Record<string, string> = {};
  try {
    osRelease = parseOsRelease(readFileSync(osReleasePath, "utf-8"));
  } catch (err) {
    logger.warn({ path: osReleasePath, error: err instanceof Error ? err.message : String(err) }, "Could not read os-release");
  }

  const detected = resolveFamily(osRelease);
  if (!detected && !familyOverride) {
    logger.warn({ id: osRelease.ID, idLike: osRelease.ID_LIKE }, "Unknown distro family, defaulting to debian");
  }
  const family = familyOverride ?? detected ?? "debian";

  const context: DistroContext = {
    family,
    name: osRelease.NAME ?? osRelease.ID ?? "Unknown",
    version: osRelease.VERSION_ID ?? "unknown",
    package_manager: family === "debian" ? "apt" : "dnf",
  };
  logger.debug({ distro: context }, "Distro detection complete");
  return context;
}
