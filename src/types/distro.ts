/** Distribution family. */
export type DistroFamily = "debian" | "rhel";

/** Package manager resolved from distro family. */
export type PackageManager = "apt" | "dnf";

/** Runtime distro context, populated once before any step runs. */
export interface DistroContext {
  readonly family: DistroFamily;
  readonly name: string;
  readonly version: string;
  readonly package_manager: PackageManager;
}
