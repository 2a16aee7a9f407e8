// Config loader: reads an optional postinstall.yaml and deep-merges it over defaults.
// Runs before the run logger exists (the log directory is itself configurable), so
// problems are returned as issues for the caller to log once logging is up.
// Config shape is defined in src/types/config.ts; add new fields there, in the schema and in DEFAULT_CONFIG.
import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ProvisionConfig } from "../types/config.js";

export const DEFAULT_CONFIG_FILE = "postinstall.yaml";

export const DEFAULT_CONFIG: ProvisionConfig = {
  log_dir: "./logs",
  config_dir: "./config",
  packages_file: "./lists/packages.txt",
  motd_path: "/etc/motd",
  sshd_config_path: "/etc/ssh/sshd_config",
  ssh_service: null,
  rc_append_mode: "append",
  ssh_key: { prompt: true, public_key: null },
};

/** Every key optional: the file only overrides what it names. */
const configFileSchema = z.object({
  log_dir: z.string().min(1),
  config_dir: z.string().min(1),
  packages_file: z.string().min(1),
  motd_path: z.string().min(1),
  sshd_config_path: z.string().min(1),
  ssh_service: z.string().min(1).nullable(),
  rc_append_mode: z.enum(["append", "managed"]),
  ssh_key: z.object({
    prompt: z.boolean(),
    public_key: z.string().trim().min(1).nullable(),
  }).partial(),
  distro: z.object({
    family: z.enum(["debian", "rhel"]),
  }).partial(),
}).partial().strict();

export type ConfigSource = "defaults" | "file";

export interface ConfigResult {
  config: ProvisionConfig;
  configPath: string;
  source: ConfigSource;
  issues: string[];
}

export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): ConfigResult {
  const configPath = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(configPath)) {
    const issues = explicitPath ? [`Config file ${configPath} not found, using defaults`] : [];
    return { config: cloneDefaults(), configPath, source: "defaults", issues };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { config: cloneDefaults(), configPath, source: "defaults", issues: [`Failed to parse ${configPath}: ${message}`] };
  }

  // An empty YAML document parses to null.
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${configPath}: ${i.path.join(".") || "(root)"}: ${i.message}`);
    return { config: cloneDefaults(), configPath, source: "defaults", issues };
  }

  // zod omits absent keys rather than setting them undefined, so a shallow spread is a merge.
  const overrides = parsed.data;
  const config: ProvisionConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    ssh_key: { ...DEFAULT_CONFIG.ssh_key, ...overrides.ssh_key },
  };
  return { config, configPath, source: "file", issues: [] };
}

function cloneDefaults(): ProvisionConfig {
  return { ...DEFAULT_CONFIG, ssh_key: { ...DEFAULT_CONFIG.ssh_key } };
}

