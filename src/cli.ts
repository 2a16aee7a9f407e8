#!/usr/bin/env node

import { resolve } from "node:path";

import { createRunLogger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { detectDistro } from "./distro/detector.js";
import { createDistroCommands } from "./distro/commands/factory.js";
import { LocalExecutor } from "./execution/executor.js";
import { CommandHost } from "./host/capabilities.js";
import { isSuperuser, resolveTargetUser } from "./host/identity.js";
import { ReadlinePrompter } from "./prompt/confirm.js";
import { runProvisioning } from "./orchestrator.js";

async function main(): Promise<number> {
  const startedAt = new Date();

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, source, issues } = loadConfig(process.env.POSTINSTALL_CONFIG);

  // ── Phase 2: Open the run log ─────────────────────────────────
  const { logger, logFile } = createRunLogger({ logDir: resolve(config.log_dir), startedAt });
  logger.info({ configPath, source, logFile }, "Configuration loaded");
  for (const issue of issues) logger.error(issue);

  // ── Phase 3: Host adapters ────────────────────────────────────
  const distro = detectDistro(logger, config.distro?.family);
  const commands = createDistroCommands(distro);
  const executor = new LocalExecutor();
  const host = new CommandHost(commands, executor, logger);
  const prompter = new ReadlinePrompter();

  // ── Phase 4: Guard and steps ──────────────────────────────────
  try {
    const { exitCode } = await runProvisioning({
      logger,
      superuser: isSuperuser(),
      resolveUser: () => resolveTargetUser(executor),
      createContext: (user) => ({
        config, user, host, prompter, logger,
        sshService: config.ssh_service ?? commands.sshServiceUnit,
      }),
    });
    return exitCode;
  } finally {
    prompter.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`host-postinstall: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
