import type { Command, CommandOutcome } from "../types/command.js";
import type { DistroCommands } from "../distro/commands/interface.js";
import type { Executor } from "../execution/executor.js";
import type { Logger } from "../logger.js";

/**
 * Everything the steps need from the package and service managers.
 * Steps only see this interface, so a fake stands in for apt/dnf and systemd in tests.
 */
export interface HostCapabilities {
  isInstalled(pkg: string): Promise<boolean>;
  install(pkg: string): Promise<CommandOutcome>;
  refreshIndex(): Promise<CommandOutcome>;
  upgradeAll(): Promise<CommandOutcome>;
  restartService(unit: string): Promise<CommandOutcome>;
}

/** HostCapabilities backed by real commands. Command output is kept in the run log at debug level. */
export class CommandHost implements HostCapabilities {
  constructor(
    private readonly commands: DistroCommands,
    private readonly executor: Executor,
    private readonly logger: Logger,
  ) {}

  async isInstalled(pkg: string): Promise<boolean> {
    const r = await this.executor.execute(this.commands.packageQuery(pkg));
    return r.exitCode === 0;
  }

  install(pkg: string): Promise<CommandOutcome> {
    return this.run(this.commands.packageInstall(pkg));
  }

  refreshIndex(): Promise<CommandOutcome> {
    return this.run(this.commands.packageIndexRefresh());
  }

  upgradeAll(): Promise<CommandOutcome> {
    return this.run(this.commands.packageUpgradeAll());
  }

  restartService(unit: string): Promise<CommandOutcome> {
    return this.run(this.commands.serviceRestart(unit));
  }

  private async run(command: Command): Promise<CommandOutcome> {
    const r = await this.executor.execute(command);
    this.logger.debug(
      { command: command.argv.join(" "), exitCode: r.exitCode, durationMs: r.durationMs, stdout: r.stdout, stderr: r.stderr },
      "Command finished",
    );
    return { ok: r.exitCode === 0, exitCode: r.exitCode, stderr: r.stderr.trim() };
  }
}
