// Run driver: guard, then every step in PROVISION_STEPS order, one at a time.
// Only two things end a run early: the guard (not root, or no operator account to act
// for) and a fatal step. Anything a non-fatal step throws is logged here and the run
// moves on to the next step.
import type { ProvisionContext } from "./context.js";
import type { TargetUser } from "./host/identity.js";
import type { Logger } from "./logger.js";
import type { ProvisionStep, StepId, StepOutcome } from "./types/step.js";
import { failed } from "./types/step.js";
import { ProvisionError, ProvisionErrorCode } from "./errors.js";
import { PROVISION_STEPS } from "./steps/index.js";

export interface StepReport {
  readonly id: StepId;
  readonly outcome: StepOutcome;
}

export async function runSteps(ctx: ProvisionContext, steps: readonly ProvisionStep[]): Promise<StepReport[]> {
  const reports: StepReport[] = [];
  for (const step of steps) {
    ctx.logger.debug({ step: step.id }, `Step: ${step.title}`);
    let outcome: StepOutcome;
    try {
      outcome = await step.run(ctx);
    } catch (err) {
      if (step.fatal) throw err;
      const message = err instanceof Error ? err.message : String(err);
      ctx.logger.error({ step: step.id, error: message }, `${step.title} failed: ${message}`);
      outcome = failed(message);
    }
    reports.push({ id: step.id, outcome });
  }
  return reports;
}

export interface ProvisionRun {
  readonly logger: Logger;
  readonly superuser: boolean;
  resolveUser(): Promise<TargetUser>;
  createContext(user: TargetUser): ProvisionContext;
  readonly steps?: readonly ProvisionStep[];
}

export interface RunResult {
  readonly exitCode: number;
  readonly reports: StepReport[];
}

/** Exit code 0 whenever the sequence completes, however many steps were skipped or failed. */
export async function runProvisioning(run: ProvisionRun): Promise<RunResult> {
  const { logger } = run;
  logger.info("Starting post-installation run.");

  try {
    if (!run.superuser) {
      throw new ProvisionError(ProvisionErrorCode.NOT_SUPERUSER, "This script must be run as root.");
    }
    const user = await run.resolveUser();
    logger.info({ user: user.username, home: user.home }, `Logged user: ${user.username}`);

    const reports = await runSteps(run.createContext(user), run.steps ?? PROVISION_STEPS);
    logger.info("Post-installation run completed.");
    return { exitCode: 0, reports };
  } catch (err) {
    if (err instanceof ProvisionError) {
      logger.fatal({ code: err.code, ...err.context }, err.message);
    } else {
      logger.fatal({ error: err instanceof Error ? err.message : String(err) }, "Provisioning aborted");
    }
    return { exitCode: 1, reports: [] };
  }
}
