import { errorMessage } from "../errors.js";
import { policyFor } from "./step-policy.js";
import type { Stage, StageContext, StageResult, StepRecord } from "./stage.js";

export type OrchestratorResult = {
  success: boolean;
  stages: StageResult[];
  /** Id of the stage whose essential step failed. */
  failedStage?: string;
  error?: string;
};

/**
 * Orchestrator: runs stages in their fixed order.
 *
 * Per stage: gate → plan (read-only probes) → execute steps. An essential
 * step failure ends the run; advisory failures become warnings. Nothing a
 * stage throws escapes; it becomes a failed StageResult.
 */
export class Orchestrator {
  private readonly stages: readonly Stage[];
  private readonly ctx: StageContext;

  constructor(stages: readonly Stage[], ctx: StageContext) {
    this.stages = stages;
    this.ctx = ctx;
  }

  async run(): Promise<OrchestratorResult> {
    const results: StageResult[] = [];
    let failure: StageResult | undefined;

    for (const stage of this.stages) {
      if (failure) {
        results.push(this.blank(stage, "not-run", `not run: ${failure.id} failed`));
        continue;
      }
      const result = await this.runStage(stage);
      results.push(result);
      if (result.status === "failed") failure = result;
    }

    return {
      success: failure === undefined,
      stages: results,
      failedStage: failure?.id,
      error: failure?.reason,
    };
  }

  private async runStage(stage: Stage): Promise<StageResult> {
    const { logger, runner } = this.ctx;
    const start = Date.now();

    const gate = stage.gate(this.ctx);
    if (!gate.enabled) {
      logger.info(`Skipping ${stage.title}: ${gate.reason}`);
      return this.blank(stage, "skipped", gate.reason);
    }

    logger.info(stage.title);
    const result = this.blank(stage, "completed");

    try {
      const plan = await stage.plan(this.ctx);
      result.notes.push(...plan.notes);
      for (const note of plan.notes) logger.info(note);

      if (plan.steps.length === 0) {
        result.status = "satisfied";
        result.durationMs = Date.now() - start;
        return result;
      }

      for (const step of plan.steps) {
        const policy = policyFor(step.kind);
        const command = typeof step.command === "function" ? step.command() : step.command;
        if (command === null) {
          logger.info(`${step.description}: already in place`);
          continue;
        }
        logger.debug({ stage: stage.id, kind: step.kind, policy }, step.description);
        const outcome = await runner.execute(command);
        const record: StepRecord = {
          kind: step.kind,
          description: step.description,
          policy,
          exitCode: outcome.exitCode,
          simulated: outcome.simulated,
        };
        result.steps.push(record);
        if (outcome.exitCode === 0) continue;

        if (policy === "advisory") {
          const warning = `${step.description} failed (exit ${outcome.exitCode}); continuing`;
          logger.warn(warning);
          result.warnings.push(warning);
          continue;
        }

        result.status = "failed";
        result.reason = `${step.description} failed (exit ${outcome.exitCode}): ${command.line}`;
        logger.error({ stage: stage.id, kind: step.kind, exitCode: outcome.exitCode }, result.reason);
        break;
      }
    } catch (err) {
      result.status = "failed";
      result.reason = errorMessage(err);
      logger.error({ stage: stage.id }, `${stage.title} failed: ${result.reason}`);
    }

    result.durationMs = Date.now() - start;
    return result;
  }

  private blank(stage: Stage, status: StageResult["status"], reason?: string): StageResult {
    return {
      id: stage.id,
      title: stage.title,
      status,
      reason,
      notes: [],
      steps: [],
      warnings: [],
      durationMs: 0,
    };
  }
}
