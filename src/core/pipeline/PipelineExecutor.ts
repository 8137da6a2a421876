/**
 * Pipeline Executor - runs the fixed step sequence of a refresh.
 *
 * For each step, in declaration order:
 *
 * 1. Evaluate the gate. A closed gate skips the step (noted at verbose level).
 * 2. Print the command, run it, print a separator.
 * 3. A non-zero status stops the run for `fail-fast` steps and is only noted
 *    for `best-effort` steps.
 *
 * Group steps are admitted by their own gate and then run their inner steps
 * under the same rules. Nothing is retried and nothing is rolled back.
 *
 * @module
 */

import { StepFailedError } from "../errors/errors.js";
import type { CommandRunner } from "../exec/CommandRunner.js";
import { formatDuration } from "../exec/CommandRunner.js";
import type { CommandStep, PipelineStep, RunContext, StepId } from "./Step.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Output sink for pipeline progress.
 */
export interface PipelineLogger {
  /** Announce the command about to run */
  command(command: string): void;

  /** Close the output block of a command */
  separator(): void;

  /** Announce a group step */
  header(title: string): void;

  /** Shown only when the operator asked for verbose output */
  verbose(message: string): void;

  /** Shown only at debug verbosity */
  debug(message: string): void;

  error(message: string): void;
}

export type StepOutcome = "ran" | "skipped" | "tolerated";

/**
 * What happened to one step.
 */
export interface StepRecord {
  readonly id: StepId;
  readonly title: string;
  readonly outcome: StepOutcome;

  /** Rendered command (absent for skipped steps) */
  readonly command?: string;

  readonly exitCode?: number;
  readonly durationMs?: number;
}

/**
 * Summary of a completed pipeline run.
 */
export interface PipelineSummary {
  readonly records: readonly StepRecord[];

  /** Command steps that exited 0 */
  readonly executed: number;

  /** Steps (or groups) whose gate was closed */
  readonly skipped: number;

  /** Best-effort steps that failed */
  readonly tolerated: number;

  readonly totalDurationMs: number;
}

export interface PipelineExecutorOptions {
  readonly runner: CommandRunner;
  readonly logger: PipelineLogger;

  /** Clock (for testing) */
  readonly now?: () => number;
}

// =============================================================================
// PipelineExecutor Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const executor = new PipelineExecutor({ runner, logger: ux });
 * const summary = await executor.run(REFRESH_PIPELINE, context);
 * ```
 */
export class PipelineExecutor {
  private readonly runner: CommandRunner;
  private readonly logger: PipelineLogger;
  private readonly now: () => number;

  constructor(options: PipelineExecutorOptions) {
    this.runner = options.runner;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Runs the steps in order.
   *
   * @throws StepFailedError when a fail-fast step exits non-zero
   */
  async run(steps: readonly PipelineStep[], context: RunContext): Promise<PipelineSummary> {
    const startTime = this.now();
    const records: StepRecord[] = [];

    await this.runSteps(steps, context, records);

    return {
      records,
      executed: records.filter((r) => r.outcome === "ran").length,
      skipped: records.filter((r) => r.outcome === "skipped").length,
      tolerated: records.filter((r) => r.outcome === "tolerated").length,
      totalDurationMs: this.now() - startTime,
    };
  }

  private async runSteps(
    steps: readonly PipelineStep[],
    context: RunContext,
    records: StepRecord[],
  ): Promise<void> {
    for (const step of steps) {
      const admitted = await step.gate(context.config, context.environment);
      this.logger.debug(`gate ${step.id}: ${admitted ? "open" : "closed"}`);

      if (!admitted) {
        this.logger.verbose(`Skipping ${step.title}`);
        records.push({ id: step.id, title: step.title, outcome: "skipped" });
        continue;
      }

      if (step.kind === "group") {
        this.logger.header(step.title);
        await this.runSteps(step.steps, context, records);
        continue;
      }

      records.push(await this.runCommand(step, context));
    }
  }

  private async runCommand(step: CommandStep, context: RunContext): Promise<StepRecord> {
    const command = step.command(context);

    this.logger.command(command);
    const result = await this.runner.run(command);
    this.logger.separator();

    if (result.error) {
      this.logger.error(result.error);
    }

    this.logger.debug(
      `${step.id} exited with ${result.exitCode} after ${formatDuration(result.durationMs)}`,
    );

    const record = {
      id: step.id,
      title: step.title,
      command,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    };

    if (result.exitCode === 0) {
      return { ...record, outcome: "ran" };
    }

    if (step.policy === "best-effort") {
      this.logger.verbose(`Ignoring exit code ${result.exitCode} from ${step.title}`);
      return { ...record, outcome: "tolerated" };
    }

    throw new StepFailedError(step.id, command, result.exitCode);
  }
}
