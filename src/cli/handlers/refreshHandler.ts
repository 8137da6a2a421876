/**
 * Handler for a `freshen` run.
 *
 * Coordinates one refresh after the arguments have been parsed:
 * 1. validate flag combinations against the environment
 * 2. preflight: ask every confirmation the run needs, before anything changes
 * 3. execute the refresh pipeline
 *
 * The handler is separated from the CLI wiring to enable direct testing.
 *
 * @module
 */

import type { Configuration } from "../../core/config/Configuration.js";
import type { Settings } from "../../core/config/SettingsLoader.js";
import type { Environment } from "../../core/environment/Environment.js";
import { UserDeclinedError } from "../../core/errors/errors.js";
import type { CommandRunner } from "../../core/exec/CommandRunner.js";
import { canImportDb, canRunUpdate } from "../../core/gates/gates.js";
import {
  PipelineExecutor,
  type PipelineLogger,
  type PipelineSummary,
} from "../../core/pipeline/PipelineExecutor.js";
import { REFRESH_PIPELINE } from "../../core/pipeline/refreshPipeline.js";
import type { PipelineStep } from "../../core/pipeline/Step.js";
import { validateConfiguration } from "../args/ArgumentParser.js";
import type { ConfirmationPrompt, Confirmer } from "../prompts/ConfirmationGate.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Output used by the handler beyond what the pipeline prints.
 */
export interface RefreshLogger extends PipelineLogger {
  warn(message: string): void;
  detail(message: string): void;
}

/**
 * Dependencies for the refresh handler.
 */
export interface RefreshDependencies {
  readonly settings: Settings;
  readonly environment: Environment;
  readonly runner: CommandRunner;
  readonly confirmer: Confirmer;
  readonly logger: RefreshLogger;

  /** Step list (default: REFRESH_PIPELINE) */
  readonly pipeline?: readonly PipelineStep[];

  /** Clock (for testing) */
  readonly now?: () => number;
}

// =============================================================================
// Prompts
// =============================================================================

/**
 * @param cms - CMS command prefix from the settings
 */
export function discardDriftPrompt(cms: string): ConfirmationPrompt {
  return {
    question: "Configuration changes in the database will be overwritten. Continue?",
    fallbackGuidance: `Export them first ("${cms} config:export"), then run freshen again.`,
  };
}

export const DISCARD_CONTENT_PROMPT: ConfirmationPrompt = {
  question: "Importing the database discards local content changes. Continue?",
  fallbackGuidance: "Run freshen without --import-db to keep the local database.",
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Runs a refresh.
 *
 * @throws UsageError for invalid flag combinations or a missing dump
 * @throws EnvironmentMismatchError if configuration drift cannot be inspected
 * @throws UserDeclinedError if the operator declines a confirmation
 * @throws StepFailedError when a fail-fast step fails
 */
export async function handleRefresh(
  config: Configuration,
  deps: RefreshDependencies,
): Promise<PipelineSummary> {
  await validateConfiguration(config, deps.environment);
  await runPreflight(config, deps);

  const executor = new PipelineExecutor({ runner: deps.runner, logger: deps.logger, now: deps.now });
  return executor.run(deps.pipeline ?? REFRESH_PIPELINE, {
    config,
    environment: deps.environment,
    settings: deps.settings,
  });
}

/**
 * Asks every confirmation the run needs, in a fixed order, each at most once.
 *
 * Drift only matters when updates will import configuration over a database
 * that is kept; an imported database replaces it anyway.
 *
 * Runs before `git.checkout`, so drift is measured against the code currently
 * checked out, not the branch being switched to.
 */
export async function runPreflight(config: Configuration, deps: RefreshDependencies): Promise<void> {
  if (canRunUpdate(config) && !canImportDb(config)) {
    const drift = await deps.environment.inspectConfigDrift();
    if (drift.hasDrift) {
      deps.logger.warn("Configuration in the database differs from the code:");
      for (const line of drift.report.split("\n")) {
        deps.logger.detail(line);
      }
      await requireConfirmation(deps.confirmer, discardDriftPrompt(deps.settings.cms));
    }
  }

  if (canImportDb(config)) {
    await requireConfirmation(deps.confirmer, DISCARD_CONTENT_PROMPT);
  }
}

async function requireConfirmation(confirmer: Confirmer, prompt: ConfirmationPrompt): Promise<void> {
  const decision = await confirmer.confirm(prompt);
  if (decision === "abort") {
    throw new UserDeclinedError(prompt.question);
  }
}
