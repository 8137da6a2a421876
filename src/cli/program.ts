/**
 * Wires a freshen run: arguments, settings, environment, prompts, output.
 *
 * `runCli` never calls `process.exit`; it returns the exit status so tests
 * can drive whole runs with fake collaborators.
 *
 * @module
 */

import { verbosityArgument, type Configuration } from "../core/config/Configuration.js";
import { renderCommand } from "../core/config/CommandTemplate.js";
import { loadSettings, type Settings } from "../core/config/SettingsLoader.js";
import type { Environment } from "../core/environment/Environment.js";
import { LocalEnvironment } from "../core/environment/LocalEnvironment.js";
import { FreshenError, UserDeclinedError } from "../core/errors/errors.js";
import { formatDuration, ShellCommandRunner, type CommandRunner } from "../core/exec/CommandRunner.js";
import type { PipelineSummary } from "../core/pipeline/PipelineExecutor.js";
import { parseArguments } from "./args/ArgumentParser.js";
import { formatError } from "./errors/ErrorPresenter.js";
import { handleRefresh } from "./handlers/refreshHandler.js";
import { ConfirmationGate, type AskFn } from "./prompts/ConfirmationGate.js";
import { createCliUx, levelFromVerbosity, type CliUx } from "./ux/CliUx.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Process-level collaborators, all optional (for testing).
 */
export interface CliDependencies {
  /** Project root (default: process.cwd()) */
  readonly cwd?: string;

  /** Environment variables (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;

  readonly stdout?: (msg: string) => void;
  readonly stderr?: (msg: string) => void;
  readonly colors?: boolean;

  readonly createRunner?: (settings: Settings) => CommandRunner;
  readonly createEnvironment?: (settings: Settings, runner: CommandRunner) => Environment;

  /** Prompt implementation for confirmations */
  readonly ask?: AskFn;

  /** Clock (for testing) */
  readonly now?: () => number;
}

// =============================================================================
// Entry
// =============================================================================

/**
 * Runs freshen with user arguments and returns the process exit status.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((msg: string) => process.stdout.write(msg));
  const stderr = deps.stderr ?? ((msg: string) => process.stderr.write(msg));

  let ux = createCliUx({ level: "info", colors: deps.colors, stdout, stderr });

  try {
    const outcome = parseArguments(argv, { writeOut: stdout });
    if (outcome.kind === "info") {
      return 0;
    }

    const { config } = outcome;
    ux = createCliUx({ level: levelFromVerbosity(config.verbosity), colors: deps.colors, stdout, stderr });
    const output = ux;

    const settings = await loadSettings(deps.cwd ?? process.cwd(), { env: deps.env });
    output.debug(`settings: ${settings.settingsPath ?? "built-in defaults"}`);
    output.debug(`child verbosity: ${verbosityArgument(config.verbosity) || "(none)"}`);

    const runner = deps.createRunner?.(settings) ?? new ShellCommandRunner({ cwd: settings.projectRoot });
    const environment = deps.createEnvironment?.(settings, runner) ?? createLocalEnvironment(settings, config, runner);
    const confirmer = new ConfirmationGate({
      skipPrompts: config.skipPrompts,
      output: (message) => output.info(message),
      ask: deps.ask,
    });

    const summary = await handleRefresh(config, {
      settings,
      environment,
      runner,
      confirmer,
      logger: output,
      now: deps.now,
    });

    reportSummary(output, config, summary);
    return 0;
  } catch (error) {
    return reportFailure(ux, error, stderr);
  }
}

function createLocalEnvironment(settings: Settings, config: Configuration, runner: CommandRunner): Environment {
  return new LocalEnvironment({
    projectRoot: settings.projectRoot,
    dumpFile: settings.dumpFile,
    configStatusCommand: renderCommand("configStatus", settings.commands.configStatus, {
      cms: settings.cms,
      dumpFile: settings.dumpFile,
      branch: config.branch,
    }),
    runner,
  });
}

function reportSummary(ux: CliUx, config: Configuration, summary: PipelineSummary): void {
  const steps = [`${summary.executed} run`, `${summary.skipped} skipped`];
  if (summary.tolerated > 0) {
    steps.push(`${summary.tolerated} failed but tolerated`);
  }

  ux.success("Environment refreshed", {
    branch: config.branch ?? "(current)",
    steps: steps.join(", "),
    time: formatDuration(summary.totalDurationMs),
  });
}

function reportFailure(ux: CliUx, error: unknown, stderr: (msg: string) => void): number {
  // Declining is a choice, not a failure; the guidance was already printed
  if (error instanceof UserDeclinedError) {
    ux.verbose(error.message);
    return error.exitCode;
  }

  for (const line of formatError(error, { debug: ux.level === "debug" })) {
    stderr(`${line}\n`);
  }

  return error instanceof FreshenError ? error.exitCode : 1;
}
