/**
 * Renders a failed run for the operator.
 *
 * Every rendering starts with `Error [CODE]: message`. What follows depends
 * on the failure:
 *
 * - a failed step shows its command and the flag that skips it
 * - a usage error repeats the usage line
 * - any other error lists its details and hint
 *
 * @module
 */

import { FreshenError, StepFailedError, UsageError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { StepId } from "../../core/pipeline/Step.js";

export const USAGE_LINE = "Usage: freshen [options] [branch]";

export interface FormatErrorOptions {
  /** Add the underlying cause (default: false) */
  debug?: boolean;
}

/**
 * Flags that leave a failing step out of the next run.
 */
const SKIP_FLAGS: ReadonlyMap<string, string> = new Map([
  [StepId.GIT_PULL, "--no-git-pull"],
  [StepId.STACK_RESTART, "--no-restart"],
  [StepId.DEPENDENCIES_INSTALL, "--no-composer"],
  [StepId.ASSETS_BUILD, "--no-assets"],
  [StepId.CACHE_CLEAR, "--no-update"],
  [StepId.SCHEMA_UPDATE, "--no-update"],
  [StepId.CONFIG_IMPORT, "--no-update"],
  [StepId.POST_UPDATE, "--no-update"],
  [StepId.CACHE_REBUILD, "--no-update"],
  [StepId.CMS_LOGIN, "--no-login"],
]);

/**
 * Formats an error as output lines.
 *
 * ```text
 * Error [STEP_FAILED]: Step "git.pull" failed with exit code 1
 *   $ git pull --ff-only
 * Hint: Fix the command, or leave the step out with --no-git-pull.
 * ```
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string[] {
  if (error instanceof StepFailedError) {
    return formatStepFailure(error);
  }
  if (error instanceof UsageError) {
    return [heading(error), `  ${USAGE_LINE}`, ...formatDetails(error.details), ...formatHint(error.hint)];
  }
  if (error instanceof FreshenError) {
    const lines = [heading(error), ...formatDetails(error.details), ...formatHint(error.hint)];
    if (options.debug && error.cause) {
      lines.push(`Caused by: ${error.cause.message}`);
    }
    return lines;
  }

  const message = error instanceof Error ? error.message : String(error);
  return [`Error [${ErrorCode.INTERNAL_ERROR}]: ${message}`];
}

function heading(error: FreshenError): string {
  return `Error [${error.code}]: ${error.message}`;
}

function formatStepFailure(error: StepFailedError): string[] {
  const flag = SKIP_FLAGS.get(error.stepId);
  const hint = flag
    ? `Fix the command, or leave the step out with ${flag}.`
    : "Fix the command, then run freshen again.";
  return [heading(error), `  $ ${error.command}`, ...formatHint(hint)];
}

function formatDetails(details: Record<string, unknown> | undefined): string[] {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(details ?? {})) {
    if (Array.isArray(value)) {
      lines.push(`  ${key}:`, ...value.map((item) => `    - ${String(item)}`));
    } else if (typeof value === "string" && value.includes("\n")) {
      lines.push(`  ${key}:`, ...value.split("\n").map((line) => `    ${line}`));
    } else {
      lines.push(`  ${key}: ${String(value)}`);
    }
  }

  return lines;
}

function formatHint(hint: string | undefined): string[] {
  return hint ? [`Hint: ${hint}`] : [];
}
