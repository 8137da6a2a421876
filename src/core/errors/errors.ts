import { ErrorCode, getExitCode } from "./ErrorCode.js";

export class FreshenError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "FreshenError";
  }

  /** Process exit status for this error. */
  get exitCode(): number {
    return getExitCode(this.code);
  }
}

/**
 * Malformed invocation: unknown flag, extra positional, invalid flag
 * combination or a missing prerequisite file.
 */
export class UsageError extends FreshenError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.USAGE_INVALID_ARGUMENTS,
    details?: Record<string, unknown>,
    hint?: string,
  ) {
    super(message, code, details, hint);
    this.name = "UsageError";
  }
}

/**
 * Live environment state that no flag combination of this run can reconcile.
 * Exits like a usage error.
 */
export class EnvironmentMismatchError extends FreshenError {
  constructor(message: string, details?: Record<string, unknown>, hint?: string, cause?: Error) {
    super(message, ErrorCode.ENV_CONFIG_MISMATCH, details, hint, cause);
    this.name = "EnvironmentMismatchError";
  }
}

/**
 * A fail-fast step returned non-zero. The run exits with the step's status.
 */
export class StepFailedError extends FreshenError {
  constructor(
    public readonly stepId: string,
    public readonly command: string,
    public readonly exitStatus: number,
  ) {
    super(`Step "${stepId}" failed with exit code ${exitStatus}`, ErrorCode.STEP_FAILED, {
      command,
      exitCode: exitStatus,
    });
    this.name = "StepFailedError";
  }

  override get exitCode(): number {
    return this.exitStatus;
  }
}

/**
 * The operator answered a confirmation negatively. Ends the run with status 0.
 */
export class UserDeclinedError extends FreshenError {
  constructor(question: string) {
    super(`Declined: ${question}`, ErrorCode.USER_DECLINED);
    this.name = "UserDeclinedError";
  }
}
