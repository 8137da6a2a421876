/**
 * Unit tests for the standardized error system.
 *
 * Tests ErrorCode, the FreshenError family, and error rendering.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import * as errorCodeModule from "../../src/core/errors/ErrorCode.js";
import { ErrorCode, getExitCode, USAGE_EXIT_CODE } from "../../src/core/errors/ErrorCode.js";
import {
  EnvironmentMismatchError,
  FreshenError,
  StepFailedError,
  UsageError,
  UserDeclinedError,
} from "../../src/core/errors/errors.js";
import { formatError, USAGE_LINE } from "../../src/cli/errors/ErrorPresenter.js";

// =============================================================================
// ErrorCode Tests
// =============================================================================

describe("ErrorCode", () => {
  it("exports only the code table and exit-code lookup", () => {
    expect(Object.keys(errorCodeModule).sort()).toEqual(["ErrorCode", "USAGE_EXIT_CODE", "getExitCode"]);
  });

  describe("exit codes", () => {
    it("returns 2 for usage errors", () => {
      expect(USAGE_EXIT_CODE).toBe(2);
      expect(getExitCode(ErrorCode.USAGE_UNKNOWN_OPTION)).toBe(2);
      expect(getExitCode(ErrorCode.USAGE_TOO_MANY_ARGUMENTS)).toBe(2);
      expect(getExitCode(ErrorCode.USAGE_INVALID_COMBINATION)).toBe(2);
      expect(getExitCode(ErrorCode.USAGE_MISSING_DUMP)).toBe(2);
    });

    it("returns 2 for an environment mismatch", () => {
      expect(getExitCode(ErrorCode.ENV_CONFIG_MISMATCH)).toBe(2);
    });

    it("returns 0 for a declined confirmation", () => {
      expect(getExitCode(ErrorCode.USER_DECLINED)).toBe(0);
    });

    it("returns 1 for settings, git and internal errors", () => {
      expect(getExitCode(ErrorCode.CONFIG_INVALID)).toBe(1);
      expect(getExitCode(ErrorCode.GIT_QUERY_FAILED)).toBe(1);
      expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(1);
    });
  });
});

// =============================================================================
// FreshenError Tests
// =============================================================================

describe("FreshenError", () => {
  it("carries code, details and hint", () => {
    const error = new FreshenError("Invalid settings", ErrorCode.CONFIG_INVALID, { path: "freshen.yaml" }, "Fix it.");

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("FreshenError");
    expect(error.code).toBe("CONFIG_INVALID");
    expect(error.details).toEqual({ path: "freshen.yaml" });
    expect(error.hint).toBe("Fix it.");
    expect(error.exitCode).toBe(1);
  });

  it("UsageError defaults to invalid arguments", () => {
    const error = new UsageError("Branch name cannot be empty");

    expect(error).toBeInstanceOf(FreshenError);
    expect(error.name).toBe("UsageError");
    expect(error.code).toBe(ErrorCode.USAGE_INVALID_ARGUMENTS);
    expect(error.exitCode).toBe(2);
  });

  it("EnvironmentMismatchError exits like a usage error", () => {
    const error = new EnvironmentMismatchError("out of step");

    expect(error.code).toBe(ErrorCode.ENV_CONFIG_MISMATCH);
    expect(error.exitCode).toBe(2);
  });

  it("StepFailedError exits with the step's status", () => {
    const error = new StepFailedError("db.import", "ddev import-db", 137);

    expect(error.code).toBe(ErrorCode.STEP_FAILED);
    expect(error.exitCode).toBe(137);
    expect(error.message).toBe('Step "db.import" failed with exit code 137');
    expect(error.details).toEqual({ command: "ddev import-db", exitCode: 137 });
  });

  it("UserDeclinedError exits 0", () => {
    const error = new UserDeclinedError("Continue?");

    expect(error.message).toBe("Declined: Continue?");
    expect(error.exitCode).toBe(0);
  });
});

// =============================================================================
// formatError Tests
// =============================================================================

describe("formatError", () => {
  it("shows the failing command and the flag that skips the step", () => {
    const error = new StepFailedError("git.pull", "git pull --ff-only", 1);

    expect(formatError(error)).toEqual([
      'Error [STEP_FAILED]: Step "git.pull" failed with exit code 1',
      "  $ git pull --ff-only",
      "Hint: Fix the command, or leave the step out with --no-git-pull.",
    ]);
  });

  it("points every update step at --no-update", () => {
    const error = new StepFailedError("cms.config-import", "ddev drush config:import -y", 1);

    expect(formatError(error)[2]).toBe("Hint: Fix the command, or leave the step out with --no-update.");
  });

  it("offers no flag for steps that cannot be skipped alone", () => {
    const error = new StepFailedError("db.import", "ddev import-db", 137);

    expect(formatError(error)).toEqual([
      'Error [STEP_FAILED]: Step "db.import" failed with exit code 137',
      "  $ ddev import-db",
      "Hint: Fix the command, then run freshen again.",
    ]);
  });

  it("repeats the usage line for usage errors", () => {
    const error = new UsageError(
      "--existing-sql requires --import-db",
      ErrorCode.USAGE_INVALID_COMBINATION,
      undefined,
      "Add --import-db (-i), or drop --existing-sql (-e).",
    );

    expect(formatError(error)).toEqual([
      "Error [USAGE_INVALID_COMBINATION]: --existing-sql requires --import-db",
      `  ${USAGE_LINE}`,
      "Hint: Add --import-db (-i), or drop --existing-sql (-e).",
    ]);
  });

  it("lists details, indenting lists and multi-line values", () => {
    const error = new FreshenError("Invalid settings in freshen.yaml", ErrorCode.CONFIG_INVALID, {
      path: "freshen.yaml",
      output: "first\nsecond",
      issues: ["cms: cms cannot be empty"],
    });

    expect(formatError(error)).toEqual([
      "Error [CONFIG_INVALID]: Invalid settings in freshen.yaml",
      "  path: freshen.yaml",
      "  output:",
      "    first",
      "    second",
      "  issues:",
      "    - cms: cms cannot be empty",
    ]);
  });

  it("wraps unknown errors as internal errors", () => {
    expect(formatError(new Error("boom"))).toEqual(["Error [INTERNAL_ERROR]: boom"]);
    expect(formatError("plain string")).toEqual(["Error [INTERNAL_ERROR]: plain string"]);
  });

  it("adds the cause only when debugging", () => {
    const error = new FreshenError(
      "Could not determine the upstream",
      ErrorCode.GIT_QUERY_FAILED,
      undefined,
      undefined,
      new Error("fatal: not a git repository"),
    );

    expect(formatError(error)).toEqual(["Error [GIT_QUERY_FAILED]: Could not determine the upstream"]);
    expect(formatError(error, { debug: true })).toEqual([
      "Error [GIT_QUERY_FAILED]: Could not determine the upstream",
      "Caused by: fatal: not a git repository",
    ]);
  });
});
