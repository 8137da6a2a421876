/**
 * Standardized error codes for freshen.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All freshen error codes.
 *
 * Codes are grouped by domain:
 * - USAGE_* : Malformed invocation (flags, positionals, combinations)
 * - ENV_* : Live environment incompatible with the requested run
 * - CONFIG_* : freshen.yaml loading and validation
 * - STEP_* : Pipeline step execution
 * - GIT_* : Git queries
 * - USER_* : Operator decisions at confirmation prompts
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Usage errors
  USAGE_UNKNOWN_OPTION: "USAGE_UNKNOWN_OPTION",
  USAGE_TOO_MANY_ARGUMENTS: "USAGE_TOO_MANY_ARGUMENTS",
  USAGE_INVALID_ARGUMENTS: "USAGE_INVALID_ARGUMENTS",
  USAGE_INVALID_COMBINATION: "USAGE_INVALID_COMBINATION",
  USAGE_MISSING_DUMP: "USAGE_MISSING_DUMP",

  // Environment errors
  ENV_CONFIG_MISMATCH: "ENV_CONFIG_MISMATCH",

  // Settings file errors
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",
  CONFIG_READ_FAILED: "CONFIG_READ_FAILED",

  // Step errors
  STEP_FAILED: "STEP_FAILED",

  // Git errors
  GIT_QUERY_FAILED: "GIT_QUERY_FAILED",

  // Operator decisions
  USER_DECLINED: "USER_DECLINED",

  // Internal errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit status for malformed invocations.
 */
export const USAGE_EXIT_CODE = 2;

/**
 * Exit codes by code:
 * - 0: Operator declined a confirmation (not a failure)
 * - 1: Configuration, git query and internal errors
 * - 2: Usage errors and unrecoverable environment mismatches
 *
 * STEP_FAILED has no fixed code: a failed step exits with its own status.
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.USAGE_UNKNOWN_OPTION]: USAGE_EXIT_CODE,
  [ErrorCode.USAGE_TOO_MANY_ARGUMENTS]: USAGE_EXIT_CODE,
  [ErrorCode.USAGE_INVALID_ARGUMENTS]: USAGE_EXIT_CODE,
  [ErrorCode.USAGE_INVALID_COMBINATION]: USAGE_EXIT_CODE,
  [ErrorCode.USAGE_MISSING_DUMP]: USAGE_EXIT_CODE,

  [ErrorCode.ENV_CONFIG_MISMATCH]: USAGE_EXIT_CODE,

  [ErrorCode.CONFIG_PARSE_FAILED]: 1,
  [ErrorCode.CONFIG_INVALID]: 1,
  [ErrorCode.CONFIG_READ_FAILED]: 1,

  [ErrorCode.STEP_FAILED]: 1,

  [ErrorCode.GIT_QUERY_FAILED]: 1,

  [ErrorCode.USER_DECLINED]: 0,

  [ErrorCode.INTERNAL_ERROR]: 1,
};

/**
 * Gets the exit code for an error code.
 */
export function getExitCode(code: ErrorCode): number {
  return EXIT_CODE_MAP[code] ?? 1;
}
