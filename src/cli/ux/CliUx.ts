/**
 * CLI UX module for freshen.
 *
 * Provides consistent operator-facing output with:
 * - Color-coded output (success/error/warning)
 * - Log levels driven by the `--verbose` count
 * - Command announcements and separators around each step's own output
 * - TTY detection for CI fallback
 *
 * @module
 */

import pc from "picocolors";
import type { PipelineLogger } from "../../core/pipeline/PipelineExecutor.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels from least to most verbose.
 */
export type LogLevel = "info" | "verbose" | "debug";

/**
 * Options for creating a CliUx instance.
 */
export interface CliUxOptions {
  /** Log level threshold */
  readonly level: LogLevel;

  /** Whether to use colors (auto-detected from TTY if not specified) */
  readonly colors?: boolean;

  /** Custom stdout writer (for testing) */
  readonly stdout?: (msg: string) => void;

  /** Custom stderr writer (for testing) */
  readonly stderr?: (msg: string) => void;
}

/**
 * Details for success messages.
 */
export interface SuccessDetails {
  readonly [key: string]: unknown;
}

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  info: 1,
  verbose: 2,
  debug: 3,
};

const SYMBOLS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "→",
  command: "$",
};

export const SEPARATOR = "─".repeat(60);

// =============================================================================
// CliUx Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 *
 * ux.command("ddev restart");
 * ux.separator();
 * ux.success("Environment refreshed", { branch: "main" });
 * ux.verbose("Skipping Build assets");
 * ```
 */
export class CliUx implements PipelineLogger {
  readonly level: LogLevel;
  private readonly useColors: boolean;
  private readonly writeStdout: (msg: string) => void;
  private readonly writeStderr: (msg: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.writeStdout = options.stdout ?? ((msg) => process.stdout.write(msg));
    this.writeStderr = options.stderr ?? ((msg) => process.stderr.write(msg));
  }

  // ===========================================================================
  // Level checking
  // ===========================================================================

  private canLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  // ===========================================================================
  // Color helpers
  // ===========================================================================

  private green(text: string): string {
    return this.useColors ? pc.green(text) : text;
  }

  private red(text: string): string {
    return this.useColors ? pc.red(text) : text;
  }

  private yellow(text: string): string {
    return this.useColors ? pc.yellow(text) : text;
  }

  private cyan(text: string): string {
    return this.useColors ? pc.cyan(text) : text;
  }

  private dim(text: string): string {
    return this.useColors ? pc.dim(text) : text;
  }

  private bold(text: string): string {
    return this.useColors ? pc.bold(text) : text;
  }

  // ===========================================================================
  // Output methods
  // ===========================================================================

  /**
   * Outputs a success message with checkmark.
   */
  success(message: string, details?: SuccessDetails): void {
    const symbol = this.green(SYMBOLS.success);
    this.writeStdout(`${symbol} ${message}\n`);

    if (details) {
      for (const [key, value] of Object.entries(details)) {
        this.writeStdout(`  ${this.dim(key + ":")} ${String(value)}\n`);
      }
    }
  }

  /**
   * Outputs an error message with X mark. Always shown.
   */
  error(message: string): void {
    const symbol = this.red(SYMBOLS.error);
    this.writeStderr(`${symbol} ${message}\n`);
  }

  /**
   * Outputs a warning message with warning symbol.
   */
  warn(message: string): void {
    const symbol = this.yellow(SYMBOLS.warning);
    this.writeStderr(`${symbol} ${message}\n`);
  }

  /**
   * Outputs an info message with arrow.
   */
  info(message: string): void {
    const symbol = this.cyan(SYMBOLS.info);
    this.writeStdout(`${symbol} ${message}\n`);
  }

  /**
   * Outputs a verbose message (only shown at verbose+ level).
   */
  verbose(message: string): void {
    if (!this.canLog("verbose")) return;

    this.writeStdout(`  ${this.dim(message)}\n`);
  }

  /**
   * Outputs a debug message (only shown at debug level).
   */
  debug(message: string): void {
    if (!this.canLog("debug")) return;

    this.writeStdout(`  ${this.dim(`[debug] ${message}`)}\n`);
  }

  /**
   * Outputs an indented detail line.
   */
  detail(message: string): void {
    this.writeStdout(`  ${message}\n`);
  }

  /**
   * Outputs a header line.
   */
  header(title: string): void {
    this.writeStdout(`\n${this.bold(title)}\n`);
  }

  /**
   * Announces a command before it runs.
   */
  command(command: string): void {
    this.writeStdout(`${this.cyan(SYMBOLS.command)} ${this.bold(command)}\n`);
  }

  /**
   * Closes the output of a command.
   */
  separator(): void {
    this.writeStdout(`${this.dim(SEPARATOR)}\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Creates a new CliUx instance.
 */
export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

// =============================================================================
// Log Level Parsing
// =============================================================================

/**
 * Maps the `--verbose` count to a log level.
 *
 * - 0: info (default)
 * - 1: verbose (skipped steps, tolerated failures)
 * - 2+: debug (gate decisions, timings, stack traces)
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) {
    return "debug";
  }
  if (verbosity === 1) {
    return "verbose";
  }
  return "info";
}
