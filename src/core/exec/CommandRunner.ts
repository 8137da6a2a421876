/**
 * Command Runner - Executes collaborator commands for pipeline steps.
 *
 * Every external tool freshen drives (git, the dev stack, the dependency
 * manager, the CMS command-line tool) is an opaque shell command. The runner
 * only reports how it ended; interpreting the exit status is the executor's
 * job.
 *
 * - `run` inherits stdio so the operator sees the tool's own output live.
 * - `capture` pipes stdout/stderr for commands whose output is inspected.
 *
 * Commands run one at a time in the project root. An interrupt sent to the
 * terminal reaches the running child directly.
 *
 * @module
 */

import { execa } from "execa";

// =============================================================================
// Types
// =============================================================================

/**
 * Result of a single command execution.
 */
export interface CommandResult {
  /** The command that was executed */
  readonly command: string;

  /** Exit code (0 for success) */
  readonly exitCode: number;

  /** Duration in milliseconds */
  readonly durationMs: number;

  /** Why the command could not be started, if it could not */
  readonly error?: string;
}

/**
 * Result of a command whose output was captured.
 */
export interface CapturedCommandResult extends CommandResult {
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Executes shell commands on behalf of the pipeline.
 */
export interface CommandRunner {
  run(command: string): Promise<CommandResult>;
  capture(command: string): Promise<CapturedCommandResult>;
}

export interface ShellCommandRunnerOptions {
  /** Working directory for every command (the project root) */
  readonly cwd: string;

  /** Optional environment variables to merge with process.env */
  readonly env?: Record<string, string>;
}

// =============================================================================
// ShellCommandRunner
// =============================================================================

/**
 * Runs commands through the system shell with execa.
 *
 * @example
 * ```typescript
 * const runner = new ShellCommandRunner({ cwd: "/path/to/site" });
 * const result = await runner.run("ddev restart");
 * if (result.exitCode !== 0) {
 *   // the step failed
 * }
 * ```
 */
export class ShellCommandRunner implements CommandRunner {
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ShellCommandRunnerOptions) {
    this.cwd = options.cwd;
    this.env = options.env ? { ...process.env, ...options.env } : process.env;
  }

  async run(command: string): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const result = await execa(command, {
        cwd: this.cwd,
        env: this.env,
        shell: true,
        stdio: "inherit",
        // Don't throw on non-zero exit - the executor decides
        reject: false,
      });

      return {
        command,
        exitCode: exitCodeOf(result),
        durationMs: Date.now() - startTime,
        ...startFailureOf(result),
      };
    } catch (error) {
      return {
        command,
        exitCode: 1,
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async capture(command: string): Promise<CapturedCommandResult> {
    const startTime = Date.now();

    try {
      const result = await execa(command, {
        cwd: this.cwd,
        env: this.env,
        shell: true,
        stdin: "inherit",
        stdout: "pipe",
        stderr: "pipe",
        reject: false,
      });

      return {
        command,
        exitCode: exitCodeOf(result),
        durationMs: Date.now() - startTime,
        stdout: result.stdout,
        stderr: result.stderr,
        ...startFailureOf(result),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        command,
        exitCode: 1,
        durationMs: Date.now() - startTime,
        stdout: "",
        stderr: message,
        error: message,
      };
    }
  }
}

/**
 * The subset of an execa result the runner reads.
 */
interface SettledCommand {
  readonly exitCode?: number;
  readonly failed: boolean;
}

function exitCodeOf(result: SettledCommand): number {
  return result.exitCode ?? (result.failed ? 1 : 0);
}

/**
 * With `reject: false`, execa resolves failures to its error object. A failure
 * without an exit code never ran, or was killed by a signal.
 */
function startFailureOf(result: SettledCommand): { error?: string } {
  if (result.failed && result.exitCode === undefined && result instanceof Error) {
    return { error: result.message };
  }
  return {};
}

/**
 * Formats duration in human-readable format.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted string (e.g., "1.23s" or "456ms")
 */
export function formatDuration(ms: number): string {
  if (ms >= 1000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  return `${ms}ms`;
}
