/**
 * Environment backed by the local git checkout, filesystem and CMS tool.
 *
 * ## Upstream detection
 *
 * `git rev-parse --symbolic-full-name <branch>@{upstream}` (or `@{upstream}`
 * for the checked-out branch) fails both when a branch has no upstream and for unrelated reasons (broken repository, git not
 * installed). Only the first kind means "nothing to pull"; anything else is
 * reported as GIT_QUERY_FAILED rather than silently skipping the pull.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { simpleGit, GitError } from "simple-git";
import { EnvironmentMismatchError, FreshenError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { CommandRunner } from "../exec/CommandRunner.js";
import type { DriftReport, Environment } from "./Environment.js";

// =============================================================================
// Types
// =============================================================================

/**
 * The part of simple-git the environment uses.
 */
export interface GitQuery {
  raw(commands: string[]): Promise<string>;
}

export interface LocalEnvironmentOptions {
  /** Absolute project root (the git working tree) */
  readonly projectRoot: string;

  /** Dump file location, relative to the project root or absolute */
  readonly dumpFile: string;

  /** Fully rendered drift inspection command */
  readonly configStatusCommand: string;

  /** Runner for the drift inspection command */
  readonly runner: CommandRunner;

  /** Git client (default: simple-git rooted at projectRoot) */
  readonly git?: GitQuery;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Git messages that mean the branch simply has nothing to track.
 */
const NO_UPSTREAM_PATTERNS = [
  /no upstream configured/i,
  /no such branch/i,
  /unknown revision/i,
  /does not point to a branch/i,
];

/**
 * Whether a git failure message means "no upstream" rather than a broken query.
 */
export function isMissingUpstream(message: string): boolean {
  return NO_UPSTREAM_PATTERNS.some((pattern) => pattern.test(message));
}

// =============================================================================
// LocalEnvironment
// =============================================================================

export class LocalEnvironment implements Environment {
  readonly dumpFilePath: string;

  private readonly git: GitQuery;
  private readonly runner: CommandRunner;
  private readonly configStatusCommand: string;

  constructor(options: LocalEnvironmentOptions) {
    this.dumpFilePath = path.resolve(options.projectRoot, options.dumpFile);
    this.git = options.git ?? simpleGit({ baseDir: options.projectRoot });
    this.runner = options.runner;
    this.configStatusCommand = options.configStatusCommand;
  }

  async upstreamBranchExists(branch?: string): Promise<boolean> {
    const ref = branch === undefined ? "@{upstream}" : `${branch}@{upstream}`;
    try {
      await this.git.raw(["rev-parse", "--abbrev-ref", "--symbolic-full-name", ref]);
      return true;
    } catch (error) {
      if (error instanceof GitError && isMissingUpstream(error.message)) {
        return false;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      const subject = branch === undefined ? "the current branch" : `branch "${branch}"`;
      throw new FreshenError(
        `Could not determine the upstream of ${subject}`,
        ErrorCode.GIT_QUERY_FAILED,
        { branch: branch ?? "(current)", reason: cause.message.trim() },
        "Check the repository state, or skip pulling with --no-git-pull.",
        cause,
      );
    }
  }

  async dumpFileExists(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.dumpFilePath);
      return stats.isFile();
    } catch (error) {
      if (isNodeError(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
        return false;
      }
      throw error;
    }
  }

  async inspectConfigDrift(): Promise<DriftReport> {
    const result = await this.runner.capture(this.configStatusCommand);

    if (result.exitCode !== 0) {
      throw new EnvironmentMismatchError(
        "Configuration status could not be read; code and database are out of step",
        {
          command: result.command,
          exitCode: result.exitCode,
          output: (result.stderr || result.stdout).trim(),
        },
        "Re-run with --import-db to start from a database that matches the code.",
      );
    }

    const report = result.stdout.trim();
    return { hasDrift: report.length > 0, report };
  }
}

/**
 * Type guard for Node.js errors with code property.
 */
function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
