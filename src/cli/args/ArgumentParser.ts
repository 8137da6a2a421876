/**
 * Argument parser for `freshen [branch] [options]`.
 *
 * The CLI surface is declared once in {@link FLAGS}; commander does the
 * tokenizing:
 *
 * - combined short flags split (`-AU` is `-A -U`, `-vv` is `-v -v`)
 * - `--name=value` is split, so a switch given a value is unknown
 * - everything after a literal `--` is positional
 * - flags and the branch may come in any order
 *
 * Anything commander rejects becomes a {@link UsageError}.
 *
 * @module
 */

import { Command, CommanderError, Option } from "commander";
import {
  createConfiguration,
  type Configuration,
  type ConfigurationFlag,
} from "../../core/config/Configuration.js";
import type { Environment } from "../../core/environment/Environment.js";
import { UsageError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { canImportDb, canUseExistingDump } from "../../core/gates/gates.js";
import { CLI_VERSION } from "../version.js";

// =============================================================================
// Flag table
// =============================================================================

/**
 * One command-line flag.
 *
 * - `switch`: present means true
 * - `negated`: a `--no-*` flag; present means the step is skipped
 * - `counter`: each occurrence adds one
 */
export type FlagDefinition =
  | {
      readonly kind: "switch" | "negated";
      readonly key: ConfigurationFlag;
      readonly long: string;
      readonly short: string;
      readonly description: string;
    }
  | {
      readonly kind: "counter";
      readonly key: "verbosity";
      readonly long: string;
      readonly short: string;
      readonly description: string;
    };

export const DRIFT_HELP =
  "Configuration drift is checked before switching branches, against the code currently checked out.";

export const FLAGS: readonly FlagDefinition[] = [
  {
    kind: "counter",
    key: "verbosity",
    long: "verbose",
    short: "v",
    description: "show skipped steps and tolerated failures (repeat for debug output)",
  },
  {
    kind: "switch",
    key: "skipPrompts",
    long: "yes",
    short: "y",
    description: "answer yes to every confirmation",
  },
  {
    kind: "switch",
    key: "importDb",
    long: "import-db",
    short: "i",
    description: "replace the local database with a dump",
  },
  {
    kind: "switch",
    key: "useExistingSql",
    long: "existing-sql",
    short: "e",
    description: "import the previously downloaded dump (requires --import-db)",
  },
  {
    kind: "negated",
    key: "skipGitPull",
    long: "no-git-pull",
    short: "G",
    description: "do not pull the branch from its upstream",
  },
  {
    kind: "negated",
    key: "skipRestart",
    long: "no-restart",
    short: "R",
    description: "do not restart the dev stack",
  },
  {
    kind: "negated",
    key: "skipDependencyBuild",
    long: "no-composer",
    short: "C",
    description: "do not install dependencies",
  },
  {
    kind: "negated",
    key: "skipAssetBuild",
    long: "no-assets",
    short: "A",
    description: "do not build assets",
  },
  {
    kind: "negated",
    key: "skipUpdate",
    long: "no-update",
    short: "U",
    description: "do not run CMS updates",
  },
  {
    kind: "negated",
    key: "skipLogin",
    long: "no-login",
    short: "L",
    description: "do not generate a login link",
  },
];

// =============================================================================
// Types
// =============================================================================

/**
 * Result of parsing: either a run configuration, or help/version output that
 * has already been written.
 */
export type ParseOutcome =
  | { readonly kind: "run"; readonly config: Configuration }
  | { readonly kind: "info" };

export interface ParseArgumentsOptions {
  /** Writer for help and version output (default: stdout) */
  readonly writeOut?: (text: string) => void;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parses user arguments (without the node and script entries).
 *
 * @throws UsageError for unknown options, extra positionals or an empty branch
 */
export function parseArguments(argv: readonly string[], options: ParseArgumentsOptions = {}): ParseOutcome {
  let branch: string | undefined;

  const program = new Command()
    .name("freshen")
    .description("Rebuild the local development environment, optionally on another branch")
    .version(CLI_VERSION)
    .argument("[branch]", "branch to switch to before refreshing")
    .addHelpText("after", `\n${DRIFT_HELP}`)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: options.writeOut ?? ((text) => process.stdout.write(text)),
      writeErr: (text) => process.stderr.write(text),
      // Usage errors are reported by the caller
      outputError: () => undefined,
    })
    .action((value: string | undefined) => {
      branch = value;
    });

  const registered = FLAGS.map((flag) => {
    const option = new Option(`-${flag.short}, --${flag.long}`, flag.description);
    if (flag.kind === "counter") {
      option.argParser<number>((_value, previous) => previous + 1).default(0);
    }
    program.addOption(option);
    return { flag, option };
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (isInformational(error)) {
        return { kind: "info" };
      }
      throw toUsageError(error, program.args.length);
    }
    throw error;
  }

  if (branch !== undefined && branch.trim() === "") {
    throw new UsageError("Branch name cannot be empty");
  }

  const overrides: { -readonly [K in ConfigurationFlag]?: boolean } = {};
  let verbosity = 0;

  for (const { flag, option } of registered) {
    const value: unknown = program.getOptionValue(option.attributeName());
    switch (flag.kind) {
      case "counter":
        verbosity = typeof value === "number" ? value : 0;
        break;
      case "switch":
        overrides[flag.key] = value === true;
        break;
      case "negated":
        // commander stores `--no-x` as x = false
        overrides[flag.key] = value === false;
        break;
    }
  }

  return { kind: "run", config: createConfiguration({ ...overrides, verbosity, branch }) };
}

function isInformational(error: CommanderError): boolean {
  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.help" ||
    error.code === "commander.version"
  );
}

function toUsageError(error: CommanderError, operandCount: number): UsageError {
  const hint = "Run freshen --help for usage.";

  switch (error.code) {
    case "commander.unknownOption": {
      const token = /'([^']+)'/.exec(error.message)?.[1] ?? error.message;
      return new UsageError(`Unknown option: ${token}`, ErrorCode.USAGE_UNKNOWN_OPTION, undefined, hint);
    }
    case "commander.excessArguments":
      return new UsageError(
        `Expected at most one branch argument, got ${operandCount}`,
        ErrorCode.USAGE_TOO_MANY_ARGUMENTS,
        undefined,
        hint,
      );
    default:
      return new UsageError(error.message.replace(/^error:\s*/, ""), ErrorCode.USAGE_INVALID_ARGUMENTS, undefined, hint);
  }
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Checks flag combinations that are only invalid together, and the dump file
 * that `--existing-sql` depends on.
 *
 * @throws UsageError USAGE_INVALID_COMBINATION or USAGE_MISSING_DUMP
 */
export async function validateConfiguration(config: Configuration, environment: Environment): Promise<void> {
  if (canUseExistingDump(config) && !canImportDb(config)) {
    throw new UsageError(
      "--existing-sql requires --import-db",
      ErrorCode.USAGE_INVALID_COMBINATION,
      undefined,
      "Add --import-db (-i), or drop --existing-sql (-e).",
    );
  }

  if (canImportDb(config) && canUseExistingDump(config) && !(await environment.dumpFileExists())) {
    throw new UsageError(
      "--existing-sql was given but no database dump has been downloaded",
      ErrorCode.USAGE_MISSING_DUMP,
      { path: environment.dumpFilePath },
      "Drop --existing-sql to download a fresh dump.",
    );
  }
}
