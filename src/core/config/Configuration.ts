/**
 * Run configuration produced once per invocation by the argument parser.
 *
 * @module
 */

/**
 * Immutable record of everything the operator asked for on the command line.
 */
export interface Configuration {
  /** Branch to switch to; absent means no branch-change steps */
  readonly branch?: string;

  /** Repeat count of `--verbose` */
  readonly verbosity: number;

  /** Answer "yes" to every confirmation */
  readonly skipPrompts: boolean;

  /** Replace the local database with a dump */
  readonly importDb: boolean;

  /** Import the previously downloaded dump instead of downloading a new one */
  readonly useExistingSql: boolean;

  readonly skipGitPull: boolean;
  readonly skipRestart: boolean;
  readonly skipDependencyBuild: boolean;
  readonly skipAssetBuild: boolean;
  readonly skipUpdate: boolean;
  readonly skipLogin: boolean;
}

/**
 * Boolean fields of {@link Configuration}.
 */
export type ConfigurationFlag = {
  [K in keyof Configuration]-?: Configuration[K] extends boolean ? K : never;
}[keyof Configuration];

export const DEFAULT_CONFIGURATION: Configuration = Object.freeze({
  verbosity: 0,
  skipPrompts: false,
  importDb: false,
  useExistingSql: false,
  skipGitPull: false,
  skipRestart: false,
  skipDependencyBuild: false,
  skipAssetBuild: false,
  skipUpdate: false,
  skipLogin: false,
});

/**
 * Creates a frozen configuration, filling every omitted field with its default.
 */
export function createConfiguration(overrides: Partial<Configuration> = {}): Configuration {
  const verbosity = overrides.verbosity ?? DEFAULT_CONFIGURATION.verbosity;
  if (!Number.isInteger(verbosity) || verbosity < 0) {
    throw new RangeError(`verbosity must be a non-negative integer, got ${verbosity}`);
  }

  return Object.freeze({ ...DEFAULT_CONFIGURATION, ...overrides, verbosity });
}

/**
 * Renders a verbosity level as a repeated-letter argument for child commands.
 *
 * @example
 * ```typescript
 * verbosityArgument(0); // ""
 * verbosityArgument(2); // "-vv"
 * ```
 */
export function verbosityArgument(verbosity: number): string {
  return verbosity > 0 ? `-${"v".repeat(verbosity)}` : "";
}
