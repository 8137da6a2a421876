/**
 * Live facts about the development environment, read on demand.
 *
 * The core never caches these answers: each gate asks when it needs to know.
 *
 * @module
 */

/**
 * Outcome of a configuration drift inspection.
 */
export interface DriftReport {
  /** True when deployed configuration differs from the configuration in code */
  readonly hasDrift: boolean;

  /** The inspector's listing of the differences (empty without drift) */
  readonly report: string;
}

export interface Environment {
  /** Absolute path of the database dump used by `--existing-sql` */
  readonly dumpFilePath: string;

  /**
   * Whether `branch` has a remote-tracking counterpart worth pulling from.
   * Without a branch, asks about the branch currently checked out.
   */
  upstreamBranchExists(branch?: string): Promise<boolean>;

  /** Whether a previously downloaded database dump is present. */
  dumpFileExists(): Promise<boolean>;

  /**
   * Compares deployed CMS configuration with the configuration in code.
   *
   * @throws EnvironmentMismatchError if the inspector itself fails
   */
  inspectConfigDrift(): Promise<DriftReport>;
}
