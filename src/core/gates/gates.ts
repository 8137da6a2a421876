/**
 * Gate predicates: may a given pipeline step run in this invocation?
 *
 * Each gate reads one concern of the configuration. Only `canPullUpdates`
 * touches the environment, and only after the flag check allows it, so
 * `--no-git-pull` never costs a git query.
 *
 * @module
 */

import type { Configuration } from "../config/Configuration.js";
import type { Environment } from "../environment/Environment.js";

/**
 * A gate decides whether a step runs. Environment reads are never cached.
 */
export type Gate = (config: Configuration, environment: Environment) => boolean | Promise<boolean>;

export function canChangeBranch(config: Configuration): boolean {
  return config.branch !== undefined;
}

export async function canPullUpdates(config: Configuration, environment: Environment): Promise<boolean> {
  if (config.skipGitPull) {
    return false;
  }
  return environment.upstreamBranchExists(config.branch);
}

export function canRestart(config: Configuration): boolean {
  return !config.skipRestart;
}

export function canBuildDependencies(config: Configuration): boolean {
  return !config.skipDependencyBuild;
}

export function canBuildAssets(config: Configuration): boolean {
  return !config.skipAssetBuild;
}

export function canImportDb(config: Configuration): boolean {
  return config.importDb;
}

export function canDownloadDb(config: Configuration): boolean {
  return !config.useExistingSql;
}

export function canUseExistingDump(config: Configuration): boolean {
  return config.useExistingSql;
}

export function canRunUpdate(config: Configuration): boolean {
  return !config.skipUpdate;
}

export function canLogin(config: Configuration): boolean {
  return !config.skipLogin;
}

/**
 * Gate for steps that always run once their parent runs.
 */
export function always(): boolean {
  return true;
}

/**
 * Combines gates; later gates are only consulted while earlier ones pass.
 */
export function allOf(...gates: Gate[]): Gate {
  return async (config, environment) => {
    for (const gate of gates) {
      if (!(await gate(config, environment))) {
        return false;
      }
    }
    return true;
  };
}
