/**
 * Pipeline step identifiers and step definitions.
 *
 * Steps follow a dotted naming convention: `<domain>.<action>`.
 *
 * @module
 */

import type { Configuration } from "../config/Configuration.js";
import type { Environment } from "../environment/Environment.js";
import type { Settings } from "../config/SettingsLoader.js";
import type { Gate } from "../gates/gates.js";

/**
 * All pipeline step identifiers.
 */
export const StepId = {
  GIT_FETCH: "git.fetch",
  GIT_CHECKOUT: "git.checkout",
  GIT_PULL: "git.pull",
  STACK_RESTART: "stack.restart",
  DEPENDENCIES_INSTALL: "dependencies.install",
  ASSETS_BUILD: "assets.build",
  DB_DOWNLOAD: "db.download",
  DB_IMPORT: "db.import",

  /** Update sub-pipeline and its inner steps */
  CMS_UPDATE: "cms.update",
  CACHE_CLEAR: "cms.cache-clear",
  SCHEMA_UPDATE: "cms.schema-update",
  CONFIG_IMPORT_FIRST: "cms.config-import.first",
  CONFIG_IMPORT: "cms.config-import",
  POST_UPDATE: "cms.post-update",
  CACHE_REBUILD: "cms.cache-rebuild",

  CMS_LOGIN: "cms.login",
} as const;

export type StepId = (typeof StepId)[keyof typeof StepId];

/**
 * What a non-zero exit status means for the rest of the run.
 * - `fail-fast`: stop the run, exit with the step's status
 * - `best-effort`: note it and continue
 */
export type StepPolicy = "fail-fast" | "best-effort";

/**
 * Everything a step may read. Built once per run.
 */
export interface RunContext {
  readonly config: Configuration;
  readonly environment: Environment;
  readonly settings: Settings;
}

interface StepBase {
  readonly id: StepId;

  /** Human-readable label for reporting */
  readonly title: string;

  readonly gate: Gate;
}

/**
 * A step that runs one external command.
 */
export interface CommandStep extends StepBase {
  readonly kind: "command";
  readonly policy: StepPolicy;

  /** Renders the command for this run */
  readonly command: (context: RunContext) => string;
}

/**
 * A step made of a fixed inner sequence, admitted or skipped as a whole.
 */
export interface GroupStep extends StepBase {
  readonly kind: "group";
  readonly steps: readonly CommandStep[];
}

export type PipelineStep = CommandStep | GroupStep;
