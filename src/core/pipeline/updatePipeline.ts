/**
 * CMS update sub-pipeline.
 *
 * Runs as one step of the refresh pipeline. Configuration is imported twice:
 * dependencies between configuration entities can leave a single pass short,
 * and a large import may fail on memory or ordering the first time. The first
 * pass is best-effort, the second is authoritative. The second schema update
 * includes post-update hooks and runs without a cache clear in between.
 *
 * @module
 */

import { always, canRunUpdate } from "../gates/gates.js";
import { fromCmsTemplate } from "./commands.js";
import { StepId, type CommandStep, type GroupStep } from "./Step.js";

export const UPDATE_STEPS: readonly CommandStep[] = [
  {
    kind: "command",
    id: StepId.CACHE_CLEAR,
    title: "Clear plugin cache",
    gate: always,
    policy: "fail-fast",
    command: fromCmsTemplate("cacheClear"),
  },
  {
    kind: "command",
    id: StepId.SCHEMA_UPDATE,
    title: "Apply schema updates",
    gate: always,
    policy: "fail-fast",
    command: fromCmsTemplate("schemaUpdate"),
  },
  {
    kind: "command",
    id: StepId.CONFIG_IMPORT_FIRST,
    title: "Import configuration (first pass)",
    gate: always,
    policy: "best-effort",
    command: fromCmsTemplate("configImport"),
  },
  {
    kind: "command",
    id: StepId.CONFIG_IMPORT,
    title: "Import configuration",
    gate: always,
    policy: "fail-fast",
    command: fromCmsTemplate("configImport"),
  },
  {
    kind: "command",
    id: StepId.POST_UPDATE,
    title: "Apply schema and post-updates",
    gate: always,
    policy: "fail-fast",
    command: fromCmsTemplate("postUpdate"),
  },
  {
    kind: "command",
    id: StepId.CACHE_REBUILD,
    title: "Rebuild caches",
    gate: always,
    policy: "fail-fast",
    command: fromCmsTemplate("cacheRebuild"),
  },
];

export const UPDATE_PIPELINE: GroupStep = {
  kind: "group",
  id: StepId.CMS_UPDATE,
  title: "Update CMS",
  gate: canRunUpdate,
  steps: UPDATE_STEPS,
};
