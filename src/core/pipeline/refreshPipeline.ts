/**
 * The refresh pipeline: every step a run may take, in the only order it takes
 * them.
 *
 * @module
 */

import {
  allOf,
  canBuildAssets,
  canBuildDependencies,
  canChangeBranch,
  canDownloadDb,
  canImportDb,
  canLogin,
  canPullUpdates,
  canRestart,
} from "../gates/gates.js";
import { fromCmsTemplate, fromTemplate } from "./commands.js";
import { StepId, type PipelineStep } from "./Step.js";
import { UPDATE_PIPELINE } from "./updatePipeline.js";

export const REFRESH_PIPELINE: readonly PipelineStep[] = [
  {
    kind: "command",
    id: StepId.GIT_FETCH,
    title: "Fetch remote branches",
    gate: canChangeBranch,
    policy: "fail-fast",
    command: fromTemplate("fetch"),
  },
  {
    kind: "command",
    id: StepId.GIT_CHECKOUT,
    title: "Check out branch",
    gate: canChangeBranch,
    policy: "fail-fast",
    command: fromTemplate("checkout"),
  },
  {
    kind: "command",
    id: StepId.GIT_PULL,
    title: "Pull branch updates",
    gate: canPullUpdates,
    policy: "fail-fast",
    command: fromTemplate("pull"),
  },
  {
    kind: "command",
    id: StepId.STACK_RESTART,
    title: "Restart the dev stack",
    gate: canRestart,
    policy: "fail-fast",
    command: fromTemplate("restart"),
  },
  {
    kind: "command",
    id: StepId.DEPENDENCIES_INSTALL,
    title: "Install dependencies",
    gate: canBuildDependencies,
    policy: "fail-fast",
    command: fromTemplate("dependencies"),
  },
  {
    kind: "command",
    id: StepId.ASSETS_BUILD,
    title: "Build assets",
    gate: canBuildAssets,
    policy: "fail-fast",
    command: fromTemplate("assets"),
  },
  {
    kind: "command",
    id: StepId.DB_DOWNLOAD,
    title: "Download database dump",
    gate: allOf(canImportDb, canDownloadDb),
    policy: "fail-fast",
    command: fromTemplate("dbDownload"),
  },
  {
    kind: "command",
    id: StepId.DB_IMPORT,
    title: "Import database",
    gate: canImportDb,
    policy: "fail-fast",
    command: fromTemplate("dbImport"),
  },
  UPDATE_PIPELINE,
  {
    kind: "command",
    id: StepId.CMS_LOGIN,
    title: "Generate one-time login link",
    gate: canLogin,
    policy: "fail-fast",
    command: fromCmsTemplate("login"),
  },
];
