/**
 * Binds pipeline steps to command templates from the settings.
 *
 * @module
 */

import { verbosityArgument } from "../config/Configuration.js";
import { renderCommand, withVerbosity } from "../config/CommandTemplate.js";
import type { CommandKey } from "../config/SettingsLoader.js";
import type { RunContext } from "./Step.js";

/**
 * Returns a command renderer for the template stored under `key`.
 */
export function fromTemplate(key: CommandKey): (context: RunContext) => string {
  return ({ config, settings }) =>
    renderCommand(key, settings.commands[key], {
      cms: settings.cms,
      dumpFile: settings.dumpFile,
      branch: config.branch,
    });
}

/**
 * Like {@link fromTemplate}, with the run's verbosity passed on to the CMS tool.
 */
export function fromCmsTemplate(key: CommandKey): (context: RunContext) => string {
  const render = fromTemplate(key);
  return (context) => withVerbosity(render(context), verbosityArgument(context.config.verbosity));
}
