/**
 * Renders command templates from the settings file.
 *
 * Templates are Handlebars strings rendered without HTML escaping:
 *
 * ```yaml
 * commands:
 *   checkout: git checkout {{quote branch}}
 *   dbImport: ddev import-db --file={{quote dumpFile}}
 * ```
 *
 * Rendering is strict: a template that references a variable the run does not
 * provide fails instead of producing a half-empty command.
 *
 * @module
 */

import Handlebars from "handlebars";
import { FreshenError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

/**
 * Variables available to command templates.
 */
export interface TemplateVariables {
  readonly cms: string;
  readonly dumpFile: string;
  readonly branch?: string;
}

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quotes a value for a POSIX shell, leaving plain words untouched.
 *
 * @example
 * ```typescript
 * shellQuote("feature/x");  // feature/x
 * shellQuote("it's");       // 'it'\''s'
 * ```
 */
export function shellQuote(value: string): string {
  if (SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

const handlebars = Handlebars.create();
handlebars.registerHelper("quote", (value: unknown) => {
  // Strict mode does not cover helper arguments
  if (value === undefined || value === null) {
    throw new Error("quote was given an undefined value");
  }
  return shellQuote(String(value));
});

/**
 * Renders one command template.
 *
 * @param name - Settings key of the template, used in error messages
 * @throws FreshenError CONFIG_INVALID if the template is malformed or
 *   references an unknown variable
 */
export function renderCommand(name: string, template: string, variables: TemplateVariables): string {
  const data: Record<string, string> = { cms: variables.cms, dumpFile: variables.dumpFile };
  if (variables.branch !== undefined) {
    data.branch = variables.branch;
  }

  try {
    const compiled = handlebars.compile(template, { noEscape: true, strict: true });
    return compiled(data).trim();
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new FreshenError(
      `Failed to render command "${name}"`,
      ErrorCode.CONFIG_INVALID,
      { template, reason: cause.message },
      `Command templates may use {{cms}}, {{dumpFile}} and {{branch}} (branch only when one is given).`,
      cause,
    );
  }
}

/**
 * Appends a verbosity argument (`-v`, `-vv`, ...) to a command.
 */
export function withVerbosity(command: string, verbosityArgument: string): string {
  return verbosityArgument ? `${command} ${verbosityArgument}` : command;
}
