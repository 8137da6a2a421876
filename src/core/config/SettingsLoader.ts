/**
 * Settings loader for `freshen.yaml`.
 *
 * The settings file tells freshen which commands drive the project's dev
 * stack. Every key is optional; an absent file means "use the defaults", which
 * target a DDEV-hosted Drupal site.
 *
 * ## Resolution
 *
 * 1. `FRESHEN_CONFIG` (absolute, or relative to the project root)
 * 2. `<projectRoot>/freshen.yaml`
 *
 * An explicitly named file that does not exist is an error; a missing
 * default file is not.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { FreshenError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Constants
// =============================================================================

export const SETTINGS_FILENAME = "freshen.yaml";

export const SETTINGS_ENV_VAR = "FRESHEN_CONFIG";

/**
 * Default command templates. Rendered with Handlebars, see CommandTemplate.
 */
export const DEFAULT_COMMANDS = {
  fetch: "git fetch --prune",
  checkout: "git checkout {{quote branch}}",
  pull: "git pull --ff-only",
  restart: "ddev restart",
  dependencies: "ddev composer install",
  assets: "ddev npm run build",
  dbDownload: "ddev pull platform --skip-files --skip-import -y",
  dbImport: "ddev import-db --file={{quote dumpFile}}",
  cacheClear: "{{cms}} cache:clear plugin",
  schemaUpdate: "{{cms}} updatedb --no-post-updates -y",
  configImport: "{{cms}} config:import -y",
  postUpdate: "{{cms}} updatedb -y",
  cacheRebuild: "{{cms}} cache:rebuild",
  login: "{{cms}} user:login",
  configStatus: "{{cms}} config:status --format=list",
} as const;

export type CommandKey = keyof typeof DEFAULT_COMMANDS;

// =============================================================================
// Zod Schemas
// =============================================================================

const commandTemplate = (fallback: string) =>
  z
    .string()
    .transform((s) => s.trim())
    .refine((s) => s.length > 0, { message: "Command cannot be empty" })
    .default(fallback);

const CommandsSchema = z
  .object({
    fetch: commandTemplate(DEFAULT_COMMANDS.fetch),
    checkout: commandTemplate(DEFAULT_COMMANDS.checkout),
    pull: commandTemplate(DEFAULT_COMMANDS.pull),
    restart: commandTemplate(DEFAULT_COMMANDS.restart),
    dependencies: commandTemplate(DEFAULT_COMMANDS.dependencies),
    assets: commandTemplate(DEFAULT_COMMANDS.assets),
    dbDownload: commandTemplate(DEFAULT_COMMANDS.dbDownload),
    dbImport: commandTemplate(DEFAULT_COMMANDS.dbImport),
    cacheClear: commandTemplate(DEFAULT_COMMANDS.cacheClear),
    schemaUpdate: commandTemplate(DEFAULT_COMMANDS.schemaUpdate),
    configImport: commandTemplate(DEFAULT_COMMANDS.configImport),
    postUpdate: commandTemplate(DEFAULT_COMMANDS.postUpdate),
    cacheRebuild: commandTemplate(DEFAULT_COMMANDS.cacheRebuild),
    login: commandTemplate(DEFAULT_COMMANDS.login),
    configStatus: commandTemplate(DEFAULT_COMMANDS.configStatus),
  })
  .strict();

const SettingsSchema = z
  .object({
    /** Prefix for CMS maintenance commands */
    cms: z
      .string()
      .transform((s) => s.trim())
      .refine((s) => s.length > 0, { message: "cms cannot be empty" })
      .default("ddev drush"),

    /** Database dump location, relative to the project root */
    dumpFile: z
      .string()
      .transform((s) => s.trim())
      .refine((s) => s.length > 0, { message: "dumpFile cannot be empty" })
      .default(".ddev/.downloads/db.sql.gz"),

    commands: CommandsSchema.default({}),
  })
  .strict();

// =============================================================================
// Types
// =============================================================================

export type SettingsData = z.infer<typeof SettingsSchema>;

/**
 * Validated settings plus where they came from.
 */
export interface Settings extends SettingsData {
  /** Absolute project root; commands run here */
  readonly projectRoot: string;

  /** Absolute path of the loaded file, undefined when defaults were used */
  readonly settingsPath?: string;
}

export interface LoadSettingsOptions {
  /** Environment to read SETTINGS_ENV_VAR from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Loads and validates the settings for a project.
 *
 * @throws FreshenError CONFIG_READ_FAILED, CONFIG_PARSE_FAILED or CONFIG_INVALID
 */
export async function loadSettings(
  projectRoot: string,
  options: LoadSettingsOptions = {},
): Promise<Settings> {
  const root = path.resolve(projectRoot);
  const explicit = (options.env ?? process.env)[SETTINGS_ENV_VAR];
  const settingsPath = explicit ? path.resolve(root, explicit) : path.join(root, SETTINGS_FILENAME);

  const content = await readSettingsFile(settingsPath, Boolean(explicit));
  if (content === undefined) {
    return { ...parseSettings({}, settingsPath), projectRoot: root };
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new FreshenError(
        `Invalid YAML in ${settingsPath}`,
        ErrorCode.CONFIG_PARSE_FAILED,
        { path: settingsPath, reason: error.message },
        "Fix the YAML syntax error and retry.",
        error,
      );
    }
    throw error;
  }

  // An empty document parses to null
  return { ...parseSettings(raw ?? {}, settingsPath), projectRoot: root, settingsPath };
}

/**
 * Validates raw settings data.
 *
 * @param source - File the data came from, used in error messages
 */
export function parseSettings(raw: unknown, source: string): SettingsData {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw new FreshenError(
      `Invalid settings in ${source}`,
      ErrorCode.CONFIG_INVALID,
      { path: source, issues },
      `Check ${path.basename(source)} against the documented keys.`,
    );
  }
  return result.data;
}

async function readSettingsFile(
  settingsPath: string,
  required: boolean,
): Promise<string | undefined> {
  try {
    return await fs.readFile(settingsPath, "utf8");
  } catch (error) {
    const code = isNodeError(error) ? error.code : undefined;
    if (code === "ENOENT" && !required) {
      return undefined;
    }
    throw new FreshenError(
      `Cannot read settings file ${settingsPath}`,
      ErrorCode.CONFIG_READ_FAILED,
      { path: settingsPath, reason: code ?? String(error) },
      required ? `Unset ${SETTINGS_ENV_VAR} or point it at an existing file.` : undefined,
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Type guard for Node.js errors with code property.
 */
function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
