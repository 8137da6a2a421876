/**
 * Tests for loading and validating freshen.yaml.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DEFAULT_COMMANDS,
  SETTINGS_ENV_VAR,
  loadSettings,
  parseSettings,
} from "../src/core/config/SettingsLoader.js";
import { FreshenError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";

// =============================================================================
// Test Helpers
// =============================================================================

let projectRoot: string;

beforeEach(async () => {
  projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), "freshen-settings-"));
});

afterEach(async () => {
  await fs.rm(projectRoot, { recursive: true, force: true });
});

async function writeSettings(content: string, relative = "freshen.yaml"): Promise<string> {
  const file = path.join(projectRoot, relative);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
  return file;
}

async function loadError(env: NodeJS.ProcessEnv = {}): Promise<FreshenError> {
  try {
    await loadSettings(projectRoot, { env });
  } catch (error) {
    if (error instanceof FreshenError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected loadSettings to fail");
}

// =============================================================================
// Tests
// =============================================================================

describe("loadSettings", () => {
  describe("defaults", () => {
    it("uses built-in defaults when there is no settings file", async () => {
      const settings = await loadSettings(projectRoot, { env: {} });

      expect(settings.projectRoot).toBe(path.resolve(projectRoot));
      expect(settings.settingsPath).toBeUndefined();
      expect(settings.cms).toBe("ddev drush");
      expect(settings.dumpFile).toBe(".ddev/.downloads/db.sql.gz");
      expect(settings.commands).toEqual(DEFAULT_COMMANDS);
    });

    it("treats an empty file as all defaults", async () => {
      const file = await writeSettings("");

      const settings = await loadSettings(projectRoot, { env: {} });

      expect(settings.settingsPath).toBe(file);
      expect(settings.commands).toEqual(DEFAULT_COMMANDS);
    });
  });

  describe("overrides", () => {
    it("merges partial command overrides with the defaults", async () => {
      await writeSettings(
        ["cms: '  vendor/bin/drush  '", "commands:", "  restart: docker compose restart", ""].join("\n"),
      );

      const settings = await loadSettings(projectRoot, { env: {} });

      expect(settings.cms).toBe("vendor/bin/drush");
      expect(settings.commands.restart).toBe("docker compose restart");
      expect(settings.commands.fetch).toBe(DEFAULT_COMMANDS.fetch);
    });

    it("reads the file named by the environment variable, relative to the project root", async () => {
      const file = await writeSettings("dumpFile: backups/latest.sql\n", "config/fresh.yaml");

      const settings = await loadSettings(projectRoot, { env: { [SETTINGS_ENV_VAR]: "config/fresh.yaml" } });

      expect(settings.settingsPath).toBe(file);
      expect(settings.dumpFile).toBe("backups/latest.sql");
    });
  });

  describe("errors", () => {
    it("fails when the named file does not exist", async () => {
      const error = await loadError({ [SETTINGS_ENV_VAR]: "missing.yaml" });

      expect(error.code).toBe(ErrorCode.CONFIG_READ_FAILED);
      expect(error.details).toMatchObject({ path: path.join(projectRoot, "missing.yaml"), reason: "ENOENT" });
    });

    it("reports YAML syntax errors", async () => {
      await writeSettings("cms: [unclosed\n");

      const error = await loadError();

      expect(error.code).toBe(ErrorCode.CONFIG_PARSE_FAILED);
      expect(error.exitCode).toBe(1);
    });

    it("rejects unknown keys", async () => {
      await writeSettings("bogus: 1\n");

      const error = await loadError();

      expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(error.details?.issues).toEqual(["(root): Unrecognized key(s) in object: 'bogus'"]);
    });

    it("rejects unknown command names", async () => {
      await writeSettings("commands:\n  deploy: make deploy\n");

      const error = await loadError();

      expect(error.details?.issues).toEqual(["commands: Unrecognized key(s) in object: 'deploy'"]);
    });

    it("rejects empty commands", async () => {
      await writeSettings("commands:\n  restart: '   '\n");

      const error = await loadError();

      expect(error.details?.issues).toEqual(["commands.restart: Command cannot be empty"]);
    });
  });
});

describe("parseSettings", () => {
  it("names the source in the error", () => {
    expect(() => parseSettings({ cms: 5 }, "/srv/site/freshen.yaml")).toThrow(
      "Invalid settings in /srv/site/freshen.yaml",
    );
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => parseSettings(["restart"], "freshen.yaml")).toThrow(FreshenError);
  });
});
