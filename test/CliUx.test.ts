/**
 * Tests for CLI UX messaging module.
 *
 * Tests consistent messaging, colors, and log levels.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { SEPARATOR, createCliUx, type LogLevel } from "../src/cli/ux/CliUx.js";

// =============================================================================
// Test Helpers
// =============================================================================

function captured(level: LogLevel = "info", colors = false) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const ux = createCliUx({
    level,
    colors,
    stdout: (msg) => stdout.push(msg),
    stderr: (msg) => stderr.push(msg),
  });
  return { ux, stdout: () => stdout.join(""), stderr: () => stderr.join("") };
}

// =============================================================================
// Tests
// =============================================================================

describe("CliUx", () => {
  // ===========================================================================
  // Success messages
  // ===========================================================================

  describe("success messages", () => {
    it("formats success message with checkmark", () => {
      const { ux, stdout } = captured();

      ux.success("Environment refreshed");

      expect(stdout()).toBe("✓ Environment refreshed\n");
    });

    it("lists details below the message", () => {
      const { ux, stdout } = captured();

      ux.success("Environment refreshed", { branch: "main", steps: "3 run, 1 skipped" });

      expect(stdout()).toBe("✓ Environment refreshed\n  branch: main\n  steps: 3 run, 1 skipped\n");
    });
  });

  // ===========================================================================
  // Error and warning messages
  // ===========================================================================

  describe("error and warning messages", () => {
    it("writes errors with X mark to stderr", () => {
      const { ux, stdout, stderr } = captured();

      ux.error("spawn /bin/sh ENOENT");

      expect(stderr()).toBe("✗ spawn /bin/sh ENOENT\n");
      expect(stdout()).toBe("");
    });

    it("writes warnings with warning symbol to stderr", () => {
      const { ux, stderr } = captured();

      ux.warn("Configuration in the database differs from the code:");

      expect(stderr()).toBe("⚠ Configuration in the database differs from the code:\n");
    });
  });

  // ===========================================================================
  // Info messages
  // ===========================================================================

  describe("info messages", () => {
    it("formats info message with arrow", () => {
      const { ux, stdout } = captured();

      ux.info("Run freshen without --import-db to keep the local database.");

      expect(stdout()).toBe("→ Run freshen without --import-db to keep the local database.\n");
    });
  });

  // ===========================================================================
  // Command output
  // ===========================================================================

  describe("command output", () => {
    it("announces a command with a prompt symbol", () => {
      const { ux, stdout } = captured();

      ux.command("ddev restart");

      expect(stdout()).toBe("$ ddev restart\n");
    });

    it("closes command output with a separator line", () => {
      const { ux, stdout } = captured();

      ux.separator();

      expect(stdout()).toBe(`${SEPARATOR}\n`);
      expect(SEPARATOR).toHaveLength(60);
    });

    it("prints group headers on their own line", () => {
      const { ux, stdout } = captured();

      ux.header("Update CMS");

      expect(stdout()).toBe("\nUpdate CMS\n");
    });

    it("indents detail lines", () => {
      const { ux, stdout } = captured();

      ux.detail("system.site");

      expect(stdout()).toBe("  system.site\n");
    });
  });

  // ===========================================================================
  // Log levels
  // ===========================================================================

  describe("log levels", () => {
    it("info level hides debug and verbose", () => {
      const { ux, stdout } = captured("info");

      ux.debug("Debug message");
      ux.verbose("Verbose message");
      ux.info("Info message");

      expect(stdout()).toBe("→ Info message\n");
    });

    it("verbose level shows verbose but not debug", () => {
      const { ux, stdout } = captured("verbose");

      ux.debug("Debug message");
      ux.verbose("Verbose message");

      expect(stdout()).toBe("  Verbose message\n");
    });

    it("debug level shows everything", () => {
      const { ux, stdout } = captured("debug");

      ux.debug("Debug message");
      ux.verbose("Verbose message");

      expect(stdout()).toBe("  [debug] Debug message\n  Verbose message\n");
    });

    it("exposes its level", () => {
      expect(captured("verbose").ux.level).toBe("verbose");
    });
  });

  // ===========================================================================
  // Color detection
  // ===========================================================================

  describe("color support", () => {
    it("can disable colors explicitly", () => {
      const { ux, stdout } = captured("info", false);

      ux.success("No colors here");
      ux.command("ddev restart");

      // Should not contain ANSI escape codes
      expect(stdout()).not.toMatch(/\x1b\[/);
    });
  });
});
