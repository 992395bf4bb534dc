/**
 * Tests for CLI UX messaging module.
 *
 * Tests consistent messaging, output levels, and the log sink bridge.
 *
 * @module
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CliUx, createCliUx, parseUxLevel, type UxLevel } from "../src/cli/ux/CliUx.js";
import { CliUxLogSink } from "../src/cli/ux/CliUxLogSink.js";
import { createLogger } from "../src/core/logging/ContextualLogger.js";
import { BuildError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";

// =============================================================================
// Test Helpers
// =============================================================================

interface CapturedUx {
  ux: CliUx;
  stdout: string[];
  stderr: string[];
}

function capture(level: UxLevel): CapturedUx {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const ux = createCliUx({
    level,
    colors: false,
    stdout: (msg) => stdout.push(msg),
    stderr: (msg) => stderr.push(msg),
  });
  return { ux, stdout, stderr };
}

// =============================================================================
// Tests
// =============================================================================

describe("CliUx", () => {
  describe("messages", () => {
    it("formats success message with checkmark and details", () => {
      const { ux, stdout } = capture("info");

      ux.success("Built in 0.42 s (3 MB)", { pages: 12 });

      expect(stdout).toEqual(["✓ Built in 0.42 s (3 MB)\n", "  pages: 12\n"]);
    });

    it("writes errors with code and hint to stderr", () => {
      const { ux, stdout, stderr } = capture("info");

      ux.error('Theme "docs" not found', { code: "THEME_NOT_FOUND", hint: "Create themes/docs" });

      expect(stdout).toEqual([]);
      expect(stderr).toEqual(['✗ THEME_NOT_FOUND: Theme "docs" not found\n', "  Hint: Create themes/docs\n"]);
    });

    it("writes warnings to stderr", () => {
      const { ux, stderr } = capture("info");

      ux.warn("Page has no output");

      expect(stderr).toEqual(["⚠ Page has no output\n"]);
    });

    it("formats step progress", () => {
      const { ux, stdout } = capture("info");

      ux.step(3, 9, "Creating pages");

      expect(stdout).toEqual(["[3/9] Creating pages\n"]);
    });

    it("prefixes debug lines", () => {
      const { ux, stdout } = capture("debug");

      ux.debug("Layouts loaded");

      expect(stdout).toEqual(["  [debug] Layouts loaded\n"]);
    });
  });

  describe("levels", () => {
    it("hides verbose and debug output at info", () => {
      const { ux, stdout } = capture("info");

      ux.verbose("details");
      ux.debug("internals");
      ux.print("table", "verbose");

      expect(stdout).toEqual([]);
    });

    it("shows verbose output at verbose", () => {
      const { ux, stdout } = capture("verbose");

      ux.verbose("details");
      ux.print("table", "verbose");
      ux.debug("internals");

      expect(stdout).toEqual(["  details\n", "table\n"]);
    });

    it("shows only errors when silent", () => {
      const { ux, stdout, stderr } = capture("silent");

      ux.success("done");
      ux.info("info");
      ux.warn("warn");
      ux.step(1, 2, "step");
      ux.error("failed");

      expect(stdout).toEqual([]);
      expect(stderr).toEqual(["✗ failed\n"]);
    });

    it("reports its level", () => {
      const { ux } = capture("verbose");

      expect(ux.getLevel()).toBe("verbose");
      expect(ux.canLog("info")).toBe(true);
      expect(ux.canLog("debug")).toBe(false);
    });
  });
});

describe("parseUxLevel", () => {
  it("returns info by default", () => {
    expect(parseUxLevel({ verbose: false, debug: false, silent: false })).toBe("info");
  });

  it("returns the level of a single flag", () => {
    expect(parseUxLevel({ verbose: true, debug: false, silent: false })).toBe("verbose");
    expect(parseUxLevel({ verbose: false, debug: false, silent: true })).toBe("silent");
    expect(parseUxLevel({ verbose: false, debug: true, silent: false })).toBe("debug");
  });

  it("debug takes precedence over silent and verbose", () => {
    expect(parseUxLevel({ verbose: true, debug: true, silent: true })).toBe("debug");
  });

  it("silent takes precedence over verbose", () => {
    expect(parseUxLevel({ verbose: true, debug: false, silent: true })).toBe("silent");
  });
});

describe("CliUxLogSink", () => {
  let out: CapturedUx;

  beforeEach(() => {
    out = capture("debug");
  });

  function logger() {
    return createLogger({ sink: new CliUxLogSink(out.ux), minLevel: "debug" });
  }

  it("prints step notices as progress lines", () => {
    logger().notice("Loading pages", { step: "Loading pages", stepIndex: 1, stepTotal: 11 });

    expect(out.stdout).toEqual(["[1/11] Loading pages\n"]);
  });

  it("prints the build summary as success", () => {
    logger().notice("Built in 1.25 s (5 KB)", { event: "build.end", durationMs: 1250 });

    expect(out.stdout).toEqual(["✓ Built in 1.25 s (5 KB)\n"]);
  });

  it("prints other notices as info", () => {
    logger().notice("Using theme base");

    expect(out.stdout).toEqual(["→ Using theme base\n"]);
  });

  it("prints info entries with their fields", () => {
    logger().withContext({ correlationId: "run-1", step: "Loading pages" }).info("Pages found", { count: 4 });

    expect(out.stdout).toEqual(["  Pages found count=4\n"]);
  });

  it("prints debug entries with JSON-encoded fields", () => {
    logger().debug("Layouts loaded", { templates: ["index", "_default/page"] });

    expect(out.stdout).toEqual(['  [debug] Layouts loaded templates=["index","_default/page"]\n']);
  });

  it("routes errors with their code to stderr", () => {
    logger().error("Build failed", { error: new BuildError("x", ErrorCode.STEP_FAILED) });

    expect(out.stderr).toEqual(["✗ STEP_FAILED: Build failed\n"]);
  });

  it("routes warnings to stderr", () => {
    logger().warn("Page has no output");

    expect(out.stderr).toEqual(["⚠ Page has no output\n"]);
  });
});
