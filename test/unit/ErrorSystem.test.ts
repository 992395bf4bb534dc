/**
 * Unit tests for the standardized error system.
 *
 * Tests ErrorCode, BuildError, and ErrorPresenter.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import { ErrorCode, getExitCode, getErrorCategory, isErrorCode } from "../../src/core/errors/ErrorCode.js";
import { BuildError, innermostCode, toError } from "../../src/core/errors/errors.js";
import { ErrorPresenter, exitCodeFor, formatError } from "../../src/cli/errors/ErrorPresenter.js";

// =============================================================================
// ErrorCode Tests
// =============================================================================

describe("ErrorCode", () => {
  describe("exit codes", () => {
    it("returns config exit codes in 10-19 range", () => {
      expect(getExitCode(ErrorCode.CONFIG_NOT_FOUND)).toBe(10);
      expect(getExitCode(ErrorCode.CONFIG_LOCKED)).toBe(13);
    });

    it("returns theme and content exit codes", () => {
      expect(getExitCode(ErrorCode.THEME_NOT_FOUND)).toBe(20);
      expect(getExitCode(ErrorCode.CONTENT_DUPLICATE_ID)).toBe(32);
      expect(getExitCode(ErrorCode.GENERATOR_FAILED)).toBe(35);
    });

    it("returns render and output exit codes", () => {
      expect(getExitCode(ErrorCode.TEMPLATE_NOT_FOUND)).toBe(40);
      expect(getExitCode(ErrorCode.OUTPUT_OPTIMIZE_FAILED)).toBe(51);
    });

    it("returns pipeline exit codes in 60-69 range", () => {
      expect(getExitCode(ErrorCode.STEP_INIT_FAILED)).toBe(60);
      expect(getExitCode(ErrorCode.STEP_FAILED)).toBe(61);
      expect(getExitCode(ErrorCode.BUILD_IN_PROGRESS)).toBe(62);
    });

    it("returns 1 for internal and unknown codes", () => {
      expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(1);
      expect(getExitCode("NOT_A_CODE")).toBe(1);
      expect(isErrorCode("NOT_A_CODE")).toBe(false);
    });
  });

  describe("error categories", () => {
    it("categorizes by prefix", () => {
      expect(getErrorCategory(ErrorCode.CONFIG_INVALID)).toBe("config");
      expect(getErrorCategory(ErrorCode.THEME_NOT_FOUND)).toBe("theme");
      expect(getErrorCategory(ErrorCode.DATA_PARSE_FAILED)).toBe("content");
      expect(getErrorCategory(ErrorCode.GENERATOR_FAILED)).toBe("content");
      expect(getErrorCategory(ErrorCode.RENDERER_NOT_SET)).toBe("render");
      expect(getErrorCategory(ErrorCode.OUTPUT_WRITE_FAILED)).toBe("output");
      expect(getErrorCategory(ErrorCode.BUILD_IN_PROGRESS)).toBe("pipeline");
      expect(getErrorCategory(ErrorCode.FS_NOT_FOUND)).toBe("fs");
      expect(getErrorCategory(ErrorCode.INTERNAL_ERROR)).toBe("internal");
    });
  });
});

// =============================================================================
// BuildError Tests
// =============================================================================

describe("BuildError", () => {
  it("carries code, message, details and hint", () => {
    const error = new BuildError(
      "Theme not found",
      ErrorCode.THEME_NOT_FOUND,
      { theme: "base" },
      "Create themes/base"
    );

    expect(error.message).toBe("Theme not found");
    expect(error.code).toBe("THEME_NOT_FOUND");
    expect(error.details).toEqual({ theme: "base" });
    expect(error.hint).toBe("Create themes/base");
    expect(error.isOperational).toBe(true);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("extends Error properly", () => {
    const error = new BuildError("Test", ErrorCode.INTERNAL_ERROR);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("BuildError");
    expect(error.stack).toBeDefined();
  });

  it("reports the innermost code of a chain", () => {
    const inner = new BuildError("Duplicate page id", ErrorCode.CONTENT_DUPLICATE_ID);
    const outer = new BuildError("Step failed", ErrorCode.STEP_FAILED, undefined, undefined, inner);

    expect(innermostCode(outer)).toBe("CONTENT_DUPLICATE_ID");
    expect(innermostCode(new Error("plain"))).toBeUndefined();
  });

  it("wraps thrown values", () => {
    expect(toError("boom").message).toBe("boom");
    expect(toError(new TypeError("bad")).message).toBe("bad");
  });
});

// =============================================================================
// ErrorPresenter Tests
// =============================================================================

describe("ErrorPresenter", () => {
  describe("formatError", () => {
    it("formats code, details and hint", () => {
      const error = new BuildError(
        "Page not found",
        ErrorCode.CONTENT_NOT_FOUND,
        { pagePath: "missing.md", candidates: ["pages/missing.md", "pages/missing.html"] },
        "Check the --page path."
      );

      expect(formatError(error)).toBe(
        [
          "Error [CONTENT_NOT_FOUND]: Page not found",
          "",
          "Page Path: missing.md",
          "Candidates:",
          "  - pages/missing.md",
          "  - pages/missing.html",
          "",
          "Hint:",
          "  Check the --page path.",
        ].join("\n")
      );
    });

    it("does not include stack trace by default", () => {
      const error = new BuildError("Failed", ErrorCode.STEP_FAILED, undefined, undefined, new Error("inner"));

      const output = formatError(error);

      expect(output).not.toContain("Stack trace:");
      expect(output).not.toContain("Caused by:");
    });

    it("includes stack trace and cause chain in debug mode", () => {
      const root = new Error("disk full");
      const inner = new BuildError("Write failed", ErrorCode.OUTPUT_WRITE_FAILED, undefined, undefined, root);
      const outer = new BuildError('Step "Saving pages" failed', ErrorCode.STEP_FAILED, undefined, undefined, inner);

      const output = formatError(outer, { debug: true });

      expect(output).toContain("Stack trace:");
      expect(output).toContain("Caused by:\n  Write failed");
      expect(output).toContain("Caused by:\n  disk full");
    });

    it("wraps unknown errors as INTERNAL_ERROR", () => {
      expect(formatError(new Error("Something broke"))).toBe("Error [INTERNAL_ERROR]: Something broke");
      expect(formatError("string error")).toBe("Error [INTERNAL_ERROR]: string error");
    });
  });

  describe("exitCodeFor", () => {
    it("uses the innermost code", () => {
      const inner = new BuildError("Theme not found", ErrorCode.THEME_NOT_FOUND);
      const outer = new BuildError("Step failed", ErrorCode.STEP_FAILED, undefined, undefined, inner);

      expect(exitCodeFor(outer)).toBe(20);
      expect(exitCodeFor(new Error("x"))).toBe(1);
    });
  });

  describe("ErrorPresenter class", () => {
    it("writes every line and returns the exit code", () => {
      const lines: string[] = [];
      const presenter = new ErrorPresenter({ output: (line) => lines.push(line) });

      const code = presenter.present(new BuildError("Build in progress", ErrorCode.BUILD_IN_PROGRESS));

      expect(lines).toEqual(["Error [BUILD_IN_PROGRESS]: Build in progress"]);
      expect(code).toBe(62);
    });

    it("respects debug option", () => {
      const lines: string[] = [];
      const presenter = new ErrorPresenter({ output: (line) => lines.push(line), debug: true });

      presenter.present(new BuildError("x", ErrorCode.INTERNAL_ERROR));

      expect(lines).toContain("Stack trace:");
    });
  });
});
