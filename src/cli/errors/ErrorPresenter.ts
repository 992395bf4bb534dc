/**
 * Error presentation for CLI output.
 *
 * Renders build failures as `Error [CODE]: message`, then details, hint,
 * and in debug mode the stack and the cause chain. Stack traces are never
 * shown by default.
 *
 * @module
 */

import { BuildError, innermostCode } from "../../core/errors/errors.js";
import { ErrorCode, getExitCode } from "../../core/errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface FormatErrorOptions {
  /** Include stack traces and cause chain (default: false) */
  debug?: boolean;
}

export interface ErrorPresenterOptions {
  /** Output function (default: console.error) */
  output?: (line: string) => void;
  /** Include stack traces and cause chain */
  debug?: boolean;
}

// =============================================================================
// ErrorPresenter Class
// =============================================================================

export class ErrorPresenter {
  private readonly output: (line: string) => void;
  private readonly debug: boolean;

  constructor(options: ErrorPresenterOptions = {}) {
    this.output = options.output ?? console.error;
    this.debug = options.debug ?? false;
  }

  /**
   * Prints the error and returns the process exit code for it.
   */
  present(error: unknown): number {
    for (const line of formatError(error, { debug: this.debug }).split("\n")) {
      this.output(line);
    }
    return exitCodeFor(error);
  }
}

// =============================================================================
// Format Functions
// =============================================================================

/**
 * Formats an error for CLI output. Anything that is not a BuildError is
 * reported as INTERNAL_ERROR.
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const { debug = false } = options;
  const buildError = normalizeError(error);
  const lines: string[] = [];

  lines.push(`Error [${buildError.code}]: ${buildError.message}`);
  lines.push("");

  if (buildError.details) {
    const detailLines = formatDetails(buildError.details);
    if (detailLines.length > 0) {
      lines.push(...detailLines, "");
    }
  }

  if (buildError.hint) {
    lines.push("Hint:");
    for (const hintLine of buildError.hint.split("\n")) {
      lines.push(`  ${hintLine}`);
    }
    lines.push("");
  }

  if (debug) {
    if (buildError.stack) {
      lines.push("Stack trace:", ...buildError.stack.split("\n").slice(1), "");
    }

    let cause = buildError.cause;
    while (cause) {
      lines.push("Caused by:", `  ${cause.message}`);
      if (cause.stack) {
        lines.push(...cause.stack.split("\n").slice(1));
      }
      lines.push("");
      cause = cause instanceof BuildError ? cause.cause : undefined;
    }
  }

  return lines.join("\n").trimEnd();
}

/**
 * Exit code of the most specific code in the error chain; 1 for anything
 * that is not a BuildError.
 */
export function exitCodeFor(error: unknown): number {
  const code = innermostCode(error);
  return code === undefined ? 1 : getExitCode(code);
}

function normalizeError(error: unknown): BuildError {
  if (error instanceof BuildError) {
    return error;
  }

  if (error instanceof Error) {
    const internal = new BuildError(
      error.message,
      ErrorCode.INTERNAL_ERROR,
      undefined,
      undefined,
      error,
      false
    );
    internal.stack = error.stack;
    return internal;
  }

  return new BuildError(String(error), ErrorCode.INTERNAL_ERROR, undefined, undefined, undefined, false);
}

function formatDetails(details: Record<string, unknown>): string[] {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      if (value.length > 0) {
        lines.push(`${formatKey(key)}:`);
        for (const item of value) {
          lines.push(`  - ${String(item)}`);
        }
      }
    } else if (typeof value === "object" && value !== null) {
      lines.push(`${formatKey(key)}: ${JSON.stringify(value)}`);
    } else {
      lines.push(`${formatKey(key)}: ${String(value)}`);
    }
  }

  return lines;
}

/**
 * camelCase to Title Case: `stepIndex` -> `Step Index`.
 */
function formatKey(key: string): string {
  return key
    .replace(/([A-Z])/g, " $1")
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
