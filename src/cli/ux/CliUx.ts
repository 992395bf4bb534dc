/**
 * Human-readable terminal output for the `quire` CLI.
 *
 * - Color-coded output (success/error/warning), disabled without a TTY
 * - Output levels (silent, info, verbose, debug)
 * - `[i/n]` step progress lines
 *
 * @module
 */

import pc from "picocolors";

// =============================================================================
// Types
// =============================================================================

/**
 * Output levels from least to most verbose.
 */
export type UxLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: UxLevel;

  /** Whether to use colors (auto-detected from TTY if not specified) */
  readonly colors?: boolean;

  /** Custom stdout writer (for testing) */
  readonly stdout?: (msg: string) => void;

  /** Custom stderr writer (for testing) */
  readonly stderr?: (msg: string) => void;
}

export interface SuccessDetails {
  readonly [key: string]: unknown;
}

export interface ErrorDetails {
  readonly code?: string;
  readonly hint?: string;
}

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<UxLevel, number> = {
  silent: 0,
  info: 1,
  verbose: 2,
  debug: 3,
};

const SYMBOLS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "→",
};

// =============================================================================
// CliUx Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 *
 * ux.step(2, 9, "Loading pages");
 * ux.success("Built in 0.42 s (3.1 MB)");
 * ux.error("Theme \"docs\" not found", { code: "THEME_NOT_FOUND" });
 * ```
 */
export class CliUx {
  private readonly level: UxLevel;
  private readonly useColors: boolean;
  private readonly writeStdout: (msg: string) => void;
  private readonly writeStderr: (msg: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.writeStdout = options.stdout ?? ((msg) => process.stdout.write(msg));
    this.writeStderr = options.stderr ?? ((msg) => process.stderr.write(msg));
  }

  getLevel(): UxLevel {
    return this.level;
  }

  canLog(level: UxLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  // ===========================================================================
  // Color helpers
  // ===========================================================================

  private paint(color: (text: string) => string, text: string): string {
    return this.useColors ? color(text) : text;
  }

  // ===========================================================================
  // Output methods
  // ===========================================================================

  success(message: string, details?: SuccessDetails): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.green, SYMBOLS.success)} ${message}\n`);

    if (details) {
      for (const [key, value] of Object.entries(details)) {
        this.writeStdout(`  ${this.paint(pc.dim, key + ":")} ${String(value)}\n`);
      }
    }
  }

  /**
   * Always shown, whatever the level.
   */
  error(message: string, details?: ErrorDetails): void {
    const code = details?.code ? `${this.paint(pc.red, details.code)}: ` : "";
    this.writeStderr(`${this.paint(pc.red, SYMBOLS.error)} ${code}${message}\n`);

    if (details?.hint) {
      this.writeStderr(`  ${this.paint(pc.dim, "Hint:")} ${details.hint}\n`);
    }
  }

  warn(message: string): void {
    if (!this.canLog("info")) return;

    this.writeStderr(`${this.paint(pc.yellow, SYMBOLS.warning)} ${message}\n`);
  }

  info(message: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.cyan, SYMBOLS.info)} ${message}\n`);
  }

  verbose(message: string): void {
    if (!this.canLog("verbose")) return;

    this.writeStdout(`  ${this.paint(pc.dim, message)}\n`);
  }

  debug(message: string): void {
    if (!this.canLog("debug")) return;

    this.writeStdout(`  ${this.paint(pc.dim, `[debug] ${message}`)}\n`);
  }

  /**
   * Numbered step line, e.g. `[3/9] Creating pages`.
   */
  step(current: number, total: number, description: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.dim, `[${current}/${total}]`)} ${description}\n`);
  }

  /**
   * Raw stdout line, shown from `level` up.
   */
  print(text: string, level: UxLevel = "info"): void {
    if (!this.canLog(level)) return;

    this.writeStdout(`${text}\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

// =============================================================================
// Level Parsing
// =============================================================================

export interface UxLevelFlags {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
}

/**
 * Output level from the global flags: `--debug` wins, then `--silent`,
 * then `--verbose`; `info` otherwise.
 */
export function parseUxLevel(flags: UxLevelFlags): UxLevel {
  if (flags.debug) {
    return "debug";
  }
  if (flags.silent) {
    return "silent";
  }
  if (flags.verbose) {
    return "verbose";
  }
  return "info";
}
