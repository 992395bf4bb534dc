/**
 * Engine version lookup.
 *
 * The version is read once per process from a `VERSION` file shipped with
 * the package and cached. Where that file sits depends on how the code runs:
 *
 * - bundled by tsup, the module is `dist/<entry>.js` and the file is
 *   `dist/../VERSION`
 * - from sources (tests, per-file tsc output), the module is
 *   `src/core/version/VersionResolver.ts` and the file is three levels up
 *
 * A missing, unreadable or empty file yields {@link FALLBACK_VERSION}.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// Types
// =============================================================================

/**
 * Reads a text file; returns null when it cannot be read.
 */
export type VersionFileReader = (filePath: string) => string | null;

export interface VersionResolution {
  readonly version: string;
  readonly source: "file" | "fallback";

  /** File that was tried */
  readonly filePath: string;
}

export interface VersionResolverOptions {
  readonly reader?: VersionFileReader;
  readonly filePath?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const VERSION_FILENAME = "VERSION";

/**
 * Reported when no version file can be read.
 */
export const FALLBACK_VERSION = "0.1.x-dev";

const BUNDLE_DIR = "dist";

// =============================================================================
// Resolution
// =============================================================================

/**
 * Candidate version file for the module at `moduleUrl`.
 */
export function resolveVersionFilePath(moduleUrl: string = import.meta.url): string {
  const moduleDir = path.dirname(fileURLToPath(moduleUrl));

  if (path.basename(moduleDir) === BUNDLE_DIR) {
    return path.join(moduleDir, "..", VERSION_FILENAME);
  }
  return path.join(moduleDir, "..", "..", "..", VERSION_FILENAME);
}

const readFileOrNull: VersionFileReader = (filePath) => {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch {
    return null;
  }
};

/**
 * Computes the version once and returns the cached value afterwards.
 */
export class VersionResolver {
  private readonly reader: VersionFileReader;
  private readonly filePath: string;
  private cached: VersionResolution | null = null;

  constructor(options: VersionResolverOptions = {}) {
    this.reader = options.reader ?? readFileOrNull;
    this.filePath = options.filePath ?? resolveVersionFilePath();
  }

  resolve(): VersionResolution {
    if (this.cached === null) {
      const content = this.reader(this.filePath)?.trim() ?? "";
      this.cached =
        content.length > 0
          ? { version: content, source: "file", filePath: this.filePath }
          : { version: FALLBACK_VERSION, source: "fallback", filePath: this.filePath };
    }
    return this.cached;
  }

  getVersion(): string {
    return this.resolve().version;
  }
}

// =============================================================================
// Process-wide Instance
// =============================================================================

let instance: VersionResolver | null = null;

/**
 * Replaces the process-wide resolver. Tests use this to inject a reader.
 */
export function initVersionResolver(options: VersionResolverOptions = {}): VersionResolver {
  instance = new VersionResolver(options);
  return instance;
}

export function getVersionResolver(): VersionResolver {
  return instance ?? initVersionResolver();
}

/**
 * Version of the running engine.
 *
 * @example
 * ```typescript
 * console.log(`quire ${getVersion()}`);
 * ```
 */
export function getVersion(): string {
  return getVersionResolver().getVersion();
}

/**
 * Drops the cached version; the next `getVersion()` reads the file again.
 */
export function resetVersionCache(): void {
  instance = null;
}
