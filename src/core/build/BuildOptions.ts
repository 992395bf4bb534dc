/**
 * Build options resolution.
 *
 * Callers of `Builder.build()` pass a partial set of overrides; every step
 * receives the resolved, frozen result in `init()`. Keys the pipeline does
 * not recognize are passed through untouched so that a custom step can read
 * its own flags without the core knowing about them.
 *
 * @module
 */

/**
 * Resolved options for one build. The three recognized keys are always set.
 */
export interface BuildOptions {
  /** Include pages whose front matter has `draft: true` */
  readonly drafts: boolean;

  /** Run every transformation but persist nothing */
  readonly "dry-run": boolean;

  /** Restrict loading to this page (path relative to the pages directory) */
  readonly page: string;

  /** Step-specific flags, unvalidated */
  readonly [key: string]: unknown;
}

/**
 * Overrides accepted by `Builder.build()`.
 */
export interface BuildOverrides {
  drafts?: boolean;
  "dry-run"?: boolean;
  page?: string;
  [key: string]: unknown;
}

export const DEFAULT_BUILD_OPTIONS: BuildOptions = Object.freeze({
  drafts: false,
  "dry-run": false,
  page: "",
});

/**
 * Merges `overrides` onto the defaults. Keys set to `undefined` count as
 * absent. Never throws.
 *
 * @example
 * ```typescript
 * resolveBuildOptions({ drafts: true });
 * // { drafts: true, "dry-run": false, page: "" }
 * ```
 */
export function resolveBuildOptions(overrides: BuildOverrides = {}): BuildOptions {
  const passthrough: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      passthrough[key] = value;
    }
  }

  return Object.freeze({
    ...passthrough,
    drafts: overrides.drafts ?? DEFAULT_BUILD_OPTIONS.drafts,
    "dry-run": overrides["dry-run"] ?? DEFAULT_BUILD_OPTIONS["dry-run"],
    page: overrides.page ?? DEFAULT_BUILD_OPTIONS.page,
  });
}
