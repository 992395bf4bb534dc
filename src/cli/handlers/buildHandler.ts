/**
 * Handler for the `quire build` CLI command.
 *
 * Loads the site configuration, runs one build and reports the result.
 * Everything with side effects outside the build (configuration loading,
 * Builder creation) is injected so tests can run it against a temp site.
 *
 * @module
 */

import * as path from "node:path";
import { Builder, type BuilderOptions } from "../../core/build/Builder.js";
import type { BuildOverrides } from "../../core/build/BuildOptions.js";
import type { Config } from "../../core/config/Config.js";
import { loadConfig, type LoadConfigOptions } from "../../core/config/ConfigLoader.js";
import type { ContextualLogger } from "../../core/logging/ContextualLogger.js";
import type { BuildTrace } from "../../core/observability/BuildTrace.js";

// =============================================================================
// Types
// =============================================================================

export interface BuildInput {
  /** Site root (default: working directory) */
  readonly path?: string;
  readonly drafts?: boolean;
  readonly dryRun?: boolean;
  readonly page?: string;
  readonly destination?: string;
  readonly config?: string;
  readonly baseurl?: string;
}

export interface BuildResult {
  readonly sourceDir: string;
  readonly destinationDir: string;
  readonly dryRun: boolean;
  readonly pageCount: number;
  readonly staticFileCount: number;
  /** Per-step timings */
  readonly trace: BuildTrace | null;
}

export interface BuildDependencies {
  readonly logger: ContextualLogger;
  readonly loadConfig?: (options: LoadConfigOptions) => Promise<Config>;
  readonly createBuilder?: (options: BuilderOptions) => Builder;
  readonly cwd?: string;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * @throws BuildError from configuration loading or the build itself
 */
export async function handleBuild(input: BuildInput, deps: BuildDependencies): Promise<BuildResult> {
  const load = deps.loadConfig ?? loadConfig;
  const createBuilder = deps.createBuilder ?? Builder.create;
  const sourceDir = path.resolve(deps.cwd ?? process.cwd(), input.path ?? ".");

  const config = await load({
    sourceDir,
    configFile: input.config,
    destinationDir: input.destination,
    overrides: input.baseurl !== undefined ? { baseurl: input.baseurl } : undefined,
  });

  const builder = createBuilder({ config, logger: deps.logger });

  const overrides: BuildOverrides = {
    drafts: input.drafts,
    "dry-run": input.dryRun,
    page: input.page,
  };
  await builder.build(overrides);

  return {
    sourceDir: config.sourceDir,
    destinationDir: config.destinationDir,
    dryRun: builder.getBuildOptions()["dry-run"],
    pageCount: builder.context.getPages().size,
    staticFileCount: builder.context.getStaticFiles().size,
    trace: builder.getLastTrace(),
  };
}

/**
 * Summary lines printed after a successful build.
 */
export function formatBuildOutput(result: BuildResult): string[] {
  const lines = [
    `Pages: ${result.pageCount}`,
    `Static files: ${result.staticFileCount}`,
  ];
  lines.push(
    result.dryRun ? "Dry run: nothing was written" : `Output: ${result.destinationDir}`
  );
  return lines;
}
