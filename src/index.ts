/**
 * Quire: static site build engine.
 *
 * @module
 */

export { Builder, getVersion, type BuilderOptions } from "./core/build/Builder.js";
export { BuildContext, DEBUG_ENV_VAR, type BuildContextOptions } from "./core/build/BuildContext.js";
export {
  DEFAULT_BUILD_OPTIONS,
  resolveBuildOptions,
  type BuildOptions,
  type BuildOverrides,
} from "./core/build/BuildOptions.js";
export { AbstractStep, type Step, type StepConstructor } from "./core/build/Step.js";
export * from "./core/steps/index.js";

export { Config } from "./core/config/Config.js";
export { ConfigLoader, loadConfig, mergeConfig, CONFIG_FILENAMES } from "./core/config/ConfigLoader.js";
export type { SiteConfig, SiteConfigInput } from "./core/config/ConfigSchema.js";

export { Page, type PageInit, type PageKind } from "./core/content/Page.js";
export { PagesCollection, sortByDate } from "./core/content/PagesCollection.js";
export type { SourceFile, StaticFile } from "./core/content/files.js";
export { TaxonomiesCollection, Vocabulary, Term } from "./core/taxonomy/TaxonomiesCollection.js";
export { MenusCollection, Menu, type MenuEntryInit, type MenuNode } from "./core/menu/MenusCollection.js";

export { HandlebarsRenderer, type Renderer } from "./core/render/Renderer.js";
export { MarkdownConverter, type Converter } from "./core/convert/MarkdownConverter.js";
export { GeneratorRegistry, type Generator } from "./core/generate/Generator.js";
export { createDefaultGeneratorRegistry } from "./core/generate/defaults.js";

export { BuildError } from "./core/errors/errors.js";
export { ErrorCode, getExitCode } from "./core/errors/ErrorCode.js";
export {
  ContextualLogger,
  createLogger,
  NULL_SINK,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from "./core/logging/ContextualLogger.js";
export { BuildTrace, type TraceEntry } from "./core/observability/BuildTrace.js";
export {
  FALLBACK_VERSION,
  VersionResolver,
  initVersionResolver,
  resetVersionCache,
  type VersionResolution,
} from "./core/version/VersionResolver.js";
