/**
 * Shared build state.
 *
 * One BuildContext lives as long as its Builder and is handed, by reference,
 * to every step of every build. Steps communicate only through it: each
 * collection is filled by an early step and read by the later ones.
 *
 * The context never clears anything on its own between builds. The loading
 * steps own that policy: "Creating pages" starts a fresh pages collection,
 * the load steps replace source files, data and static files, and the
 * taxonomy and menu steps rebuild their collections from the pages.
 *
 * @module
 */

import { BuildError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { Config } from "../config/Config.js";
import type { SourceFile, StaticFile } from "../content/files.js";
import { PagesCollection } from "../content/PagesCollection.js";
import { TaxonomiesCollection } from "../taxonomy/TaxonomiesCollection.js";
import type { MenusCollection } from "../menu/MenusCollection.js";
import type { Renderer } from "../render/Renderer.js";
import type { GeneratorRegistry } from "../generate/Generator.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";

/**
 * Environment variable that forces debug mode.
 */
export const DEBUG_ENV_VAR = "QUIRE_DEBUG";

export interface BuildContextOptions {
  readonly config: Config;
  readonly logger: ContextualLogger;
  readonly generators: GeneratorRegistry;

  /** Environment used to resolve debug mode (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
}

export class BuildContext {
  readonly logger: ContextualLogger;
  readonly generators: GeneratorRegistry;

  /** Resolved once from QUIRE_DEBUG or the `debug` setting */
  readonly debugEnabled: boolean;

  private config: Config;
  private configLocked = false;
  private sourceFiles: SourceFile[] = [];
  private data = new Map<string, unknown>();
  private staticFiles = new Map<string, StaticFile>();
  private pages = new PagesCollection();
  private menus = new Map<string, MenusCollection>();
  private taxonomies = new TaxonomiesCollection();
  private renderer: Renderer | undefined;
  private themeDirs: string[] = [];

  constructor(options: BuildContextOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.generators = options.generators;

    const env = options.env ?? process.env;
    this.debugEnabled = env[DEBUG_ENV_VAR] === "true" || options.config.isDebug;
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  getConfig(): Config {
    return this.config;
  }

  /**
   * Replaces the configuration. Only allowed before the first build.
   *
   * @throws BuildError CONFIG_LOCKED once a build has started
   */
  setConfig(config: Config): void {
    if (this.configLocked) {
      throw new BuildError(
        "Configuration cannot change after the first build",
        ErrorCode.CONFIG_LOCKED,
        undefined,
        "Create a new Builder to build with a different configuration."
      );
    }
    this.config = config;
  }

  /**
   * Freezes the configuration; called by the Builder when a build starts.
   */
  lockConfig(): void {
    this.configLocked = true;
  }

  isConfigLocked(): boolean {
    return this.configLocked;
  }

  // ===========================================================================
  // Collections
  // ===========================================================================

  getSourceFiles(): readonly SourceFile[] {
    return this.sourceFiles;
  }

  setSourceFiles(files: SourceFile[]): void {
    this.sourceFiles = files;
  }

  getData(): Map<string, unknown> {
    return this.data;
  }

  setData(data: Map<string, unknown>): void {
    this.data = data;
  }

  getStaticFiles(): Map<string, StaticFile> {
    return this.staticFiles;
  }

  setStaticFiles(files: Map<string, StaticFile>): void {
    this.staticFiles = files;
  }

  getPages(): PagesCollection {
    return this.pages;
  }

  setPages(pages: PagesCollection): void {
    this.pages = pages;
  }

  /**
   * Menus of one language, if any were built for it.
   */
  getMenus(language: string): MenusCollection | undefined {
    return this.menus.get(language);
  }

  getAllMenus(): Map<string, MenusCollection> {
    return this.menus;
  }

  setMenus(menus: Map<string, MenusCollection>): void {
    this.menus = menus;
  }

  getTaxonomies(): TaxonomiesCollection {
    return this.taxonomies;
  }

  setTaxonomies(taxonomies: TaxonomiesCollection): void {
    this.taxonomies = taxonomies;
  }

  /**
   * @throws BuildError RENDERER_NOT_SET before a render step has run
   */
  getRenderer(): Renderer {
    if (this.renderer === undefined) {
      throw new BuildError(
        "No renderer has been set",
        ErrorCode.RENDERER_NOT_SET,
        undefined,
        "The renderer is created by the \"Rendering pages\" step; read it only after that step."
      );
    }
    return this.renderer;
  }

  hasRenderer(): boolean {
    return this.renderer !== undefined;
  }

  setRenderer(renderer: Renderer): void {
    this.renderer = renderer;
  }

  /**
   * Directories of the active themes, highest priority first.
   */
  getThemeDirs(): readonly string[] {
    return this.themeDirs;
  }

  setThemeDirs(dirs: string[]): void {
    this.themeDirs = dirs;
  }
}
