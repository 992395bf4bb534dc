/**
 * Resolved site configuration.
 *
 * Wraps a validated {@link SiteConfig} together with the source and
 * destination directories of the build. The orchestrator only reads
 * `baseurl` and `debug`; everything else is consumed by the steps.
 *
 * @module
 */

import * as path from "node:path";
import { BuildError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { isRecord } from "../utils/guards.js";
import {
  SiteConfigSchema,
  type LanguageConfig,
  type MenuEntryConfig,
  type SiteConfig,
  type SiteConfigInput,
} from "./ConfigSchema.js";

export class Config {
  private readonly values: SiteConfig;
  private sourceDirPath: string;
  private destinationDirPath: string | null = null;

  /**
   * @throws BuildError with CONFIG_INVALID when `input` fails validation
   */
  constructor(input: SiteConfigInput | Record<string, unknown> = {}, origin?: string) {
    this.values = Config.validate(input, origin);
    this.sourceDirPath = process.cwd();
  }

  private static validate(input: unknown, origin?: string): SiteConfig {
    const result = SiteConfigSchema.safeParse(input);
    if (result.success) {
      return result.data;
    }

    const issues = result.error.issues.map((issue) => {
      const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${fieldPath}: ${issue.message}`;
    });

    throw new BuildError(
      "Invalid site configuration",
      ErrorCode.CONFIG_INVALID,
      { file: origin, issues },
      `Fix the following in ${origin ?? "the configuration"}: ${issues.join("; ")}`
    );
  }

  // ===========================================================================
  // Generic access
  // ===========================================================================

  /**
   * Reads a value by dotted key, e.g. `get("optimize.html")`.
   * Returns undefined when any segment is missing.
   */
  get(key: string): unknown {
    let current: unknown = this.values;
    for (const segment of key.split(".")) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }

  /**
   * The whole resolved configuration, as exposed to templates.
   */
  toJSON(): SiteConfig {
    return this.values;
  }

  // ===========================================================================
  // Typed accessors
  // ===========================================================================

  get baseurl(): string {
    return this.values.baseurl;
  }

  get title(): string {
    return this.values.title;
  }

  get isDebug(): boolean {
    return this.values.debug;
  }

  /** Default language code */
  get language(): string {
    return this.values.language;
  }

  /**
   * Configured languages; the default language alone when none are listed.
   */
  get languages(): LanguageConfig[] {
    if (this.values.languages.length > 0) {
      return this.values.languages;
    }
    return [{ code: this.values.language, name: this.values.language }];
  }

  get themes(): string[] {
    return this.values.theme;
  }

  get pageExtensions(): string[] {
    return this.values.pages.ext;
  }

  get taxonomies(): Record<string, string> {
    return this.values.taxonomies;
  }

  get menus(): Record<string, MenuEntryConfig[]> {
    return this.values.menus;
  }

  get generators(): SiteConfig["generators"] {
    return this.values.generators;
  }

  get optimize(): SiteConfig["optimize"] {
    return this.values.optimize;
  }

  get staticOptions(): SiteConfig["static"] {
    return this.values.static;
  }

  get loadData(): boolean {
    return this.values.data.load;
  }

  // ===========================================================================
  // Directories
  // ===========================================================================

  /**
   * Sets the site root. `null` resets it to the working directory.
   */
  setSourceDir(dir: string | null): this {
    this.sourceDirPath = path.resolve(dir ?? process.cwd());
    return this;
  }

  /**
   * Sets the output directory, relative to the source directory.
   * `null` resets it to `<sourceDir>/<output.dir>`.
   */
  setDestinationDir(dir: string | null): this {
    this.destinationDirPath = dir === null ? null : path.resolve(this.sourceDirPath, dir);
    return this;
  }

  get sourceDir(): string {
    return this.sourceDirPath;
  }

  get destinationDir(): string {
    return this.destinationDirPath ?? path.resolve(this.sourceDirPath, this.values.output.dir);
  }

  get pagesPath(): string {
    return path.resolve(this.sourceDirPath, this.values.pages.dir);
  }

  get dataPath(): string {
    return path.resolve(this.sourceDirPath, this.values.data.dir);
  }

  get staticPath(): string {
    return path.resolve(this.sourceDirPath, this.values.static.dir);
  }

  get layoutsPath(): string {
    return path.resolve(this.sourceDirPath, this.values.layouts.dir);
  }

  get themesPath(): string {
    return path.resolve(this.sourceDirPath, this.values.themes.dir);
  }

  /**
   * Directory of one theme.
   */
  themePath(name: string): string {
    return path.join(this.themesPath, name);
  }
}
