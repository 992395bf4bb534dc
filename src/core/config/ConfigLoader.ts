/**
 * Site configuration loader.
 *
 * Given a site root, the loader looks for the configuration in this order:
 * 1. the file passed explicitly (`--config`), which must exist
 * 2. `quire.yml`
 * 3. `quire.yaml`
 *
 * A site without any configuration file builds with the defaults.
 * Command-line overrides are merged over the file before validation.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { isRecord } from "../utils/guards.js";
import { pathExists } from "../utils/paths.js";
import { Config } from "./Config.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Configuration filenames in order of preference.
 */
export const CONFIG_FILENAMES = ["quire.yml", "quire.yaml"] as const;

// =============================================================================
// Types
// =============================================================================

export interface LoadConfigOptions {
  /** Site root directory */
  readonly sourceDir: string;

  /** Explicit configuration file, relative to sourceDir */
  readonly configFile?: string;

  /** Output directory, relative to sourceDir (default: `output.dir`) */
  readonly destinationDir?: string;

  /** Values merged over the file contents (deep for nested objects) */
  readonly overrides?: Record<string, unknown>;
}

// =============================================================================
// ConfigLoader Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const config = await new ConfigLoader().load({ sourceDir: "./my-site" });
 * console.log(config.baseurl);
 * ```
 */
export class ConfigLoader {
  /**
   * @throws BuildError CONFIG_NOT_FOUND, CONFIG_PARSE_FAILED or CONFIG_INVALID
   */
  async load(options: LoadConfigOptions): Promise<Config> {
    const sourceDir = path.resolve(options.sourceDir);
    const configPath = await this.findConfigFile(sourceDir, options.configFile);

    const raw = configPath ? await this.readConfigFile(configPath) : {};
    const merged = options.overrides ? mergeConfig(raw, options.overrides) : raw;

    const config = new Config(merged, configPath ?? undefined);
    config.setSourceDir(sourceDir);
    if (options.destinationDir !== undefined) {
      config.setDestinationDir(options.destinationDir);
    }
    return config;
  }

  private async findConfigFile(sourceDir: string, configFile?: string): Promise<string | null> {
    if (configFile !== undefined) {
      const explicitPath = path.resolve(sourceDir, configFile);
      if (!(await pathExists(explicitPath))) {
        throw new BuildError(
          "Configuration file not found",
          ErrorCode.CONFIG_NOT_FOUND,
          { configFile: explicitPath },
          `No file at ${explicitPath}. Check the --config path.`
        );
      }
      return explicitPath;
    }

    for (const filename of CONFIG_FILENAMES) {
      const candidatePath = path.join(sourceDir, filename);
      if (await pathExists(candidatePath)) {
        return candidatePath;
      }
    }
    return null;
  }

  private async readConfigFile(configPath: string): Promise<Record<string, unknown>> {
    const content = await fs.readFile(configPath, "utf-8");

    let parsed: unknown;
    try {
      parsed = parseYaml(content);
    } catch (error) {
      const cause = toError(error);
      const details: Record<string, unknown> = { configFile: configPath };
      if (error instanceof YAMLParseError) {
        details.line = error.linePos?.[0]?.line;
        details.column = error.linePos?.[0]?.col;
      }
      throw new BuildError(
        "Invalid YAML syntax in configuration",
        ErrorCode.CONFIG_PARSE_FAILED,
        details,
        `Failed to parse ${path.basename(configPath)}: ${cause.message}`,
        cause
      );
    }

    // An empty document parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new BuildError(
        "Invalid site configuration",
        ErrorCode.CONFIG_INVALID,
        { configFile: configPath, issues: ["(root): Expected a mapping of settings"] },
        `${path.basename(configPath)} must contain key/value settings at the top level.`
      );
    }
    return parsed;
  }
}

/**
 * Loads the site configuration with a fresh {@link ConfigLoader}.
 */
export function loadConfig(options: LoadConfigOptions): Promise<Config> {
  return new ConfigLoader().load(options);
}

/**
 * Deep-merges `override` onto `base`. Plain objects merge key by key;
 * every other value (arrays included) replaces the base value.
 */
export function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value;
  }
  return result;
}
