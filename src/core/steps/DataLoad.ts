import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { parse as parseYaml } from "yaml";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import { isDirectory } from "../utils/paths.js";

/**
 * Parses YAML and JSON files of the data directory. A file is keyed by its
 * path without extension: `data/authors/main.yml` is `authors/main`. With
 * `data.load` off, or without a data directory, the data is empty.
 */
export class DataLoad extends AbstractStep {
  getName(): string {
    return "Loading data";
  }

  async process(): Promise<void> {
    const dataDir = this.config.dataPath;
    const data = new Map<string, unknown>();

    if (!this.config.loadData || !(await isDirectory(dataDir))) {
      this.context.setData(data);
      return;
    }

    const files = await fg("**/*.{yml,yaml,json}", { cwd: dataDir, onlyFiles: true });

    for (const file of files.sort()) {
      const content = await fs.readFile(path.join(dataDir, file), "utf-8");
      const extension = path.extname(file);
      const key = file.slice(0, file.length - extension.length);

      try {
        data.set(key, extension === ".json" ? JSON.parse(content) : parseYaml(content));
      } catch (error) {
        const cause = toError(error);
        throw new BuildError(
          `Failed to parse data file ${file}`,
          ErrorCode.DATA_PARSE_FAILED,
          { file, reason: cause.message },
          undefined,
          cause
        );
      }
    }

    this.context.setData(data);
    this.logger.info("Data files loaded", { count: data.size });
  }
}
