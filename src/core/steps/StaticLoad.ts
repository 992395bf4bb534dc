import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { AbstractStep } from "../build/Step.js";
import type { StaticFile } from "../content/files.js";
import { isDirectory } from "../utils/paths.js";

/**
 * Collects the files of the site's static directory and of each theme's
 * `static/` directory. The site wins over themes, and a theme over the ones
 * listed after it. With `static.load` off the list is empty.
 */
export class StaticLoad extends AbstractStep {
  getName(): string {
    return "Loading static files";
  }

  async process(): Promise<void> {
    const files = new Map<string, StaticFile>();
    const exclude = this.config.staticOptions.exclude;

    if (!this.config.staticOptions.load) {
      this.context.setStaticFiles(files);
      return;
    }

    const sources: { dir: string; theme?: string }[] = this.context
      .getThemeDirs()
      .map((dir) => ({ dir: path.join(dir, "static"), theme: path.basename(dir) }))
      .reverse();
    sources.push({ dir: this.config.staticPath });

    for (const source of sources) {
      if (!(await isDirectory(source.dir))) {
        continue;
      }
      const entries = await fg("**/*", { cwd: source.dir, onlyFiles: true, dot: false, ignore: exclude });
      for (const outputPath of entries.sort()) {
        const sourcePath = path.join(source.dir, outputPath);
        const stat = await fs.stat(sourcePath);
        files.set(outputPath, { sourcePath, outputPath, size: stat.size, theme: source.theme });
      }
    }

    this.context.setStaticFiles(files);
    this.logger.info("Static files found", { count: files.size });
  }
}
