import * as fs from "node:fs/promises";
import { minify } from "html-minifier-terser";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import { formatBytes } from "../utils/format.js";
import { resolveInside } from "../utils/paths.js";

const MINIFY_OPTIONS = {
  collapseWhitespace: true,
  conservativeCollapse: true,
  removeComments: true,
  minifyCSS: true,
  minifyJS: true,
};

/**
 * Minifies the saved HTML pages in place.
 */
export class HtmlOptimize extends AbstractStep {
  getName(): string {
    return "Optimizing HTML";
  }

  canProcess(): boolean {
    const { enabled, html } = this.config.optimize;
    return !this.isDryRun && enabled && html;
  }

  async process(): Promise<void> {
    const destination = this.config.destinationDir;
    let files = 0;
    let saved = 0;

    for (const page of this.context.getPages()) {
      if (!page.outputPath.endsWith(".html")) {
        continue;
      }
      const filePath = resolveInside(destination, page.outputPath);
      try {
        const original = await fs.readFile(filePath, "utf-8");
        const minified = await minify(original, MINIFY_OPTIONS);
        await fs.writeFile(filePath, minified);
        saved += Buffer.byteLength(original) - Buffer.byteLength(minified);
        files += 1;
      } catch (error) {
        const cause = toError(error);
        throw new BuildError(
          `Failed to optimize ${page.outputPath}`,
          ErrorCode.OUTPUT_OPTIMIZE_FAILED,
          { file: filePath, reason: cause.message },
          undefined,
          cause
        );
      }
    }

    this.logger.info("HTML optimized", { files, saved: formatBytes(saved) });
  }
}
