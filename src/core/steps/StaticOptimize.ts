import * as fs from "node:fs/promises";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import { settleAll } from "../utils/async.js";
import { formatBytes } from "../utils/format.js";
import { resolveInside } from "../utils/paths.js";

/**
 * Minifies copied static files of one type in place. Files already named
 * `*.min.<ext>` are left as they are.
 */
export abstract class StaticOptimize extends AbstractStep {
  /** Handled extension, with its dot */
  protected abstract readonly extension: string;

  /** Label used in log messages */
  protected abstract readonly label: string;

  /** The `optimize.<type>` switch */
  protected abstract isTypeEnabled(): boolean;

  protected abstract minify(source: string, outputPath: string): Promise<string>;

  canProcess(): boolean {
    return !this.isDryRun && this.config.optimize.enabled && this.config.staticOptions.load && this.isTypeEnabled();
  }

  async process(): Promise<void> {
    const destination = this.config.destinationDir;
    const targets = [...this.context.getStaticFiles().values()]
      .filter((file) => file.outputPath.endsWith(this.extension) && !file.outputPath.endsWith(`.min${this.extension}`))
      .map((file) => ({ outputPath: file.outputPath, filePath: resolveInside(destination, file.outputPath) }));

    const savings = await settleAll(targets.map((target) => this.optimizeFile(target.outputPath, target.filePath)));

    const saved = savings.reduce((sum, bytes) => sum + bytes, 0);
    this.logger.info(`${this.label} optimized`, { files: targets.length, saved: formatBytes(saved) });
  }

  private async optimizeFile(outputPath: string, filePath: string): Promise<number> {
    try {
      const original = await fs.readFile(filePath, "utf-8");
      const minified = await this.minify(original, outputPath);
      await fs.writeFile(filePath, minified);
      return Buffer.byteLength(original) - Buffer.byteLength(minified);
    } catch (error) {
      const cause = toError(error);
      throw new BuildError(
        `Failed to optimize ${outputPath}`,
        ErrorCode.OUTPUT_OPTIMIZE_FAILED,
        { file: filePath, reason: cause.message },
        undefined,
        cause
      );
    }
  }
}
