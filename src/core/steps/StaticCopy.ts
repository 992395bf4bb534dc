import * as fs from "node:fs/promises";
import * as path from "node:path";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import { settleAll } from "../utils/async.js";
import { resolveInside } from "../utils/paths.js";

/**
 * Copies the collected static files into the destination directory.
 */
export class StaticCopy extends AbstractStep {
  getName(): string {
    return "Copying static files";
  }

  canProcess(): boolean {
    return !this.isDryRun && this.config.staticOptions.load;
  }

  async process(): Promise<void> {
    const destination = this.config.destinationDir;
    const copies = [...this.context.getStaticFiles().values()].map((file) => ({
      file,
      target: resolveInside(destination, file.outputPath),
    }));

    await settleAll(
      copies.map(async ({ file, target }) => {
        try {
          await fs.mkdir(path.dirname(target), { recursive: true });
          await fs.copyFile(file.sourcePath, target);
        } catch (error) {
          const cause = toError(error);
          throw new BuildError(
            `Failed to copy ${file.outputPath}`,
            ErrorCode.OUTPUT_WRITE_FAILED,
            { source: file.sourcePath, target, reason: cause.message },
            undefined,
            cause
          );
        }
      })
    );

    this.logger.info("Static files copied", { count: copies.length });
  }
}
