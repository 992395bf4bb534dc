import { AbstractStep } from "../build/Step.js";
import { settleAll } from "../utils/async.js";
import { resolveInside, writeFileEnsuringDir } from "../utils/paths.js";

/**
 * Writes every rendered page to the destination directory.
 */
export class PagesSave extends AbstractStep {
  getName(): string {
    return "Saving pages";
  }

  canProcess(): boolean {
    return !this.isDryRun;
  }

  async process(): Promise<void> {
    const destination = this.config.destinationDir;
    const targets: { filePath: string; content: string }[] = [];

    for (const page of this.context.getPages()) {
      if (page.rendered === null) {
        this.logger.warn("Page has no output", { page: page.id });
        continue;
      }
      targets.push({ filePath: resolveInside(destination, page.outputPath), content: page.rendered });
    }

    await settleAll(targets.map((target) => writeFileEnsuringDir(target.filePath, target.content)));
    this.logger.info("Pages saved", { count: targets.length, destination });
  }
}
