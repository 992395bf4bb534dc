import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { BuildError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import type { SourceFile } from "../content/files.js";
import { isDirectory, resolveInside, toPosixPath } from "../utils/paths.js";

const PAGE_HINT = "The `page` option is a file path relative to the pages directory.";

/**
 * Lists the content files of the pages directory, or only the one named by
 * the `page` option. Without a pages directory the list is empty.
 */
export class PagesLoad extends AbstractStep {
  getName(): string {
    return "Loading pages";
  }

  async process(): Promise<void> {
    const pagesDir = this.config.pagesPath;
    const page = this.options.page;

    if (page !== "") {
      const absolutePath = await this.locatePage(pagesDir, page);
      this.context.setSourceFiles([
        { absolutePath, relativePath: toPosixPath(path.relative(pagesDir, absolutePath)) },
      ]);
      return;
    }

    if (!(await isDirectory(pagesDir))) {
      this.context.setSourceFiles([]);
      this.logger.debug("No pages directory", { path: pagesDir });
      return;
    }

    const patterns = this.config.pageExtensions.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, { cwd: pagesDir, onlyFiles: true });

    const sourceFiles: SourceFile[] = files.sort().map((relativePath) => ({
      absolutePath: path.join(pagesDir, relativePath),
      relativePath,
    }));

    this.context.setSourceFiles(sourceFiles);
    this.logger.info("Pages found", { count: sourceFiles.length });
  }

  /**
   * @throws BuildError CONTENT_NOT_FOUND unless `page` names a file inside
   * the pages directory
   */
  private async locatePage(pagesDir: string, page: string): Promise<string> {
    const notFound = new BuildError(`Page "${page}" not found`, ErrorCode.CONTENT_NOT_FOUND, { page, pagesDir }, PAGE_HINT);

    let absolutePath: string;
    try {
      absolutePath = resolveInside(pagesDir, page);
    } catch {
      throw notFound;
    }

    const stat = await fs.stat(absolutePath).catch(() => null);
    if (!stat?.isFile()) {
      throw notFound;
    }
    return absolutePath;
  }
}
