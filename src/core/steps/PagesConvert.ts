import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import { MarkdownConverter, type Converter } from "../convert/MarkdownConverter.js";

/**
 * Converts the Markdown body of every page with a source file to HTML.
 */
export class PagesConvert extends AbstractStep {
  private readonly converter: Converter = new MarkdownConverter();

  getName(): string {
    return "Converting pages";
  }

  async process(): Promise<void> {
    let converted = 0;

    for (const page of this.context.getPages()) {
      if (page.virtual) {
        continue;
      }
      try {
        page.html = await this.converter.convert(page.body);
      } catch (error) {
        const cause = toError(error);
        throw new BuildError(
          `Failed to convert page "${page.id}"`,
          ErrorCode.CONTENT_CONVERT_FAILED,
          { page: page.id, file: page.sourceFile?.relativePath, reason: cause.message },
          undefined,
          cause
        );
      }
      converted += 1;
    }

    this.logger.info("Pages converted", { count: converted });
  }
}
