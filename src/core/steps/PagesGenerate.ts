import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import type { Page } from "../content/Page.js";
import type { Generator } from "../generate/Generator.js";

/**
 * Runs the enabled generators by priority. Each generated page is added to
 * the pages collection or replaces the page with the same id, so a later
 * generator sees the pages of the earlier ones.
 */
export class PagesGenerate extends AbstractStep {
  getName(): string {
    return "Generating pages";
  }

  canProcess(): boolean {
    return this.enabledGenerators().length > 0;
  }

  async process(): Promise<void> {
    const pages = this.context.getPages();

    for (const generator of this.enabledGenerators()) {
      let generated: Page[];
      try {
        generated = await generator.generate(this.context);
      } catch (error) {
        if (error instanceof BuildError) {
          throw error;
        }
        const cause = toError(error);
        throw new BuildError(
          `Generator "${generator.name}" failed`,
          ErrorCode.GENERATOR_FAILED,
          { generator: generator.name, reason: cause.message },
          undefined,
          cause
        );
      }

      for (const page of generated) {
        pages.upsert(page);
      }
      this.logger.debug("Generator done", { generator: generator.name, count: generated.length });
    }
  }

  private enabledGenerators(): Generator[] {
    return this.context.generators.list().filter((generator) => generator.isEnabled(this.config));
  }
}
