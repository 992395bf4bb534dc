import { AbstractStep } from "../build/Step.js";
import { TaxonomiesCollection, Vocabulary } from "../taxonomy/TaxonomiesCollection.js";
import { toStringList } from "../utils/guards.js";

/**
 * Builds one vocabulary per configured taxonomy from the pages' front
 * matter (`tags: [a, b]`). Rebuilt from scratch every build.
 */
export class TaxonomiesCreate extends AbstractStep {
  getName(): string {
    return "Creating taxonomies";
  }

  canProcess(): boolean {
    return Object.keys(this.config.taxonomies).length > 0;
  }

  async process(): Promise<void> {
    const taxonomies = new TaxonomiesCollection();

    for (const [plural, singular] of Object.entries(this.config.taxonomies)) {
      const vocabulary = new Vocabulary(plural, singular);
      for (const page of this.context.getPages()) {
        if (page.kind !== "page") {
          continue;
        }
        for (const termName of toStringList(page.variables[plural])) {
          if (!vocabulary.addTerm(termName, page.id)) {
            this.logger.warn("Term ignored: its name has no letters or digits", {
              vocabulary: plural,
              term: termName,
              page: page.id,
            });
          }
        }
      }
      taxonomies.add(vocabulary);
      this.logger.debug("Vocabulary created", { vocabulary: plural, terms: vocabulary.size });
    }

    this.context.setTaxonomies(taxonomies);
  }
}
