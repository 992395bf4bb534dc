import type { Config } from "../../config/Config.js";
import { Page } from "../../content/Page.js";
import { sortByDate } from "../../content/PagesCollection.js";
import { humanize } from "../../content/language.js";
import type { BuildContext } from "../../build/BuildContext.js";
import type { Generator } from "../Generator.js";

/**
 * One page per vocabulary (`/tags/`) listing its terms, and one page per
 * term (`/tags/typescript/`) listing the tagged pages. A content page
 * holding one of these ids is kept and the generated page dropped.
 */
export class TaxonomyGenerator implements Generator {
  readonly name = "taxonomy";
  readonly priority = 20;

  isEnabled(config: Config): boolean {
    return config.generators.taxonomy;
  }

  generate(context: BuildContext): Page[] {
    const pages = context.getPages();
    const language = context.getConfig().language;
    const generated: Page[] = [];

    for (const vocabulary of context.getTaxonomies()) {
      const terms = vocabulary.getTerms();
      if (terms.length === 0) {
        continue;
      }

      generated.push(
        new Page({
          id: vocabulary.plural,
          kind: "vocabulary",
          path: vocabulary.plural,
          language,
          section: vocabulary.plural,
          variables: {
            title: humanize(vocabulary.plural),
            singular: vocabulary.singular,
            terms: terms.map((term) => ({
              id: term.id,
              name: term.name,
              url: `/${vocabulary.plural}/${term.id}/`,
              count: pages.resolve(term.pageIds).length,
            })),
          },
        })
      );

      for (const term of terms) {
        const termPage = new Page({
          id: `${vocabulary.plural}/${term.id}`,
          kind: "term",
          path: `${vocabulary.plural}/${term.id}`,
          language,
          section: vocabulary.plural,
          variables: { title: term.name, vocabulary: vocabulary.plural },
        });
        termPage.pageIds = sortByDate(pages.resolve(term.pageIds)).map((page) => page.id);
        generated.push(termPage);
      }
    }

    return generated.filter((generatedPage) => {
      const existing = pages.get(generatedPage.id);
      if (existing && !existing.virtual) {
        context.logger.warn("Taxonomy page not generated: a content page has its id", {
          id: generatedPage.id,
          file: existing.sourceFile?.relativePath,
        });
        return false;
      }
      return true;
    });
  }
}
