import type { Config } from "../../config/Config.js";
import { Page } from "../../content/Page.js";
import { sortByDate } from "../../content/PagesCollection.js";
import { humanize, languagePrefix } from "../../content/language.js";
import type { BuildContext } from "../../build/BuildContext.js";
import type { Generator } from "../Generator.js";

/**
 * Lists the pages of each section (first path segment). A section page
 * written by hand (`blog/_index.md`) is reused; otherwise a virtual one is
 * created.
 */
export class SectionGenerator implements Generator {
  readonly name = "section";
  readonly priority = 10;

  isEnabled(config: Config): boolean {
    return config.generators.section;
  }

  generate(context: BuildContext): Page[] {
    const pages = context.getPages();
    const defaultLanguage = context.getConfig().language;

    const groups = new Map<string, { section: string; language: string; members: Page[] }>();
    for (const page of pages) {
      if (page.kind !== "page" || page.section === "" || page.variables.exclude === true) {
        continue;
      }
      const id = languagePrefix(page.language, defaultLanguage) + page.section;
      const group = groups.get(id) ?? { section: page.section, language: page.language, members: [] };
      group.members.push(page);
      groups.set(id, group);
    }

    const generated: Page[] = [];
    for (const [id, group] of groups) {
      const existing = pages.get(id);
      if (existing && existing.kind !== "section") {
        context.logger.warn("Section page not generated: a content page has its id", { id });
        continue;
      }
      const sectionPage =
        existing ??
        new Page({
          id,
          kind: "section",
          path: id,
          language: group.language,
          section: group.section,
          variables: { title: humanize(group.section) },
        });
      sectionPage.pageIds = sortByDate(group.members).map((page) => page.id);
      generated.push(sectionPage);
    }
    return generated;
  }
}
