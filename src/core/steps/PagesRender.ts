/**
 * "Rendering pages": applies layouts to every page.
 *
 * Layouts come from the site's `layouts/` directory, then from each theme's
 * `layouts/`. Pages whose output is already set (redirects, the sitemap)
 * are left as they are.
 *
 * Templates receive plain data:
 *
 * - `site`: the configuration, plus `data` (loaded data files)
 * - `page`: front matter merged with `id`, `kind`, `title`, `url`, `date`,
 *   `language`, `section` and `content` (the HTML body)
 * - `pages`: the pages listed by this page (sections, terms, home)
 * - `menus`: menu trees of the page's language, by menu name
 * - `taxonomies`: terms of every vocabulary, by vocabulary name
 *
 * @module
 */

import * as path from "node:path";
import { AbstractStep } from "../build/Step.js";
import type { Page } from "../content/Page.js";
import { HandlebarsRenderer } from "../render/Renderer.js";

export class PagesRender extends AbstractStep {
  getName(): string {
    return "Rendering pages";
  }

  async process(): Promise<void> {
    const layoutDirs = [
      this.config.layoutsPath,
      ...this.context.getThemeDirs().map((dir) => path.join(dir, "layouts")),
    ];
    const renderer = await HandlebarsRenderer.load({ layoutDirs, baseurl: this.config.baseurl });
    this.context.setRenderer(renderer);
    this.logger.debug("Layouts loaded", { templates: renderer.templateNames() });

    const pages = this.context.getPages();
    const site = {
      ...this.config.toJSON(),
      data: Object.fromEntries(this.context.getData()),
    };
    const taxonomies = this.taxonomiesData();

    let rendered = 0;
    for (const page of pages) {
      if (page.rendered !== null) {
        continue;
      }
      page.rendered = renderer.render(page, {
        site,
        page: { ...pageData(page), content: page.html },
        pages: pages.resolve(page.pageIds).map(pageData),
        menus: this.context.getMenus(page.language)?.toTrees() ?? {},
        taxonomies,
      });
      rendered += 1;
    }

    this.logger.info("Pages rendered", { count: rendered });
  }

  private taxonomiesData(): Record<string, { id: string; name: string; url: string; count: number }[]> {
    const data: Record<string, { id: string; name: string; url: string; count: number }[]> = {};
    for (const vocabulary of this.context.getTaxonomies()) {
      data[vocabulary.plural] = vocabulary.getTerms().map((term) => ({
        id: term.id,
        name: term.name,
        url: `/${vocabulary.plural}/${term.id}/`,
        count: term.pageIds.length,
      }));
    }
    return data;
  }
}

/**
 * Template view of a page, without its body.
 */
function pageData(page: Page): Record<string, unknown> {
  return {
    ...page.variables,
    id: page.id,
    kind: page.kind,
    title: page.title,
    url: page.url,
    path: page.path,
    date: page.date,
    language: page.language,
    section: page.section,
    summary: typeof page.variables.summary === "string" ? page.variables.summary : "",
  };
}
