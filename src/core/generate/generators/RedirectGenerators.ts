import Handlebars from "handlebars";
import type { Config } from "../../config/Config.js";
import { Page } from "../../content/Page.js";
import { toStringList } from "../../utils/guards.js";
import { slugifyPath } from "../../utils/slugify.js";
import type { BuildContext } from "../../build/BuildContext.js";
import type { Generator } from "../Generator.js";

/**
 * Minimal HTML document that sends the browser to `url`.
 */
export function redirectHtml(url: string): string {
  const target = Handlebars.Utils.escapeExpression(url);
  return (
    "<!DOCTYPE html>\n" +
    `<html><head><meta charset="utf-8"><title>${target}</title>` +
    `<link rel="canonical" href="${target}">` +
    `<meta http-equiv="refresh" content="0; url=${target}"></head></html>\n`
  );
}

/**
 * For every `aliases:` entry of a page, a redirect page at that path.
 * An alias colliding with an existing page id is skipped.
 */
export class AliasGenerator implements Generator {
  readonly name = "alias";
  readonly priority = 40;

  isEnabled(config: Config): boolean {
    return config.generators.alias;
  }

  generate(context: BuildContext): Page[] {
    const pages = context.getPages();
    const generated: Page[] = [];
    const taken = new Set<string>();

    for (const page of pages) {
      for (const alias of toStringList(page.variables.aliases)) {
        const aliasPath = slugifyPath(alias);
        if (pages.has(aliasPath)) {
          context.logger.warn("Alias not generated: a page has its id", { page: page.id, alias });
          continue;
        }
        if (aliasPath.length === 0 || taken.has(aliasPath)) {
          context.logger.debug("Alias skipped", { page: page.id, alias });
          continue;
        }
        taken.add(aliasPath);

        const redirect = new Page({
          id: aliasPath,
          path: aliasPath,
          language: page.language,
          variables: { title: page.title, redirect: page.url, exclude: true, sitemap: false },
        });
        redirect.rendered = redirectHtml(page.url);
        generated.push(redirect);
      }
    }

    return generated;
  }
}

/**
 * Pages with a `redirect:` URL are output as redirects instead of content.
 */
export class RedirectGenerator implements Generator {
  readonly name = "redirect";
  readonly priority = 50;

  isEnabled(config: Config): boolean {
    return config.generators.redirect;
  }

  generate(context: BuildContext): Page[] {
    const generated: Page[] = [];
    for (const page of context.getPages()) {
      const target = page.variables.redirect;
      if (typeof target !== "string" || target.length === 0 || page.rendered !== null) {
        continue;
      }
      page.variables.sitemap = false;
      page.rendered = redirectHtml(target);
      generated.push(page);
    }
    return generated;
  }
}
