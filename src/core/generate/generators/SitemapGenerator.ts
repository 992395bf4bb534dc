import Handlebars from "handlebars";
import type { Config } from "../../config/Config.js";
import { Page } from "../../content/Page.js";
import { formatDate } from "../../render/Renderer.js";
import type { BuildContext } from "../../build/BuildContext.js";
import type { Generator } from "../Generator.js";

export const SITEMAP_FILE = "sitemap.xml";

const SITEMAP_ID = "sitemap";

/**
 * `sitemap.xml` listing every page except redirects and pages with
 * `sitemap: false`, sorted by URL. Not generated when a content page
 * already has the `sitemap` id.
 */
export class SitemapGenerator implements Generator {
  readonly name = "sitemap";
  readonly priority = 60;

  isEnabled(config: Config): boolean {
    return config.generators.sitemap;
  }

  generate(context: BuildContext): Page[] {
    const config = context.getConfig();
    const existing = context.getPages().get(SITEMAP_ID);
    if (existing && !existing.virtual) {
      context.logger.warn("Sitemap not generated: a content page has its id", {
        id: SITEMAP_ID,
        file: existing.sourceFile?.relativePath,
      });
      return [];
    }

    const base = config.baseurl.trim().replace(/\/+$/, "");

    const entries = context
      .getPages()
      .filter((page) => page.variables.sitemap !== false && page.rendered === null)
      .sort((a, b) => a.url.localeCompare(b.url));

    const lines = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    ];
    for (const page of entries) {
      lines.push("  <url>");
      lines.push(`    <loc>${Handlebars.Utils.escapeExpression(base + page.url)}</loc>`);
      const lastmod = formatDate(page.date);
      if (lastmod) {
        lines.push(`    <lastmod>${lastmod}</lastmod>`);
      }
      lines.push("  </url>");
    }
    lines.push("</urlset>");

    const sitemap = new Page({
      id: SITEMAP_ID,
      path: "",
      language: config.language,
      outputFile: SITEMAP_FILE,
      variables: { exclude: true, sitemap: false },
    });
    sitemap.rendered = lines.join("\n") + "\n";
    return [sitemap];
  }
}
