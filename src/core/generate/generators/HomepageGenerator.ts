import type { Config } from "../../config/Config.js";
import { Page } from "../../content/Page.js";
import { sortByDate } from "../../content/PagesCollection.js";
import { languagePrefix } from "../../content/language.js";
import type { BuildContext } from "../../build/BuildContext.js";
import type { Generator } from "../Generator.js";

/**
 * Home page of each language, listing that language's regular pages.
 * The default language always gets one; other languages only when they
 * have pages.
 */
export class HomepageGenerator implements Generator {
  readonly name = "homepage";
  readonly priority = 30;

  isEnabled(config: Config): boolean {
    return config.generators.homepage;
  }

  generate(context: BuildContext): Page[] {
    const config = context.getConfig();
    const pages = context.getPages();
    const generated: Page[] = [];

    for (const { code } of config.languages) {
      const members = pages.filter(
        (page) => page.kind === "page" && page.language === code && page.variables.exclude !== true
      );
      if (code !== config.language && members.length === 0) {
        continue;
      }

      const prefix = languagePrefix(code, config.language);
      const id = `${prefix}index`;
      const existing = pages.get(id);
      if (existing && existing.kind !== "home") {
        context.logger.warn("Home page not generated: another page has its id", { id });
        continue;
      }

      const home =
        existing ??
        new Page({
          id,
          kind: "home",
          path: prefix.replace(/\/$/, ""),
          language: code,
          variables: { title: config.title || "Home" },
        });
      home.pageIds = sortByDate(members).map((page) => page.id);
      generated.push(home);
    }

    return generated;
  }
}
