import { AbstractStep } from "../build/Step.js";
import type { Page } from "../content/Page.js";
import { MenusCollection, type MenuEntryInit } from "../menu/MenusCollection.js";
import { isRecord, toStringList } from "../utils/guards.js";

/**
 * Builds the menus of every language: entries from the `menus`
 * configuration, then pages declaring `menu` in their front matter.
 *
 * ```yaml
 * menu: main                  # one menu
 * menu: [main, footer]        # several
 * menu:
 *   main: { weight: 10, name: Home, parent: docs }
 * ```
 */
export class MenusCreate extends AbstractStep {
  getName(): string {
    return "Creating menus";
  }

  async process(): Promise<void> {
    const menus = new Map<string, MenusCollection>();
    for (const { code } of this.config.languages) {
      const collection = new MenusCollection(code);
      for (const [name, entries] of Object.entries(this.config.menus)) {
        const menu = collection.getOrCreate(name);
        for (const entry of entries) {
          menu.add(entry);
        }
      }
      menus.set(code, collection);
    }

    for (const page of this.context.getPages()) {
      const declared = page.variables.menu;
      if (declared === undefined) {
        continue;
      }
      let collection = menus.get(page.language);
      if (!collection) {
        collection = new MenusCollection(page.language);
        menus.set(page.language, collection);
      }

      if (isRecord(declared)) {
        for (const [name, settings] of Object.entries(declared)) {
          collection.getOrCreate(name).add(pageEntry(page, isRecord(settings) ? settings : {}));
        }
      } else {
        for (const name of toStringList(declared)) {
          collection.getOrCreate(name).add(pageEntry(page, {}));
        }
      }
    }

    this.context.setMenus(menus);
  }
}

function pageEntry(page: Page, settings: Record<string, unknown>): MenuEntryInit {
  return {
    id: page.id,
    name: typeof settings.name === "string" ? settings.name : page.title,
    url: page.url,
    weight: typeof settings.weight === "number" ? settings.weight : page.weight,
    parent: typeof settings.parent === "string" ? settings.parent : undefined,
    pageId: page.id,
  };
}
