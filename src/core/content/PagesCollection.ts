/**
 * Ordered, id-keyed page collection.
 *
 * One collection exists per build; steps add to it and enrich its pages in
 * place. Taxonomies and list pages hold page *ids* and resolve them here,
 * so a removed page simply stops resolving.
 *
 * @module
 */

import { BuildError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { Page } from "./Page.js";

export class PagesCollection implements Iterable<Page> {
  private readonly items = new Map<string, Page>();

  constructor(pages: Iterable<Page> = []) {
    for (const page of pages) {
      this.add(page);
    }
  }

  /**
   * @throws BuildError CONTENT_DUPLICATE_ID when the id is already taken
   */
  add(page: Page): this {
    const existing = this.items.get(page.id);
    if (existing) {
      throw new BuildError(
        `Duplicate page id "${page.id}"`,
        ErrorCode.CONTENT_DUPLICATE_ID,
        {
          id: page.id,
          files: [existing.sourceFile?.relativePath, page.sourceFile?.relativePath].filter(
            (file): file is string => file !== undefined
          ),
        },
        "Two source files resolve to the same page. Rename one of them or set a distinct `slug`."
      );
    }
    this.items.set(page.id, page);
    return this;
  }

  /**
   * Adds the page, or replaces the page with the same id keeping its position.
   */
  upsert(page: Page): this {
    this.items.set(page.id, page);
    return this;
  }

  remove(id: string): boolean {
    return this.items.delete(id);
  }

  has(id: string): boolean {
    return this.items.has(id);
  }

  get(id: string): Page | undefined {
    return this.items.get(id);
  }

  get size(): number {
    return this.items.size;
  }

  toArray(): Page[] {
    return [...this.items.values()];
  }

  filter(predicate: (page: Page) => boolean): Page[] {
    return this.toArray().filter(predicate);
  }

  /**
   * Resolves ids to pages, skipping ids no longer in the collection.
   */
  resolve(ids: readonly string[]): Page[] {
    const pages: Page[] = [];
    for (const id of ids) {
      const page = this.items.get(id);
      if (page) {
        pages.push(page);
      }
    }
    return pages;
  }

  [Symbol.iterator](): Iterator<Page> {
    return this.items.values();
  }
}

/**
 * Newest first; undated pages last; ties by weight, then id.
 */
export function sortByDate(pages: readonly Page[]): Page[] {
  return [...pages].sort((a, b) => {
    const aTime = a.date?.getTime();
    const bTime = b.date?.getTime();
    if (aTime !== bTime) {
      if (aTime === undefined) return 1;
      if (bTime === undefined) return -1;
      return bTime - aTime;
    }
    if (a.weight !== b.weight) {
      return a.weight - b.weight;
    }
    return a.id.localeCompare(b.id);
  });
}
