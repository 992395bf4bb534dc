/**
 * Taxonomy vocabularies and their terms.
 *
 * A vocabulary (e.g. `tags`) holds terms (e.g. `typescript`); a term holds
 * the ids of the pages tagged with it, in the order they were added. Pages
 * are resolved through the pages collection, never stored here.
 *
 * @module
 */

import { slugify } from "../utils/slugify.js";

export class Term {
  readonly pageIds: string[] = [];

  constructor(
    /** Slug used in URLs and lookups */
    readonly id: string,
    /** Display name, as first written in front matter */
    readonly name: string
  ) {}

  addPage(pageId: string): void {
    if (!this.pageIds.includes(pageId)) {
      this.pageIds.push(pageId);
    }
  }
}

export class Vocabulary {
  private readonly terms = new Map<string, Term>();

  constructor(
    /** Front matter key and URL segment, e.g. "tags" */
    readonly plural: string,
    /** Singular label, e.g. "tag" */
    readonly singular: string
  ) {}

  /**
   * Tags `pageId` with `termName`. Names that slugify to the same id share
   * one term; an unsluggable name is ignored.
   */
  addTerm(termName: string, pageId: string): Term | undefined {
    const id = slugify(termName);
    if (id.length === 0) {
      return undefined;
    }
    let term = this.terms.get(id);
    if (!term) {
      term = new Term(id, termName);
      this.terms.set(id, term);
    }
    term.addPage(pageId);
    return term;
  }

  getTerm(id: string): Term | undefined {
    return this.terms.get(id);
  }

  /**
   * Terms sorted by name.
   */
  getTerms(): Term[] {
    return [...this.terms.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  get size(): number {
    return this.terms.size;
  }
}

export class TaxonomiesCollection implements Iterable<Vocabulary> {
  private readonly vocabularies = new Map<string, Vocabulary>();

  add(vocabulary: Vocabulary): this {
    this.vocabularies.set(vocabulary.plural, vocabulary);
    return this;
  }

  get(plural: string): Vocabulary | undefined {
    return this.vocabularies.get(plural);
  }

  has(plural: string): boolean {
    return this.vocabularies.has(plural);
  }

  get size(): number {
    return this.vocabularies.size;
  }

  toArray(): Vocabulary[] {
    return [...this.vocabularies.values()];
  }

  [Symbol.iterator](): Iterator<Vocabulary> {
    return this.vocabularies.values();
  }
}
