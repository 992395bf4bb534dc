/**
 * Virtual page generators.
 *
 * A generator creates pages that have no source file (section listings,
 * taxonomy pages, redirects, the sitemap) from what is already in the build
 * context. The "Generating pages" step runs every registered, enabled
 * generator by ascending priority; returned pages are added to the pages
 * collection, replacing any page with the same id.
 *
 * @module
 */

import type { Config } from "../config/Config.js";
import type { Page } from "../content/Page.js";
import type { BuildContext } from "../build/BuildContext.js";

export interface Generator {
  /** Unique name; registering the same name again replaces the generator */
  readonly name: string;

  /** Lower runs first */
  readonly priority: number;

  isEnabled(config: Config): boolean;

  generate(context: BuildContext): Page[] | Promise<Page[]>;
}

interface RegisteredGenerator {
  readonly generator: Generator;
  readonly order: number;
}

export class GeneratorRegistry {
  private readonly generators = new Map<string, RegisteredGenerator>();
  private registrations = 0;

  register(generator: Generator): this {
    this.generators.set(generator.name, { generator, order: this.registrations++ });
    return this;
  }

  unregister(name: string): boolean {
    return this.generators.delete(name);
  }

  has(name: string): boolean {
    return this.generators.has(name);
  }

  get size(): number {
    return this.generators.size;
  }

  /**
   * Generators by priority, then registration order.
   */
  list(): Generator[] {
    return [...this.generators.values()]
      .sort((a, b) => a.generator.priority - b.generator.priority || a.order - b.order)
      .map((entry) => entry.generator);
  }
}
