/**
 * Navigation menus of one language.
 *
 * A menu is a flat set of entries keyed by id; `getTree()` assembles the
 * ordered tree from each entry's `parent`. Entries pointing at pages carry
 * the page id, not the page.
 *
 * @module
 */

export interface MenuEntryInit {
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly weight?: number;
  readonly parent?: string;
  readonly pageId?: string;
}

/**
 * A node of the assembled menu tree.
 */
export interface MenuNode {
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly weight: number;
  readonly pageId?: string;
  readonly children: MenuNode[];
}

export class Menu {
  private readonly entries = new Map<string, MenuEntryInit>();

  constructor(readonly name: string) {}

  /**
   * Adds an entry; a later entry with the same id replaces the earlier one.
   */
  add(entry: MenuEntryInit): this {
    this.entries.set(entry.id, entry);
    return this;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Entries as an ordered tree: weight ascending, then name. An entry whose
   * parent is missing (or would create a cycle) is placed at the root.
   */
  getTree(): MenuNode[] {
    const nodes = new Map<string, MenuNode>();
    for (const entry of this.entries.values()) {
      nodes.set(entry.id, {
        id: entry.id,
        name: entry.name,
        url: entry.url,
        weight: entry.weight ?? 0,
        pageId: entry.pageId,
        children: [],
      });
    }

    const roots: MenuNode[] = [];
    for (const entry of this.entries.values()) {
      const node = nodes.get(entry.id);
      if (!node) continue;
      const parent = entry.parent !== undefined ? nodes.get(entry.parent) : undefined;
      if (parent && !this.isAncestor(entry.id, entry.parent)) {
        parent.children.push(node);
      } else {
        roots.push(node);
      }
    }

    sortNodes(roots);
    return roots;
  }

  /** True when `id` appears on the parent chain starting at `parentId` */
  private isAncestor(id: string, parentId: string | undefined): boolean {
    const seen = new Set<string>();
    let current = parentId;
    while (current !== undefined && !seen.has(current)) {
      if (current === id) {
        return true;
      }
      seen.add(current);
      current = this.entries.get(current)?.parent;
    }
    return false;
  }
}

function sortNodes(nodes: MenuNode[]): void {
  nodes.sort((a, b) => a.weight - b.weight || a.name.localeCompare(b.name));
  for (const node of nodes) {
    sortNodes(node.children);
  }
}

export class MenusCollection implements Iterable<Menu> {
  private readonly menus = new Map<string, Menu>();

  constructor(readonly language: string) {}

  /**
   * Returns the named menu, creating it on first use.
   */
  getOrCreate(name: string): Menu {
    let menu = this.menus.get(name);
    if (!menu) {
      menu = new Menu(name);
      this.menus.set(name, menu);
    }
    return menu;
  }

  get(name: string): Menu | undefined {
    return this.menus.get(name);
  }

  names(): string[] {
    return [...this.menus.keys()];
  }

  /**
   * Every menu as a tree, keyed by menu name (template data).
   */
  toTrees(): Record<string, MenuNode[]> {
    const trees: Record<string, MenuNode[]> = {};
    for (const [name, menu] of this.menus) {
      trees[name] = menu.getTree();
    }
    return trees;
  }

  [Symbol.iterator](): Iterator<Menu> {
    return this.menus.values();
  }
}
