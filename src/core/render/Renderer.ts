/**
 * Template Renderer for Quire.
 *
 * Renders pages through Handlebars layouts found in the site's `layouts/`
 * directory and, with lower priority, in each theme's `layouts/`.
 *
 * ## Layout lookup
 *
 * Template names are paths relative to a layouts directory, without
 * extension (`.hbs`, `.handlebars` or `.html`). For a page the renderer
 * tries, in order:
 *
 * - with a `layout` front matter value: `<section>/<layout>`,
 *   `_default/<layout>`, `<layout>`; nothing else
 * - otherwise: `index` (home only), `<section>/<kind>`, `_default/<kind>`,
 *   `_default/list` (list kinds), `_default/page`, then a built-in page
 *   layout
 *
 * Files under `partials/` are registered as partials (`{{> header}}`).
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import Handlebars from "handlebars";
import fg from "fast-glob";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { Page } from "../content/Page.js";
import { isDirectory, toPosixPath } from "../utils/paths.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Template engine handle stored on the build context.
 */
export interface Renderer {
  /**
   * Renders `page` with `data` as the template context.
   *
   * @throws BuildError TEMPLATE_NOT_FOUND or TEMPLATE_RENDER_FAILED
   */
  render(page: Page, data: Record<string, unknown>): string;

  /** Template names tried for `page`, in order */
  layoutCandidates(page: Page): string[];
}

export interface HandlebarsRendererOptions {
  /** Layout directories, highest priority first; missing ones are skipped */
  readonly layoutDirs: readonly string[];

  /** Site base URL, used by the `absURL` helper */
  readonly baseurl?: string;
}

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

// =============================================================================
// Constants
// =============================================================================

const TEMPLATE_EXTENSIONS = ["hbs", "handlebars", "html"] as const;

const PARTIALS_PREFIX = "partials/";

const BUILTIN_LAYOUT = "(built-in)";

const BUILTIN_PAGE_TEMPLATE = `<!DOCTYPE html>
<html lang="{{page.language}}">
<head>
<meta charset="utf-8">
<title>{{page.title}}{{#if site.title}} - {{site.title}}{{/if}}</title>
</head>
<body>
{{{page.content}}}
</body>
</html>
`;

const LIST_KINDS = new Set(["home", "section", "vocabulary", "term"]);

// =============================================================================
// HandlebarsRenderer
// =============================================================================

export class HandlebarsRenderer implements Renderer {
  private readonly hbs = Handlebars.create();
  private readonly sources = new Map<string, string>();
  private readonly compiled = new Map<string, CompiledTemplate>();
  private readonly baseurl: string;

  private constructor(baseurl: string) {
    this.baseurl = baseurl.replace(/\/+$/, "");
    this.registerHelpers();
  }

  /**
   * Creates a renderer over the templates found in `layoutDirs`.
   */
  static async load(options: HandlebarsRendererOptions): Promise<HandlebarsRenderer> {
    const renderer = new HandlebarsRenderer(options.baseurl ?? "");
    const seen = new Set<string>();

    for (const dir of options.layoutDirs) {
      if (!(await isDirectory(dir))) {
        continue;
      }
      const files = await fg(`**/*.{${TEMPLATE_EXTENSIONS.join(",")}}`, {
        cwd: dir,
        onlyFiles: true,
      });
      for (const file of files.sort()) {
        const name = templateName(file);
        // Earlier directories win
        if (seen.has(name)) {
          continue;
        }
        seen.add(name);
        const source = await fs.readFile(path.join(dir, file), "utf-8");
        renderer.addTemplate(name, source);
      }
    }

    return renderer;
  }

  /**
   * Creates a renderer from in-memory templates, keyed by template name.
   */
  static fromTemplates(templates: Record<string, string>, baseurl = ""): HandlebarsRenderer {
    const renderer = new HandlebarsRenderer(baseurl);
    for (const [name, source] of Object.entries(templates)) {
      renderer.addTemplate(name, source);
    }
    return renderer;
  }

  private addTemplate(name: string, source: string): void {
    if (name.startsWith(PARTIALS_PREFIX)) {
      this.hbs.registerPartial(name.slice(PARTIALS_PREFIX.length), source);
      return;
    }
    this.sources.set(name, source);
  }

  templateNames(): string[] {
    return [...this.sources.keys()].sort();
  }

  layoutCandidates(page: Page): string[] {
    const names: string[] = [];
    const section = page.section;

    if (page.layout !== undefined) {
      if (section) names.push(`${section}/${page.layout}`);
      names.push(`_default/${page.layout}`, page.layout);
      return unique(names);
    }

    if (page.kind === "home") names.push("index");
    if (section) names.push(`${section}/${page.kind}`);
    names.push(`_default/${page.kind}`);
    if (LIST_KINDS.has(page.kind)) names.push("_default/list");
    names.push("_default/page");
    return unique(names);
  }

  render(page: Page, data: Record<string, unknown>): string {
    const layout = this.resolveLayout(page);
    const template = this.compile(layout);

    try {
      return template(data);
    } catch (error) {
      const cause = toError(error);
      throw new BuildError(
        `Failed to render page "${page.id}" with layout "${layout}"`,
        ErrorCode.TEMPLATE_RENDER_FAILED,
        { page: page.id, layout },
        `Layout "${layout}" could not be rendered: ${cause.message}`,
        cause
      );
    }
  }

  private resolveLayout(page: Page): string {
    const candidates = this.layoutCandidates(page);
    const found = candidates.find((name) => this.sources.has(name));
    if (found !== undefined) {
      return found;
    }
    if (page.layout === undefined) {
      return BUILTIN_LAYOUT;
    }
    throw new BuildError(
      `Layout "${page.layout}" not found for page "${page.id}"`,
      ErrorCode.TEMPLATE_NOT_FOUND,
      { page: page.id, candidates },
      `Create one of: ${candidates.map((c) => `layouts/${c}.hbs`).join(", ")}`
    );
  }

  private compile(name: string): CompiledTemplate {
    const cached = this.compiled.get(name);
    if (cached) {
      return cached;
    }
    const source = name === BUILTIN_LAYOUT ? BUILTIN_PAGE_TEMPLATE : this.sources.get(name) ?? "";
    const template = this.hbs.compile(source);
    this.compiled.set(name, template);
    return template;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private registerHelpers(): void {
    this.hbs.registerHelper("url", (value: unknown) => relativeUrl(stringArg(value)));

    this.hbs.registerHelper("absURL", (value: unknown) => {
      const target = stringArg(value);
      if (/^[a-z][a-z0-9+.-]*:/i.test(target)) {
        return target;
      }
      return `${this.baseurl}${relativeUrl(target)}`;
    });

    this.hbs.registerHelper("date", (value: unknown) => formatDate(value));

    this.hbs.registerHelper(
      "json",
      (value: unknown) => new this.hbs.SafeString(JSON.stringify(value ?? null))
    );

    this.hbs.registerHelper("eq", (a: unknown, b: unknown) => a === b);
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Template name for a file path relative to a layouts directory.
 */
function templateName(relativeFile: string): string {
  const posix = toPosixPath(relativeFile);
  return posix.slice(0, posix.length - path.extname(posix).length);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Handlebars passes its options hash as the last argument; only strings count.
 */
function stringArg(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Normalizes a site path to a root-relative URL; full URLs pass through.
 */
export function relativeUrl(target: string): string {
  if (/^[a-z][a-z0-9+.-]*:/i.test(target) || target.startsWith("//")) {
    return target;
  }
  const trimmed = target.replace(/^\/+/, "");
  return `/${trimmed}`;
}

/**
 * Formats a Date or date string as YYYY-MM-DD; empty for anything else.
 */
export function formatDate(value: unknown): string {
  let date: Date | null = null;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === "string" || typeof value === "number") {
    date = new Date(value);
  }
  if (date === null || Number.isNaN(date.getTime())) {
    return "";
  }
  return date.toISOString().slice(0, 10);
}
