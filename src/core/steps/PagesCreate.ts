/**
 * "Creating pages": turns source files into pages.
 *
 * For `blog/hello-world.fr.md`:
 *
 * - the `.fr` suffix (a configured language code) or a `language` front
 *   matter value sets the language; otherwise the default language
 * - the path is `blog/hello-world`, or `blog/<slug>` with a `slug` front
 *   matter value, or the `path` front matter value as is; every segment is
 *   slugified and non-default languages are prefixed (`fr/blog/hello-world`)
 * - the section is the first segment of the path (`blog`)
 *
 * `index` and `_index` files stand for their directory: the site root
 * becomes the home page, any other directory a section page.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import matter from "gray-matter";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { AbstractStep } from "../build/Step.js";
import type { SourceFile } from "../content/files.js";
import { Page, type PageKind } from "../content/Page.js";
import { PagesCollection } from "../content/PagesCollection.js";
import { languagePrefix } from "../content/language.js";
import { slugify } from "../utils/slugify.js";

const INDEX_NAMES = new Set(["index", "_index"]);

interface PageLocation {
  readonly id: string;
  readonly kind: PageKind;
  readonly path: string;
  readonly section: string;
  readonly language: string;
}

export class PagesCreate extends AbstractStep {
  getName(): string {
    return "Creating pages";
  }

  async process(): Promise<void> {
    const pages = new PagesCollection();
    let drafts = 0;

    for (const file of this.context.getSourceFiles()) {
      const page = await this.createPage(file);
      if (page.draft && !this.options.drafts) {
        drafts += 1;
        continue;
      }
      pages.add(page);
    }

    this.context.setPages(pages);
    this.logger.info("Pages created", { count: pages.size, draftsSkipped: drafts });
  }

  private async createPage(file: SourceFile): Promise<Page> {
    const raw = await fs.readFile(file.absolutePath, "utf-8");

    let parsed: matter.GrayMatterFile<string>;
    try {
      parsed = matter(raw);
    } catch (error) {
      const cause = toError(error);
      throw new BuildError(
        `Failed to parse front matter of ${file.relativePath}`,
        ErrorCode.CONTENT_PARSE_FAILED,
        { file: file.relativePath, reason: cause.message },
        "Front matter must be a YAML mapping between two `---` lines.",
        cause
      );
    }

    const variables: Record<string, unknown> = { ...parsed.data };
    const location = this.locate(file.relativePath, variables);

    return new Page({
      ...location,
      variables,
      body: parsed.content,
      sourceFile: file,
    });
  }

  private locate(relativePath: string, variables: Record<string, unknown>): PageLocation {
    const config = this.config;
    const languageCodes = new Set(config.languages.map((language) => language.code));

    const withoutExtension = relativePath.replace(/\.[^./]+$/, "");
    const segments = withoutExtension.split("/");
    let name = segments.pop() ?? "";

    let language = config.language;
    const suffix = /\.([^.]+)$/.exec(name);
    if (suffix && languageCodes.has(suffix[1])) {
      language = suffix[1];
      name = name.slice(0, suffix.index);
    }
    if (typeof variables.language === "string" && variables.language.length > 0) {
      language = variables.language;
    }

    let kind: PageKind = "page";
    let pagePath: string;
    if (INDEX_NAMES.has(name)) {
      pagePath = segments.join("/");
      kind = pagePath === "" ? "home" : "section";
    } else {
      if (typeof variables.slug === "string" && variables.slug.trim().length > 0) {
        name = variables.slug;
      }
      pagePath = [...segments, name].join("/");
    }
    if (typeof variables.path === "string") {
      pagePath = variables.path;
    }
    pagePath = this.slugPath(relativePath, pagePath, kind);

    const pathSegments = pagePath.split("/");
    const section = kind === "section" || pathSegments.length > 1 ? pathSegments[0] : "";
    const prefix = languagePrefix(language, config.language);
    const fullPath = `${prefix}${pagePath}`.replace(/\/$/, "");

    return {
      id: kind === "home" ? `${prefix}index` : fullPath,
      kind,
      path: fullPath,
      section,
      language,
    };
  }

  /**
   * @throws BuildError CONTENT_PARSE_FAILED when a path segment has no
   * letters or digits left, or a regular page ends up with an empty path
   */
  private slugPath(relativePath: string, pagePath: string, kind: PageKind): string {
    const segments = pagePath.split("/").filter((segment) => segment.trim().length > 0);
    const slugs = segments.map((segment) => slugify(segment));

    if (slugs.some((slug) => slug.length === 0) || (kind !== "home" && slugs.length === 0)) {
      throw new BuildError(
        `Cannot build a URL for ${relativePath}`,
        ErrorCode.CONTENT_PARSE_FAILED,
        { file: relativePath, path: pagePath },
        "File names and `slug`/`path` front matter need letters or digits in every segment."
      );
    }
    return slugs.join("/");
  }
}
