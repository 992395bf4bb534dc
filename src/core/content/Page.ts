/**
 * Page model.
 *
 * Pages are created by the "Creating pages" step from source files, or by
 * generators as virtual pages (section lists, taxonomy terms, redirects,
 * the sitemap). Later steps enrich them in place: conversion fills `html`,
 * generators fill `pageIds`, rendering fills `rendered`.
 *
 * @module
 */

import type { SourceFile } from "./files.js";
import { humanize } from "./language.js";

/**
 * What a page represents; drives default layout lookup.
 */
export type PageKind = "home" | "section" | "page" | "vocabulary" | "term";

export interface PageInit {
  readonly id: string;
  readonly kind?: PageKind;

  /** Output path relative to the destination, no leading/trailing slash; "" for the root */
  readonly path: string;
  readonly language: string;
  readonly section?: string;
  readonly variables?: Record<string, unknown>;
  readonly body?: string;
  readonly sourceFile?: SourceFile;

  /** Overrides `<path>/index.html` as the output file (e.g. "sitemap.xml") */
  readonly outputFile?: string;
}

export class Page {
  readonly id: string;
  readonly kind: PageKind;
  readonly path: string;
  readonly language: string;
  readonly section: string;
  readonly sourceFile: SourceFile | null;
  readonly variables: Record<string, unknown>;
  readonly outputFile: string | null;

  /** Source body after front matter (Markdown) */
  body: string;

  /** Body converted to HTML */
  html = "";

  /** Final output; when set before rendering, templates are bypassed */
  rendered: string | null = null;

  /** Ids of the pages listed by this page (sections, terms, home) */
  pageIds: string[] = [];

  constructor(init: PageInit) {
    this.id = init.id;
    this.kind = init.kind ?? "page";
    this.path = init.path;
    this.language = init.language;
    this.section = init.section ?? "";
    this.variables = { ...init.variables };
    this.body = init.body ?? "";
    this.sourceFile = init.sourceFile ?? null;
    this.outputFile = init.outputFile ?? null;
  }

  /** True for pages that have no source file */
  get virtual(): boolean {
    return this.sourceFile === null;
  }

  get title(): string {
    const title = this.variables.title;
    if (typeof title === "string" && title.trim().length > 0) {
      return title;
    }
    return humanize(this.id.split("/").pop() ?? this.id);
  }

  get date(): Date | null {
    const value = this.variables.date;
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value;
    }
    if (typeof value === "string" || typeof value === "number") {
      const parsed = new Date(value);
      return Number.isNaN(parsed.getTime()) ? null : parsed;
    }
    return null;
  }

  get draft(): boolean {
    return this.variables.draft === true;
  }

  get layout(): string | undefined {
    const layout = this.variables.layout;
    return typeof layout === "string" && layout.length > 0 ? layout : undefined;
  }

  get weight(): number {
    const weight = this.variables.weight;
    return typeof weight === "number" && Number.isFinite(weight) ? weight : 0;
  }

  /**
   * File written for this page, relative to the destination directory.
   */
  get outputPath(): string {
    if (this.outputFile !== null) {
      return this.path === "" ? this.outputFile : `${this.path}/${this.outputFile}`;
    }
    return this.path === "" ? "index.html" : `${this.path}/index.html`;
  }

  /**
   * Root-relative URL of the page.
   */
  get url(): string {
    if (this.outputFile !== null) {
      return `/${this.outputPath}`;
    }
    return this.path === "" ? "/" : `/${this.path}/`;
  }
}
