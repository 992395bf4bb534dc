import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { Page, type PageInit } from "../src/core/content/Page.js";
import { BuildError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { HandlebarsRenderer, formatDate, relativeUrl } from "../src/core/render/Renderer.js";
import { cleanupTestDir, createTestDir, writeFiles } from "./helpers.js";

function page(init: Partial<PageInit> = {}): Page {
  return new Page({ id: "blog/post", path: "blog/post", section: "blog", language: "en", ...init });
}

function renderError(fn: () => unknown): BuildError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BuildError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a BuildError");
}

describe("HandlebarsRenderer", () => {
  describe("layout lookup", () => {
    const renderer = HandlebarsRenderer.fromTemplates({});

    it("tries section, default kind, then default page for a page", () => {
      expect(renderer.layoutCandidates(page())).toEqual(["blog/page", "_default/page"]);
    });

    it("tries index and the list layout for the home page", () => {
      const home = page({ id: "index", kind: "home", path: "", section: "" });

      expect(renderer.layoutCandidates(home)).toEqual([
        "index",
        "_default/home",
        "_default/list",
        "_default/page",
      ]);
    });

    it("tries only the named layout when front matter sets one", () => {
      expect(renderer.layoutCandidates(page({ variables: { layout: "wide" } }))).toEqual([
        "blog/wide",
        "_default/wide",
        "wide",
      ]);
    });
  });

  describe("render", () => {
    it("uses the most specific template", () => {
      const renderer = HandlebarsRenderer.fromTemplates({
        "_default/page": "default {{page.title}}",
        "blog/page": "blog {{page.title}}",
      });

      expect(renderer.render(page(), { page: { title: "Hello" } })).toBe("blog Hello");
    });

    it("falls back to the built-in layout", () => {
      const renderer = HandlebarsRenderer.fromTemplates({});

      const html = renderer.render(page(), {
        site: { title: "Site" },
        page: { title: "Post", language: "en", content: "<p>Hi</p>" },
      });

      expect(html).toContain("<title>Post - Site</title>");
      expect(html).toContain("<body>\n<p>Hi</p>\n</body>");
    });

    it("fails with TEMPLATE_NOT_FOUND for a missing named layout", () => {
      const renderer = HandlebarsRenderer.fromTemplates({});

      const error = renderError(() => renderer.render(page({ variables: { layout: "wide" } }), {}));

      expect(error.code).toBe(ErrorCode.TEMPLATE_NOT_FOUND);
      expect(error.details?.candidates).toEqual(["blog/wide", "_default/wide", "wide"]);
    });

    it("fails with TEMPLATE_RENDER_FAILED on template errors", () => {
      const renderer = HandlebarsRenderer.fromTemplates({ "_default/page": "{{#each}}" });

      const error = renderError(() => renderer.render(page(), {}));

      expect(error.code).toBe(ErrorCode.TEMPLATE_RENDER_FAILED);
      expect(error.details).toEqual({ page: "blog/post", layout: "_default/page" });
    });

    it("provides url, absURL, date, json and eq helpers", () => {
      const renderer = HandlebarsRenderer.fromTemplates(
        {
          "_default/page":
            '{{url "blog/"}}|{{absURL "/feed.xml"}}|{{date page.date}}|{{json page.tags}}|{{#if (eq page.kind "page")}}yes{{/if}}',
        },
        "https://example.com/"
      );

      const html = renderer.render(page(), {
        page: { date: new Date("2024-03-05T10:00:00Z"), tags: ["a"], kind: "page" },
      });

      expect(html).toBe('/blog/|https://example.com/feed.xml|2024-03-05|["a"]|yes');
    });
  });

  describe("load", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTestDir("layouts");
    });

    afterEach(async () => {
      await cleanupTestDir(dir);
    });

    it("prefers earlier directories and registers partials", async () => {
      await writeFiles(dir, {
        "site/_default/page.hbs": "site {{> header}}",
        "theme/_default/page.hbs": "theme",
        "theme/_default/list.html": "list",
        "theme/partials/header.hbs": "<h1>{{page.title}}</h1>",
      });

      const renderer = await HandlebarsRenderer.load({
        layoutDirs: [path.join(dir, "site"), path.join(dir, "missing"), path.join(dir, "theme")],
      });

      expect(renderer.templateNames()).toEqual(["_default/list", "_default/page"]);
      expect(renderer.render(page(), { page: { title: "T" } })).toBe("site <h1>T</h1>");
    });
  });
});

describe("relativeUrl", () => {
  it("root-anchors site paths and keeps full URLs", () => {
    expect(relativeUrl("docs/")).toBe("/docs/");
    expect(relativeUrl("//cdn.example.com/a.js")).toBe("//cdn.example.com/a.js");
    expect(relativeUrl("mailto:someone@example.com")).toBe("mailto:someone@example.com");
  });
});

describe("formatDate", () => {
  it("formats dates and date strings, empty otherwise", () => {
    expect(formatDate("2024-12-31")).toBe("2024-12-31");
    expect(formatDate(undefined)).toBe("");
    expect(formatDate("soon")).toBe("");
  });
});
