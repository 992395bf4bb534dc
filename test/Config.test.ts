import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { Config } from "../src/core/config/Config.js";
import { ConfigLoader, loadConfig, mergeConfig } from "../src/core/config/ConfigLoader.js";
import { BuildError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { cleanupTestDir, createTestDir, writeFiles } from "./helpers.js";

async function captureError(promise: Promise<unknown>): Promise<BuildError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof BuildError)) {
    throw new Error(`Expected a BuildError, got ${String(error)}`);
  }
  return error;
}

describe("Config", () => {
  it("fills every default", () => {
    const config = new Config();

    expect(config.baseurl).toBe("");
    expect(config.language).toBe("en");
    expect(config.languages).toEqual([{ code: "en", name: "en" }]);
    expect(config.themes).toEqual([]);
    expect(config.pageExtensions).toEqual(["md", "markdown"]);
    expect(config.taxonomies).toEqual({ tags: "tag", categories: "category" });
    expect(config.generators.sitemap).toBe(true);
    expect(config.optimize).toEqual({ enabled: false, html: true, css: true, js: true });
    expect(config.isDebug).toBe(false);
  });

  it("accepts one theme name or a list", () => {
    expect(new Config({ theme: "base" }).themes).toEqual(["base"]);
    expect(new Config({ theme: ["docs", "base"] }).themes).toEqual(["docs", "base"]);
    expect(new Config({ theme: "  " }).themes).toEqual([]);
  });

  it("reads values by dotted key", () => {
    const config = new Config({ optimize: { enabled: true }, params: { author: { name: "Ada" } } });

    expect(config.get("optimize.enabled")).toBe(true);
    expect(config.get("params.author.name")).toBe("Ada");
    expect(config.get("params.missing.name")).toBeUndefined();
  });

  it("keeps unknown keys", () => {
    expect(new Config({ googleAnalytics: "G-TEST" }).get("googleAnalytics")).toBe("G-TEST");
  });

  it("rejects invalid values with CONFIG_INVALID", () => {
    let error: unknown;
    try {
      new Config({ debug: "yes" }, "quire.yml");
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(BuildError);
    if (!(error instanceof BuildError)) return;
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.details?.file).toBe("quire.yml");
    expect(error.details?.issues).toEqual(["debug: Expected boolean, received string"]);
  });

  it("resolves directories from the source directory", () => {
    const config = new Config({ output: { dir: "public" }, pages: { dir: "content" } });
    config.setSourceDir("/sites/blog");

    expect(config.destinationDir).toBe(path.resolve("/sites/blog/public"));
    expect(config.pagesPath).toBe(path.resolve("/sites/blog/content"));
    expect(config.themePath("base")).toBe(path.join(path.resolve("/sites/blog/themes"), "base"));

    config.setDestinationDir("../out");
    expect(config.destinationDir).toBe(path.resolve("/sites/out"));

    config.setDestinationDir(null);
    expect(config.destinationDir).toBe(path.resolve("/sites/blog/public"));
  });
});

describe("ConfigLoader", () => {
  let siteDir: string;

  beforeEach(async () => {
    siteDir = await createTestDir("config");
  });

  afterEach(async () => {
    await cleanupTestDir(siteDir);
  });

  it("uses the defaults without a configuration file", async () => {
    const config = await loadConfig({ sourceDir: siteDir });

    expect(config.title).toBe("");
    expect(config.sourceDir).toBe(siteDir);
  });

  it("loads quire.yml", async () => {
    await writeFiles(siteDir, { "quire.yml": "title: My Site\nbaseurl: https://example.com/\n" });

    const config = await loadConfig({ sourceDir: siteDir });

    expect(config.title).toBe("My Site");
    expect(config.baseurl).toBe("https://example.com/");
  });

  it("falls back to quire.yaml", async () => {
    await writeFiles(siteDir, { "quire.yaml": "title: Yaml Site\n" });

    expect((await loadConfig({ sourceDir: siteDir })).title).toBe("Yaml Site");
  });

  it("treats an empty file as no settings", async () => {
    await writeFiles(siteDir, { "quire.yml": "" });

    expect((await loadConfig({ sourceDir: siteDir })).language).toBe("en");
  });

  it("merges overrides over the file", async () => {
    await writeFiles(siteDir, { "quire.yml": "baseurl: https://example.com/\noptimize:\n  enabled: true\n" });

    const config = await loadConfig({
      sourceDir: siteDir,
      destinationDir: "public",
      overrides: { baseurl: "https://staging.example.com/", optimize: { html: false } },
    });

    expect(config.baseurl).toBe("https://staging.example.com/");
    expect(config.optimize).toEqual({ enabled: true, html: false, css: true, js: true });
    expect(config.destinationDir).toBe(path.join(siteDir, "public"));
  });

  it("fails with CONFIG_NOT_FOUND for a missing explicit file", async () => {
    const error = await captureError(loadConfig({ sourceDir: siteDir, configFile: "other.yml" }));

    expect(error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
  });

  it("fails with CONFIG_PARSE_FAILED on invalid YAML", async () => {
    await writeFiles(siteDir, { "quire.yml": "title: [unclosed\n" });

    const error = await captureError(new ConfigLoader().load({ sourceDir: siteDir }));

    expect(error.code).toBe(ErrorCode.CONFIG_PARSE_FAILED);
    expect(error.details?.configFile).toBe(path.join(siteDir, "quire.yml"));
  });

  it("fails with CONFIG_INVALID when the root is not a mapping", async () => {
    await writeFiles(siteDir, { "quire.yml": "- one\n- two\n" });

    const error = await captureError(loadConfig({ sourceDir: siteDir }));

    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
  });
});

describe("mergeConfig", () => {
  it("merges objects deeply and replaces arrays", () => {
    expect(
      mergeConfig(
        { pages: { dir: "pages", ext: ["md"] }, title: "A" },
        { pages: { ext: ["markdown"] }, title: undefined }
      )
    ).toEqual({ pages: { dir: "pages", ext: ["markdown"] }, title: "A" });
  });
});
