/**
 * Tests for the build command handler.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { formatBuildOutput, handleBuild } from "../src/cli/handlers/buildHandler.js";
import { Builder, type BuilderOptions } from "../src/core/build/Builder.js";
import { BuildError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { createLogger } from "../src/core/logging/ContextualLogger.js";
import { pathExists } from "../src/core/utils/paths.js";
import { InMemoryLogSink, cleanupTestDir, createTestDir, writeFiles } from "./helpers.js";

describe("handleBuild", () => {
  let siteDir: string;
  let sink: InMemoryLogSink;

  beforeEach(async () => {
    siteDir = await createTestDir("handler");
    sink = new InMemoryLogSink();
    await writeFiles(siteDir, {
      "pages/index.md": "---\ntitle: Home\n---\nHello\n",
      "layouts/_default/page.hbs": "{{page.title}}",
      "static/robots.txt": "User-agent: *\n",
    });
  });

  afterEach(async () => {
    await cleanupTestDir(siteDir);
  });

  it("builds the site under the working directory", async () => {
    const result = await handleBuild(
      { baseurl: "https://example.com/" },
      { logger: createLogger({ sink }), cwd: siteDir }
    );

    expect(result.sourceDir).toBe(path.resolve(siteDir));
    expect(result.destinationDir).toBe(path.resolve(siteDir, "_site"));
    expect(result.dryRun).toBe(false);
    expect(result.pageCount).toBe(2);
    expect(result.staticFileCount).toBe(1);
    expect(result.trace?.toArray().every((entry) => entry.status === "completed")).toBe(true);
    expect(await fs.readFile(path.join(siteDir, "_site", "index.html"), "utf-8")).toBe("Home");
  });

  it("honors the destination and dry-run flags", async () => {
    const result = await handleBuild(
      { path: siteDir, destination: "public", dryRun: true, baseurl: "https://example.com/" },
      { logger: createLogger({ sink }) }
    );

    expect(result.destinationDir).toBe(path.resolve(siteDir, "public"));
    expect(result.dryRun).toBe(true);
    expect(await pathExists(path.join(siteDir, "public"))).toBe(false);
  });

  it("passes the loaded configuration and logger to the builder", async () => {
    const logger = createLogger({ sink });
    let received: BuilderOptions | undefined;

    await handleBuild(
      { path: siteDir, baseurl: "https://docs.example.com/", dryRun: true },
      {
        logger,
        createBuilder: (options) => {
          received = options;
          return Builder.create(options);
        },
      }
    );

    expect(received?.logger).toBe(logger);
    expect(received?.config?.baseurl).toBe("https://docs.example.com/");
  });

  it("fails with CONFIG_NOT_FOUND for a missing --config file", async () => {
    const error = await handleBuild(
      { path: siteDir, config: "missing.yml" },
      { logger: createLogger({ sink }) }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BuildError);
    expect(error instanceof BuildError ? error.code : undefined).toBe(ErrorCode.CONFIG_NOT_FOUND);
  });
});

describe("formatBuildOutput", () => {
  it("lists counts and the output directory", () => {
    expect(
      formatBuildOutput({
        sourceDir: "/site",
        destinationDir: "/site/_site",
        dryRun: false,
        pageCount: 4,
        staticFileCount: 2,
        trace: null,
      })
    ).toEqual(["Pages: 4", "Static files: 2", "Output: /site/_site"]);
  });

  it("mentions dry runs", () => {
    expect(
      formatBuildOutput({
        sourceDir: "/site",
        destinationDir: "/site/_site",
        dryRun: true,
        pageCount: 0,
        staticFileCount: 0,
        trace: null,
      })
    ).toEqual(["Pages: 0", "Static files: 0", "Dry run: nothing was written"]);
  });
});
