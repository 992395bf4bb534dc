/**
 * `quire build [path]`: builds the site rooted at `path` (default: the
 * working directory).
 *
 * @module
 */

import { Command } from "commander";
import { createLogger } from "../../core/logging/ContextualLogger.js";
import { ErrorPresenter } from "../errors/ErrorPresenter.js";
import { formatBuildOutput, handleBuild } from "../handlers/buildHandler.js";
import type { CliUx } from "../ux/CliUx.js";
import { CliUxLogSink } from "../ux/CliUxLogSink.js";

interface BuildCommandOptions {
  drafts?: boolean;
  dryRun?: boolean;
  page?: string;
  destination?: string;
  config?: string;
  baseurl?: string;
}

/**
 * Builds the `build` command. `getUx` is called when the command runs, after
 * the global flags have set the output level.
 */
export function buildBuildCommand(getUx: () => CliUx): Command {
  return new Command("build")
    .description("Build the site")
    .argument("[path]", "Site root directory", ".")
    .option("-d, --drafts", "Include pages marked as drafts")
    .option("--dry-run", "Run every step but write nothing")
    .option("-p, --page <file>", "Build only this page (relative to the pages directory)")
    .option("--destination <dir>", "Output directory (relative to the site root)")
    .option("-c, --config <file>", "Configuration file (relative to the site root)")
    .option("--baseurl <url>", "Override the configured base URL")
    .action(async (sitePath: string, options: BuildCommandOptions) => {
      const ux = getUx();
      const debug = ux.getLevel() === "debug";
      const logger = createLogger({
        sink: new CliUxLogSink(ux),
        minLevel: debug ? "debug" : "info",
        debug,
      });

      try {
        const result = await handleBuild(
          {
            path: sitePath,
            drafts: options.drafts,
            dryRun: options.dryRun,
            page: options.page,
            destination: options.destination,
            config: options.config,
            baseurl: options.baseurl,
          },
          { logger }
        );

        for (const line of formatBuildOutput(result)) {
          ux.print(`  ${line}`);
        }
        const trace = result.trace?.toHumanString() ?? "";
        if (trace !== "") {
          ux.print(trace, "verbose");
        }
      } catch (error) {
        const presenter = new ErrorPresenter({
          output: (line) => process.stderr.write(line + "\n"),
          debug,
        });
        process.exitCode = presenter.present(error);
      }
    });
}
