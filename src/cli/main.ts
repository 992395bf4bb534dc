#!/usr/bin/env node
import { Command } from "commander";
import { getVersion } from "../core/version/VersionResolver.js";
import { buildBuildCommand } from "./commands/build.js";
import { ErrorPresenter } from "./errors/ErrorPresenter.js";
import { createCliUx, parseUxLevel, type CliUx } from "./ux/CliUx.js";

async function main(): Promise<void> {
  let ux: CliUx = createCliUx({ level: "info" });

  const program = new Command()
    .name("quire")
    .description("Quire - static site builder")
    .version(getVersion())
    .option("--verbose", "Show additional context and per-step timings", false)
    .option("--debug", "Show all output including debug traces", false)
    .option("--silent", "Suppress all output except errors", false);

  // Output level must be known before any command runs
  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    ux = createCliUx({
      level: parseUxLevel({
        verbose: opts.verbose === true,
        debug: opts.debug === true,
        silent: opts.silent === true,
      }),
    });
  });

  program.addCommand(buildBuildCommand(() => ux));

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const presenter = new ErrorPresenter({ debug: program.opts().debug === true });
    process.exitCode = presenter.present(err);
  }
}

void main();
