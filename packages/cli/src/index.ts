#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import chalk from "chalk";
import { isConfigError, toErrorMessage } from "@botrun/core";
import { runInit } from "./commands/init.js";
import { runRun, type RunOptions } from "./commands/run.js";
import { runExpand, type ExpandOptions } from "./commands/expand.js";
import { runDiff, type DiffOptions } from "./commands/diff.js";

const require = createRequire(import.meta.url);

function readPackageVersion(): string {
  const pkg: unknown = require("../package.json");
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const packageVersion = process.env.BOTRUN_CLI_VERSION ?? readPackageVersion();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function seconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError("Expected a number of seconds.");
  return n;
}

function positiveSeconds(value: string): number {
  const n = seconds(value);
  if (n === 0) throw new InvalidArgumentError("Expected a positive number of seconds.");
  return n;
}

function ratio(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative ratio, e.g. 0.2.");
  return n;
}

/** Configuration problems exit with 2; anything else with 1. */
function handled<A extends unknown[]>(fn: (...args: A) => Promise<unknown>): (...args: A) => Promise<void> {
  return async (...args) => {
    try {
      await fn(...args);
    } catch (e) {
      console.error();
      console.error(chalk.red(`  Error: ${toErrorMessage(e)}`));
      console.error();
      process.exitCode = isConfigError(e) ? 2 : 1;
    }
  };
}

const program = new Command();

program
  .name("botrun")
  .description("Scripted bot scenarios against a SA-MP server, with log expectations and history")
  .version(packageVersion);

program
  .command("init")
  .description("Create a starter botrun.config.json and scenarios/ directory")
  .action(handled(() => runInit()));

program
  .command("run")
  .description("Run the configured bot suite")
  .option("-c, --config <file>", "Configuration file (default: searched from the working directory)")
  .option("--package-dir <dir>", "Generated server package directory")
  .option("--scenarios <dir>", "Extra directory of *.json scenario files")
  .option("--only <token>", "Only runs whose id, description, scenario or tag matches (repeatable)", collect, [])
  .option("--skip <token>", "Skip runs whose id, description, scenario or tag matches (repeatable)", collect, [])
  .option("--var <key=value>", "Override a scenario variable (repeatable)", collect, [])
  .option("--retries <n>", "Retry each failed iteration at least this many times", nonNegativeInt)
  .option("--grace-period <seconds>", "Pause before a retry, where the run sets none", seconds)
  .option("--timeout <seconds>", "Abort an attempt after this long, where the run sets no timeout", positiveSeconds)
  .option("--fail-fast", "Stop after the first run that does not pass")
  .option("--dry-run", "Use file-based dummy clients against an already running server")
  .option("--gta-dir <dir>", "GTA San Andreas directory for wine clients")
  .option("--record-playback-dir <dir>", "Write each client's playback log here")
  .option("--screenshot-dir <dir>", "Where screenshot actions save captures")
  .option("--server-log-dir <dir>", "Export each run's server log here")
  .option("--client-log-dir <dir>", "Export each run's client logs here")
  .option("--scripts-dir <dir>", "Write the expanded scenarios here before running")
  .option("--report-json <file>", "Write a JSON report")
  .option("--report-html <file>", "Write an HTML report")
  .option("--save", "Save results to the history store")
  .option("--label <label>", "Version label for saved results")
  .action(
    handled(async (options: Omit<RunOptions, "vars"> & { var: string[] }) => {
      const { var: vars, ...rest } = options;
      await runRun({ ...rest, vars });
    })
  );

program
  .command("expand")
  .description("Print the fully expanded scenarios, or write them as JSON")
  .option("-c, --config <file>", "Configuration file")
  .option("--scenarios <dir>", "Extra directory of *.json scenario files")
  .option("--var <key=value>", "Override a scenario variable (repeatable)", collect, [])
  .option("-o, --output <dir>", "Write one <slug>.json per scenario here")
  .option("--json", "Print as JSON")
  .action(
    handled(async (options: Omit<ExpandOptions, "vars"> & { var: string[] }) => {
      const { var: vars, ...rest } = options;
      await runExpand({ ...rest, vars });
    })
  );

program
  .command("diff")
  .description("Compare saved results between two versions")
  .requiredOption("--before <version>", "Base version (or latest / previous)")
  .requiredOption("--after <version>", "Target version (or latest / previous)")
  .option("-c, --config <file>", "Configuration file")
  .option("--threshold <ratio>", "Relative slowdown that counts as a regression", ratio)
  .option("--json", "Output diff as JSON")
  .action(handled((options: DiffOptions) => runDiff(options)));

await program.parseAsync();
