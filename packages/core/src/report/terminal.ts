import chalk from "chalk";
import Table from "cli-table3";
import { summarisePerClient, summarisePerTag, summariseResults, type RunStatistics } from "../orchestrator/analytics.js";
import type { RunResult, RunStatus, SuiteResult } from "../orchestrator/types.js";

export function printTerminalReport(suite: SuiteResult): void {
  console.log();
  console.log(chalk.bold("  Botrun — Test Results"));
  console.log(chalk.dim("  " + "─".repeat(50)));
  console.log();

  const table = new Table({
    head: [
      chalk.bold("Run"),
      chalk.bold("Result"),
      chalk.bold("Iter/Att"),
      chalk.bold("Logs"),
      chalk.bold("Assertions"),
      chalk.bold("Duration"),
    ],
    style: { head: [], border: [] },
    colWidths: [35, 10, 10, 10, 14, 12],
  });

  for (const result of suite.results) {
    const expectations = [...result.serverExpectations, ...result.clientExpectations];
    const matched = expectations.filter((e) => e.matched).length;
    const passedAssertions = result.assertions.filter((a) => a.passed).length;

    table.push([
      truncate(result.description, 33),
      statusLabel(result.status),
      result.status === "skipped" ? chalk.dim("-") : `${result.iteration}/${result.attempt}`,
      ratio(matched, expectations.length),
      ratio(passedAssertions, result.assertions.length),
      result.status === "skipped" ? chalk.dim("-") : formatDuration(result.durationMs),
    ]);
  }

  console.log(table.toString());
  console.log();

  printFailures(suite.results);

  const stats = summariseResults(suite.results);
  printCategories(stats);
  printBreakdown("Clients", summarisePerClient(suite.results));
  printBreakdown("Tags", summarisePerTag(suite.results));

  const summary = [
    chalk.bold(`  ${suite.runs.length} runs`),
    chalk.green(`${suite.runs.filter((r) => r.status === "passed").length} passed`),
    countOf(suite, "failed", chalk.red),
    countOf(suite, "aborted", chalk.magenta),
    countOf(suite, "skipped", chalk.yellow),
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));

  console.log(summary);
  if (stats.retries > 0) {
    console.log(chalk.dim(`  ${stats.retries} retries, ${stats.flakySuccesses} passed on retry`));
  }
  console.log(chalk.dim(`  Completed in ${formatDuration(suite.durationMs)}`));
  for (const error of suite.cleanupErrors ?? []) {
    console.log(chalk.yellow(`  Cleanup: ${error}`));
  }
  console.log();
}

function printFailures(results: readonly RunResult[]): void {
  const failed = results.filter((r) => r.status === "failed" || r.status === "aborted");
  if (failed.length === 0) return;

  console.log(chalk.red.bold("  Failures:"));
  console.log();
  for (const result of failed) {
    console.log(chalk.red(`  ✗ ${result.description} (iteration ${result.iteration}, attempt ${result.attempt})`));
    for (const failure of result.failures) {
      console.log(chalk.dim(`    [${failure.category}] ${failure.subject}: ${failure.message}`));
    }
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`    warning: ${warning}`));
    }
    console.log();
  }
}

function printCategories(stats: RunStatistics): void {
  const entries = Object.entries(stats.failureCategories);
  if (entries.length === 0) return;
  const parts = entries.sort(([a], [b]) => a.localeCompare(b)).map(([category, n]) => `${category} ${n}`);
  console.log(chalk.dim(`  Failure categories: ${parts.join(", ")}`));
  console.log();
}

function printBreakdown(title: string, groups: Record<string, RunStatistics>): void {
  const names = Object.keys(groups);
  if (names.length < 2) return;
  console.log(chalk.bold(`  ${title}:`));
  for (const name of names.sort()) {
    const s = groups[name];
    const p90 = s.p90DurationMs !== undefined ? `, p90 ${formatDuration(s.p90DurationMs)}` : "";
    console.log(chalk.dim(`    ${name}: ${s.successfulRuns}/${s.totalRuns} passed${p90}`));
  }
  console.log();
}

function statusLabel(status: RunStatus): string {
  switch (status) {
    case "passed":
      return chalk.green("PASS");
    case "failed":
      return chalk.red("FAIL");
    case "aborted":
      return chalk.magenta("ABORT");
    case "skipped":
      return chalk.yellow("SKIP");
  }
}

function ratio(passed: number, total: number): string {
  if (total === 0) return chalk.dim("-");
  return passed === total ? chalk.green(`${passed}/${total}`) : chalk.yellow(`${passed}/${total}`);
}

function countOf(suite: SuiteResult, status: RunStatus, paint: (s: string) => string): string | null {
  const n = suite.runs.filter((r) => r.status === status).length;
  return n > 0 ? paint(`${n} ${status}`) : null;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + "…";
}
