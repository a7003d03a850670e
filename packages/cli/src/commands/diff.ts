import { resolve } from "node:path";
import chalk from "chalk";
import Table from "cli-table3";
import {
  SqliteHistoryStore,
  compareVersions,
  formatDuration,
  type DiffReport,
  type DiffStatus,
  type Regression,
  type RunDiff,
  type RunSnapshot,
} from "@botrun/core";
import { loadConfig } from "../config.js";

export interface DiffOptions {
  before: string;
  after: string;
  config?: string;
  threshold?: number;
  json?: boolean;
}

export async function runDiff(options: DiffOptions): Promise<DiffReport> {
  const loaded = await loadConfig({ configPath: options.config });
  const settings = loaded.config.botrun;
  const store = new SqliteHistoryStore(resolve(loaded.baseDir, settings.store.path));

  try {
    const result = compareVersions(store, options.before, options.after, {
      durationThreshold: options.threshold ?? settings.diff.durationThreshold,
    });

    if (options.json) {
      console.log(JSON.stringify({ ...result.diff, regressions: result.regressions }, null, 2));
    } else {
      console.log();
      console.log(chalk.bold("  Botrun — Diff"));
      console.log(chalk.dim("  " + "─".repeat(40)));
      console.log();
      printDiffTable(result.diff, result.regressions);
    }

    process.exitCode = result.exitCode;
    return result.diff;
  } finally {
    store.close();
  }
}

function printDiffTable(diff: DiffReport, regressions: readonly Regression[]): void {
  console.log(chalk.bold(`  Comparing: ${diff.beforeVersion} → ${diff.afterVersion}`));
  console.log();

  const table = new Table({
    head: [
      chalk.bold("Run"),
      chalk.bold(diff.beforeVersion),
      chalk.bold(diff.afterVersion),
      chalk.bold("Duration"),
      chalk.bold("Status"),
    ],
    style: { head: [], border: [] },
  });

  for (const run of diff.runs) {
    table.push(formatDiffRow(run));
  }

  console.log(table.toString());
  console.log();

  const parts = [
    `${diff.summary.total} runs`,
    diff.summary.stable > 0 ? chalk.dim(`${diff.summary.stable} stable`) : null,
    diff.summary.improvements > 0 ? chalk.green(`${diff.summary.improvements} improved`) : null,
    diff.summary.regressions > 0 ? chalk.red(`${diff.summary.regressions} regressed`) : null,
    diff.summary.added > 0 ? chalk.yellow(`${diff.summary.added} added`) : null,
    diff.summary.removed > 0 ? chalk.yellow(`${diff.summary.removed} removed`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));

  console.log(`  ${parts}`);

  if (regressions.length > 0) {
    console.log();
    console.log(chalk.red.bold(`  ⚠ ${regressions.length} regression(s) detected`));
    for (const regression of regressions) {
      console.log(chalk.red(`    ${regression.description || regression.runId}: ${regression.reason}`));
    }
  }
  console.log();
}

function formatDiffRow(run: RunDiff): string[] {
  const deltaCol =
    run.durationChange !== undefined
      ? formatDelta(run.durationChange)
      : run.status === "added"
        ? chalk.yellow("new")
        : run.status === "removed"
          ? chalk.yellow("removed")
          : chalk.dim("—");

  return [
    truncate(run.description || run.runId, 32),
    formatSnapshot(run.before),
    formatSnapshot(run.after),
    deltaCol,
    formatStatus(run.status),
  ];
}

function formatSnapshot(snapshot: RunSnapshot | undefined): string {
  if (!snapshot) return chalk.dim("—");
  const label =
    snapshot.status === "passed"
      ? chalk.green("PASS")
      : snapshot.status === "skipped"
        ? chalk.yellow("SKIP")
        : snapshot.status === "aborted"
          ? chalk.magenta("ABORT")
          : chalk.red("FAIL");
  return snapshot.averageDurationMs !== undefined
    ? `${label} ${chalk.dim(formatDuration(snapshot.averageDurationMs))}`
    : label;
}

// Slower is worse.
function formatDelta(change: number): string {
  const pct = Math.round(change * 100);
  if (pct === 0) return chalk.dim("—");
  if (pct > 0) return chalk.red(`+${pct}%`);
  return chalk.green(`${pct}%`);
}

function formatStatus(status: DiffStatus): string {
  switch (status) {
    case "regression":
      return chalk.red.bold("REGRESSED");
    case "improvement":
      return chalk.green("improved");
    case "stable":
      return chalk.dim("stable");
    case "added":
      return chalk.yellow("added");
    case "removed":
      return chalk.yellow("removed");
  }
}

function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + "…";
}
