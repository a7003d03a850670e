import { isAbsolute, join, resolve } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import chalk from "chalk";
import {
  OrchestratorContext,
  SqliteHistoryStore,
  TestOrchestrator,
  applyRunDefaults,
  buildRunPlan,
  createClients,
  createServer,
  formatDuration,
  generateHtmlReport,
  generateJsonReport,
  loadScenarioFiles,
  printTerminalReport,
  registerScript,
  selectRuns,
  type OrchestratorEvent,
  type ScenarioDefinition,
  type SuiteResult,
} from "@botrun/core";
import { loadConfig, parseVarOverrides } from "../config.js";

export interface RunOptions {
  config?: string;
  packageDir?: string;
  scenarios?: string;
  only: string[];
  skip: string[];
  vars: string[];
  retries?: number;
  gracePeriod?: number;
  timeout?: number;
  failFast?: boolean;
  dryRun?: boolean;
  gtaDir?: string;
  recordPlaybackDir?: string;
  screenshotDir?: string;
  serverLogDir?: string;
  clientLogDir?: string;
  scriptsDir?: string;
  reportJson?: string;
  reportHtml?: string;
  save?: boolean;
  label?: string;
}

export async function runRun(options: RunOptions): Promise<SuiteResult> {
  console.log();
  console.log(chalk.bold("  Botrun — Running suite"));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();

  const loaded = await loadConfig({ configPath: options.config });
  const settings = loaded.config.botrun;
  const packageDir = resolve(loaded.baseDir, options.packageDir ?? settings.packageDir ?? ".");
  const inPackage = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : isAbsolute(path) ? path : join(packageDir, path);

  const extraScenarios: ScenarioDefinition[] = [];
  const scenariosDir = options.scenarios ?? settings.scenariosDir;
  if (scenariosDir) {
    const dir = resolve(loaded.baseDir, scenariosDir);
    console.log(chalk.dim(`  Loading scenarios from ${dir}...`));
    const { scenarios, warnings } = await loadScenarioFiles(dir);
    for (const warning of warnings) console.log(chalk.yellow(`  Warning: ${warning}`));
    extraScenarios.push(...scenarios);
  }

  const plan = buildRunPlan(loaded.config, {
    overrides: parseVarOverrides(options.vars),
    extraScenarios,
    baseDir: packageDir,
  });
  const runs = selectRuns(
    applyRunDefaults(plan.runs, plan.clients, {
      retries: options.retries,
      gracePeriodMs: options.gracePeriod !== undefined ? options.gracePeriod * 1000 : undefined,
      timeoutMs: options.timeout !== undefined ? options.timeout * 1000 : undefined,
      recordPlaybackDir: inPackage(options.recordPlaybackDir),
      serverLogDir: inPackage(options.serverLogDir),
      clientLogDir: inPackage(options.clientLogDir),
    }),
    { only: options.only, skip: options.skip }
  );

  if (runs.length === 0) {
    console.log(chalk.yellow("  No runs selected."));
    console.log();
  } else {
    console.log(chalk.dim(`  ${runs.length} run(s), ${plan.clients.length} client(s)${options.dryRun ? ", dry run" : ""}`));
    console.log();
  }

  const scriptsDir = inPackage(options.scriptsDir);
  if (scriptsDir) {
    const used = new Set<string>();
    for (const run of runs) await registerScript(scriptsDir, run.scenario, used);
    console.log(chalk.dim(`  Expanded scenarios → ${scriptsDir}`));
  }

  const factory = {
    packageDir,
    dryRun: options.dryRun,
    gtaDir: options.gtaDir,
    screenshotDir: inPackage(options.screenshotDir),
  };
  const controller = new AbortController();
  const onSigint = (): void => controller.abort(new Error("Interrupted"));
  process.once("SIGINT", onSigint);

  let suite: SuiteResult;
  try {
    suite = await OrchestratorContext.run(
      { server: createServer(plan.server, factory), clients: createClients(plan.clients, factory) },
      (context) =>
        new TestOrchestrator({ context, onEvent: logEvent }).runSuite(runs, {
          signal: controller.signal,
          failFast: options.failFast || plan.failFast,
        })
    );
  } finally {
    process.off("SIGINT", onSigint);
  }

  printTerminalReport(suite);

  if (options.save) {
    const dbPath = resolve(loaded.baseDir, settings.store.path);
    const version = options.label ?? `run-${new Date().toISOString().replace(/[:.]/g, "-")}`;
    const store = new SqliteHistoryStore(dbPath);
    try {
      const meta = store.saveSuite(version, suite, { packageDir });
      console.log(chalk.dim(`  Saved as version "${version}" (${meta.id.slice(0, 8)})`));
    } finally {
      store.close();
    }
    console.log();
  }

  const meta = { version: options.label, packageDir };
  if (options.reportJson) {
    const path = resolve(options.reportJson);
    await writeReport(path, generateJsonReport(suite, meta));
    console.log(chalk.dim(`  JSON report → ${path}`));
  }
  if (options.reportHtml) {
    const path = resolve(options.reportHtml);
    await writeReport(path, generateHtmlReport(suite, meta));
    console.log(chalk.dim(`  HTML report → ${path}`));
  }
  if (options.reportJson || options.reportHtml) console.log();

  process.exitCode = suite.status === "passed" ? 0 : 1;
  return suite;
}

async function writeReport(path: string, body: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, body, "utf-8");
}

function logEvent(event: OrchestratorEvent): void {
  switch (event.type) {
    case "server:ready":
      console.log(chalk.dim(`  Server ready at ${event.address}`));
      return;
    case "attempt:start":
      console.log(chalk.dim(`  ▸ ${event.run.id} (iteration ${event.iteration}, attempt ${event.attempt})`));
      return;
    case "attempt:end": {
      const { result } = event;
      const paint = result.status === "passed" ? chalk.green : result.status === "aborted" ? chalk.magenta : chalk.red;
      console.log(`    ${paint(result.status)} ${chalk.dim(formatDuration(result.durationMs))}`);
      return;
    }
    case "attempt:retry":
      console.log(chalk.yellow(`    retrying in ${formatDuration(event.gracePeriodMs)} (attempt ${event.nextAttempt})`));
      return;
    case "run:skipped":
      console.log(chalk.yellow(`  ▸ ${event.run.id} skipped: ${event.reason}`));
      return;
    case "suite:start":
    case "suite:end":
      return;
  }
}
