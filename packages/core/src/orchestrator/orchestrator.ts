import { mkdir, writeFile } from "node:fs/promises";
import { dirname, extname, join } from "node:path";
import { performance } from "node:perf_hooks";
import {
  AbortedError,
  StartupError,
  UnknownReferenceError,
  isConfigError,
  toErrorMessage,
} from "../errors.js";
import type { ExpectationResult } from "../monitor/matcher.js";
import type { LogMonitor } from "../monitor/log-monitor.js";
import type { BotClient } from "../process/client.js";
import type { ConditionWaiter, PlaybackLog, WaitOutcome, WaitRequest } from "../runner/types.js";
import { linkSignals, sleep as defaultSleep, type Sleep } from "../util/async.js";
import { evaluateAssertions } from "./assertions.js";
import type { OrchestratorContext } from "./context.js";
import type {
  ClientLogExportResult,
  ClientRunResult,
  Failure,
  FailureCategory,
  OrchestratorEvent,
  RunContext,
  RunResult,
  RunStatus,
  RunSummary,
  SuiteResult,
} from "./types.js";

export interface OrchestratorOptions {
  context: OrchestratorContext;
  sleep?: Sleep;
  /** Monotonic ms clock. */
  now?: () => number;
  onEvent?: (event: OrchestratorEvent) => void;
  /** Lines of server log kept in a result when the run collects it. */
  excerptLines?: number;
}

export interface RunSuiteOptions {
  signal?: AbortSignal;
  /** Stop after the first run that does not pass. */
  failFast?: boolean;
}

interface DrivenClient {
  result: ClientRunResult;
  category?: FailureCategory;
}

/**
 * Runs a suite sequentially: every run is attempted `iterations` times, each
 * iteration retried up to `retries` times until it passes. Within an attempt
 * every client is driven concurrently while the log monitors watch.
 */
export class TestOrchestrator {
  private readonly context: OrchestratorContext;
  private readonly pause: Sleep;
  private readonly now: () => number;
  private readonly onEvent: (event: OrchestratorEvent) => void;
  private readonly excerptLines: number;
  private serverAddress: string | undefined;

  constructor(options: OrchestratorOptions) {
    this.context = options.context;
    this.pause = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => performance.now());
    this.onEvent = options.onEvent ?? (() => {});
    this.excerptLines = options.excerptLines ?? 200;
  }

  async runSuite(runs: readonly RunContext[], options: RunSuiteOptions = {}): Promise<SuiteResult> {
    const { signal } = options;
    const startedAt = new Date().toISOString();
    const origin = this.now();
    const results: RunResult[] = [];
    const summaries: RunSummary[] = [];
    let stopReason: string | undefined;

    this.onEvent({ type: "suite:start", runs: runs.length });

    for (const run of runs) {
      if (!stopReason && signal?.aborted) stopReason = "suite aborted";
      if (stopReason) {
        results.push(skippedResult(run, stopReason));
        summaries.push({ runId: run.id, description: run.description, status: "skipped", attempts: 0, iterations: 0 });
        this.onEvent({ type: "run:skipped", run, reason: stopReason });
        continue;
      }

      const { summary, attempts } = await this.executeRun(run, signal);
      results.push(...attempts);
      summaries.push(summary);

      if (signal?.aborted) stopReason = "suite aborted";
      else if (summary.status !== "passed" && (options.failFast || run.failFast)) {
        stopReason = `fail-fast: run "${run.id}" did not pass`;
      }
    }

    const suite: SuiteResult = {
      status: signal?.aborted
        ? "aborted"
        : summaries.some((s) => s.status === "failed" || s.status === "aborted")
          ? "failed"
          : "passed",
      startedAt,
      durationMs: this.now() - origin,
      results,
      runs: summaries,
    };
    this.onEvent({ type: "suite:end", suite });
    return suite;
  }

  /** All iterations and attempts of one run. */
  async executeRun(run: RunContext, signal?: AbortSignal): Promise<{ summary: RunSummary; attempts: RunResult[] }> {
    const attempts: RunResult[] = [];
    let status: RunStatus = "passed";
    let iterations = 0;

    for (let iteration = 1; iteration <= run.iterations; iteration++) {
      if (iteration > 1 && !(await this.wait(run.intervalMs, signal))) break;
      iterations = iteration;

      let last: RunResult | undefined;
      for (let attempt = 1; attempt <= 1 + run.retries; attempt++) {
        if (attempt > 1) {
          this.onEvent({ type: "attempt:retry", run, iteration, nextAttempt: attempt, gracePeriodMs: run.gracePeriodMs });
          if (!(await this.wait(run.gracePeriodMs, signal))) break;
        }
        last = await this.runAttempt(run, iteration, attempt, signal);
        attempts.push(last);
        if (last.status === "passed" || signal?.aborted) break;
      }

      // A later success supersedes earlier failed attempts of the same iteration.
      if (last && last.status !== "passed" && status !== "failed") status = last.status;
      if (signal?.aborted) break;
    }

    if (signal?.aborted && status === "passed" && iterations < run.iterations) status = "aborted";
    return {
      summary: { runId: run.id, description: run.description, status, attempts: attempts.length, iterations },
      attempts,
    };
  }

  /** One attempt; always yields exactly one result. */
  async runAttempt(run: RunContext, iteration: number, attempt: number, parent?: AbortSignal): Promise<RunResult> {
    const scope = linkSignals(parent);
    const timer =
      run.timeoutMs !== undefined
        ? setTimeout(() => scope.abort(new AbortedError(`Run timed out after ${run.timeoutMs}ms`)), run.timeoutMs)
        : undefined;
    const signal = scope.signal;
    const startedAt = new Date().toISOString();
    const origin = this.now();
    const failures: Failure[] = [];
    const warnings: string[] = [];

    const result: RunResult = {
      runId: run.id,
      description: run.description,
      slug: run.slug,
      scenario: run.scenario.name,
      tags: run.tags,
      status: "passed",
      iteration,
      attempt,
      startedAt,
      durationMs: 0,
      clients: [],
      serverExpectations: [],
      clientExpectations: [],
      assertions: [],
      failures,
      clientLogExports: [],
      warnings,
    };
    this.onEvent({ type: "attempt:start", run, iteration, attempt });

    try {
      await this.attempt(run, result, signal);
    } catch (e) {
      if (isConfigError(e)) throw e;
      failures.push({
        category: signal.aborted ? "aborted" : e instanceof StartupError ? "startup" : "client",
        subject: run.id,
        message: toErrorMessage(e),
      });
    } finally {
      if (timer) clearTimeout(timer);
      scope.dispose();
    }

    if (signal.aborted && !failures.some((f) => f.category === "aborted")) {
      failures.push({ category: "aborted", subject: run.id, message: toErrorMessage(signal.reason) });
    }
    result.status = signal.aborted ? "aborted" : failures.length > 0 ? "failed" : "passed";
    result.durationMs = this.now() - origin;
    this.onEvent({ type: "attempt:end", run, result });
    return result;
  }

  private async attempt(run: RunContext, result: RunResult, signal: AbortSignal): Promise<void> {
    const origin = this.now();
    if (run.waitBeforeMs > 0) await this.pause(run.waitBeforeMs, signal);

    let address: string;
    try {
      address = await this.context.ensureServer(signal);
    } catch (e) {
      if (isConfigError(e)) throw e;
      result.failures.push({
        category: signal.aborted ? "aborted" : "startup",
        subject: "server",
        message: toErrorMessage(e),
      });
      return;
    }
    if (this.serverAddress !== address) {
      this.serverAddress = address;
      this.onEvent({ type: "server:ready", address });
    }

    const clients = run.clients.map((name) => {
      const client = this.context.client(name);
      if (!client) throw new UnknownReferenceError("client", name, `run "${run.id}"`);
      return client;
    });
    const serverMonitor = this.context.server.logMonitor;
    const clientMonitors = new Map<string, LogMonitor>();
    for (const client of clients) {
      for (const monitor of client.logMonitors()) clientMonitors.set(monitor.name, monitor);
    }
    await Promise.all([serverMonitor, ...clientMonitors.values()].map((m) => m.begin()));
    for (const client of clients) client.clearScreenshots();

    const clientTargets = run.clientExpectations.map((expectation) => {
      const monitor = clientMonitors.get(`${expectation.client}:${expectation.log}`);
      if (!monitor) throw new UnknownReferenceError("log", `${expectation.client}:${expectation.log}`, `run "${run.id}"`);
      return { expectation, monitor };
    });
    const serverWatch = Promise.all(run.serverExpectations.map((e) => serverMonitor.watch(e, signal)));
    const clientWatch = Promise.all(clientTargets.map(({ expectation, monitor }) => monitor.watch(expectation, signal)));

    const driven = await Promise.all(
      clients.map((client) =>
        this.driveClient(client, run, address, signal, this.waiterFor(client, serverMonitor, clientMonitors))
      )
    );
    const [serverResults, clientResults] = await Promise.all([serverWatch, clientWatch]);
    const durationMs = this.now() - origin;
    // Pick up whatever was logged after the last watcher finished.
    await Promise.all([serverMonitor, ...clientMonitors.values()].map((m) => m.settle()));

    result.clients = driven.map((d) => d.result);
    result.serverExpectations = serverResults;
    result.clientExpectations = clientResults;

    for (const { result: client, category } of driven) {
      if (category) {
        result.failures.push({ category, subject: client.client, message: client.error ?? `client ${client.status}` });
      }
    }
    if (!signal.aborted) {
      for (const e of serverResults) {
        if (!e.matched) result.failures.push({ category: "server_log", subject: e.name, message: describeMiss(e) });
      }
      for (const e of clientResults) {
        if (!e.matched) result.failures.push({ category: "client_log", subject: `${e.source} ${e.name}`, message: describeMiss(e) });
      }
    }

    const iterationTag = result.iteration > 1 || result.attempt > 1 ? `_i${result.iteration}_a${result.attempt}` : "";
    await this.recordPlayback(run, result);
    await this.collectServerLog(run, result, serverMonitor, iterationTag);
    await this.exportClientLogs(run, result, clientMonitors, iterationTag);

    result.assertions = evaluateAssertions(run.assertions, {
      durationMs,
      clients: result.clients,
      serverLines: serverMonitor.lines().map((l) => l.text),
      clientLines: new Map([...clientMonitors].map(([key, m]) => [key, m.lines().map((l) => l.text)])),
    });
    for (const assertion of result.assertions) {
      if (!assertion.passed) {
        result.failures.push({
          category: "assertion",
          subject: assertion.name,
          message: assertion.message ?? `${assertion.type} failed`,
        });
      }
    }
  }

  /** connect → setup → scenario → teardown → disconnect. */
  private async driveClient(
    client: BotClient,
    run: RunContext,
    address: string,
    signal: AbortSignal,
    waiter: ConditionWaiter
  ): Promise<DrivenClient> {
    const result: ClientRunResult = { client: client.name, status: "not_started", screenshots: [] };
    try {
      if (!client.isConnected()) await client.connect(address, signal);
    } catch (e) {
      if (isConfigError(e)) throw e;
      result.error = toErrorMessage(e);
      return { result, category: signal.aborted ? "aborted" : e instanceof StartupError ? "startup" : "client" };
    }

    const options = { label: client.name, signal, waiter };
    try {
      if (client.setupActions.length > 0) {
        result.setup = await client.execute(client.setupActions, { ...options, phase: "setup" });
      }
      if (!result.setup || result.setup.outcome === "completed") {
        result.playback = await client.execute(run.scenario.actions, { ...options, phase: "scenario" });
      }
      if (client.teardownActions.length > 0 && !signal.aborted) {
        result.teardown = await client.execute(client.teardownActions, { ...options, phase: "teardown" });
      }
    } finally {
      try {
        await client.disconnect();
      } catch (e) {
        result.error = `disconnect failed: ${toErrorMessage(e)}`;
      }
      result.screenshots = [...client.screenshots()];
    }

    const stopped = [result.setup, result.playback, result.teardown].find(
      (log): log is PlaybackLog => log !== undefined && log.outcome !== "completed"
    );
    if (!stopped) {
      result.status = "completed";
      return { result };
    }
    result.status = stopped.outcome;
    result.error = `${stopped.phase}: ${stopped.error ?? stopped.outcome}`;
    return { result, category: stopped.outcome === "aborted" ? "aborted" : "client" };
  }

  /** Routes `wait_for` sources: `server`, `client`, `client:<log>` or `<client>:<log>`. */
  private waiterFor(
    client: BotClient,
    server: LogMonitor,
    clientMonitors: ReadonlyMap<string, LogMonitor>
  ): ConditionWaiter {
    const own = client.logMonitors();
    return {
      waitFor(request: WaitRequest, signal?: AbortSignal): Promise<WaitOutcome> {
        const { source } = request;
        let monitor: LogMonitor | undefined;
        if (source === "server") monitor = server;
        else if (source === "client") monitor = own.find((m) => m.logName === "chatlog") ?? own[0];
        else if (source.startsWith("client:")) monitor = own.find((m) => m.logName === source.slice(7));
        else monitor = clientMonitors.get(source);
        if (!monitor) {
          return Promise.reject(new UnknownReferenceError("log", source, `wait_for of client "${client.name}"`));
        }
        return monitor.waitFor(request, signal);
      },
    };
  }

  private async recordPlayback(run: RunContext, result: RunResult): Promise<void> {
    const dir = run.recordPlaybackDir;
    if (!dir) return;
    for (const client of result.clients) {
      if (!client.setup && !client.playback && !client.teardown) continue;
      const path = join(dir, `${run.slug}_${client.client}_i${result.iteration}_a${result.attempt}.json`);
      const body = {
        run: run.id,
        scenario: run.scenario.name,
        client: client.client,
        iteration: result.iteration,
        attempt: result.attempt,
        setup: client.setup,
        playback: client.playback,
        teardown: client.teardown,
      };
      if (await this.writeArtifact(path, JSON.stringify(body, null, 2), result)) client.playbackLogPath = path;
    }
  }

  private async collectServerLog(run: RunContext, result: RunResult, monitor: LogMonitor, tag: string): Promise<void> {
    if (!run.collectServerLog) return;
    const lines = monitor.lines();
    result.serverLogExcerpt = lines
      .slice(-this.excerptLines)
      .map((l) => l.text)
      .join("\n");
    if (!run.serverLogExport) return;
    const path = withSuffix(run.serverLogExport, tag);
    if (await this.writeArtifact(path, monitor.captured(), result)) result.serverLogPath = path;
  }

  private async exportClientLogs(
    run: RunContext,
    result: RunResult,
    monitors: ReadonlyMap<string, LogMonitor>,
    tag: string
  ): Promise<void> {
    for (const spec of run.clientLogExports) {
      const monitor = monitors.get(`${spec.client}:${spec.log}`);
      const content = monitor?.captured() ?? "";
      const exported: ClientLogExportResult = {
        client: spec.client,
        log: spec.log,
        lines: monitor?.lines().length ?? 0,
      };
      if (spec.path) {
        const path = withSuffix(spec.path, tag);
        if (await this.writeArtifact(path, content, result)) exported.path = path;
      } else {
        exported.content = content;
      }
      result.clientLogExports.push(exported);
    }
  }

  private async writeArtifact(path: string, content: string, result: RunResult): Promise<boolean> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, "utf-8");
      return true;
    } catch (e) {
      result.warnings.push(`could not write ${path}: ${toErrorMessage(e)}`);
      return false;
    }
  }

  /** False when the signal aborted the wait. */
  private async wait(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    if (ms <= 0) return true;
    try {
      await this.pause(ms, signal);
      return true;
    } catch (e) {
      if (signal?.aborted) return false;
      throw e;
    }
  }
}

function describeMiss(e: ExpectationResult): string {
  return `"${e.pattern}" seen ${e.observed}/${e.required} within ${e.timeoutMs / 1000}s`;
}

/** `server.log` + `_i2_a1` → `server_i2_a1.log` */
export function withSuffix(path: string, suffix: string): string {
  if (!suffix) return path;
  const ext = extname(path);
  return `${path.slice(0, path.length - ext.length)}${suffix}${ext}`;
}

export function skippedResult(run: RunContext, reason: string): RunResult {
  return {
    runId: run.id,
    description: run.description,
    slug: run.slug,
    scenario: run.scenario.name,
    tags: run.tags,
    status: "skipped",
    iteration: 0,
    attempt: 0,
    startedAt: new Date().toISOString(),
    durationMs: 0,
    clients: [],
    serverExpectations: [],
    clientExpectations: [],
    assertions: [],
    failures: [],
    clientLogExports: [],
    warnings: [],
    skipReason: reason,
  };
}
