import type { ClientRunResult, FailureCategory, RunResult, RunStatus } from "./types.js";

export interface RunStatistics {
  /** Attempts that actually ran; skipped runs are only counted in `skippedRuns`. */
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  abortedRuns: number;
  skippedRuns: number;
  successRate: number;
  totalDurationMs: number;
  averageDurationMs?: number;
  medianDurationMs?: number;
  p90DurationMs?: number;
  shortestDurationMs?: number;
  longestDurationMs?: number;
  /** Attempts beyond the first of an iteration. */
  retries: number;
  /** Passed on a retry. */
  flakySuccesses: number;
  lastStatus?: RunStatus;
  assertionFailures: number;
  serverLogFailures: number;
  clientLogFailures: number;
  failureCategories: Partial<Record<FailureCategory, number>>;
  actionHistogram: Record<string, number>;
  totalWaitMs: number;
  averageWaitMs?: number;
  screenshots: number;
  commands: number;
}

export function median(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Nearest-rank percentile. */
export function percentile(values: readonly number[], p: number): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(1, Math.ceil((p / 100) * sorted.length));
  return sorted[Math.min(rank, sorted.length) - 1];
}

type ClientView = (result: RunResult) => readonly ClientRunResult[];

const allClients: ClientView = (result) => result.clients;

export function summariseResults(results: readonly RunResult[], view: ClientView = allClients): RunStatistics {
  const ran = results.filter((r) => r.status !== "skipped");
  const durations = ran.map((r) => r.durationMs);
  const count = (status: RunStatus): number => ran.filter((r) => r.status === status).length;

  const stats: RunStatistics = {
    totalRuns: ran.length,
    successfulRuns: count("passed"),
    failedRuns: count("failed"),
    abortedRuns: count("aborted"),
    skippedRuns: results.length - ran.length,
    successRate: ran.length > 0 ? count("passed") / ran.length : 0,
    totalDurationMs: durations.reduce((a, b) => a + b, 0),
    retries: ran.filter((r) => r.attempt > 1).length,
    flakySuccesses: ran.filter((r) => r.attempt > 1 && r.status === "passed").length,
    assertionFailures: 0,
    serverLogFailures: 0,
    clientLogFailures: 0,
    failureCategories: {},
    actionHistogram: {},
    totalWaitMs: 0,
    screenshots: 0,
    commands: 0,
  };

  if (ran.length > 0) {
    stats.averageDurationMs = stats.totalDurationMs / ran.length;
    stats.medianDurationMs = median(durations);
    stats.p90DurationMs = percentile(durations, 90);
    stats.shortestDurationMs = Math.min(...durations);
    stats.longestDurationMs = Math.max(...durations);
    stats.lastStatus = ran[ran.length - 1].status;
  }

  for (const result of ran) {
    stats.assertionFailures += result.assertions.filter((a) => !a.passed).length;
    stats.serverLogFailures += result.serverExpectations.filter((e) => !e.matched).length;
    stats.clientLogFailures += result.clientExpectations.filter((e) => !e.matched).length;
    for (const failure of result.failures) {
      stats.failureCategories[failure.category] = (stats.failureCategories[failure.category] ?? 0) + 1;
    }
    for (const client of view(result)) {
      stats.screenshots += client.screenshots.length;
      for (const event of client.playback?.events ?? []) {
        if (event.status === "skipped") continue;
        stats.actionHistogram[event.type] = (stats.actionHistogram[event.type] ?? 0) + 1;
        stats.commands += event.instructions.length;
        stats.totalWaitMs += event.waitedMs ?? 0;
      }
    }
  }
  if (ran.length > 0) stats.averageWaitMs = stats.totalWaitMs / ran.length;
  return stats;
}

function groupBy(results: readonly RunResult[], keys: (r: RunResult) => readonly string[]): Map<string, RunResult[]> {
  const groups = new Map<string, RunResult[]>();
  for (const result of results) {
    for (const key of keys(result)) {
      const group = groups.get(key);
      if (group) group.push(result);
      else groups.set(key, [result]);
    }
  }
  return groups;
}

function summariseGroups(groups: Map<string, RunResult[]>, view?: (key: string) => ClientView): Record<string, RunStatistics> {
  const out: Record<string, RunStatistics> = {};
  for (const [key, group] of groups) out[key] = summariseResults(group, view?.(key));
  return out;
}

/** Keyed by run description; all attempts of a run land in one group. */
export function summarisePerScenario(results: readonly RunResult[]): Record<string, RunStatistics> {
  return summariseGroups(groupBy(results, (r) => [r.description]));
}

/** Counts only the client's own playback in the action, wait and command figures. */
export function summarisePerClient(results: readonly RunResult[]): Record<string, RunStatistics> {
  return summariseGroups(
    groupBy(results, (r) => r.clients.map((c) => c.client)),
    (name) => (result) => result.clients.filter((c) => c.client === name)
  );
}

export function summarisePerTag(results: readonly RunResult[]): Record<string, RunStatistics> {
  return summariseGroups(groupBy(results, (r) => r.tags));
}

export interface SuiteAnalytics {
  overall: RunStatistics;
  perScenario: Record<string, RunStatistics>;
  perClient: Record<string, RunStatistics>;
  perTag: Record<string, RunStatistics>;
}

export function analyseResults(results: readonly RunResult[]): SuiteAnalytics {
  return {
    overall: summariseResults(results),
    perScenario: summarisePerScenario(results),
    perClient: summarisePerClient(results),
    perTag: summarisePerTag(results),
  };
}
