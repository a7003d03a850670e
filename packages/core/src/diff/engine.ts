import type { RunStatus } from "../orchestrator/types.js";
import type { StoredResult } from "../store/history.js";

export type DiffStatus = "regression" | "improvement" | "stable" | "added" | "removed";

export interface RunSnapshot {
  status: RunStatus;
  attempts: number;
  averageDurationMs?: number;
}

export interface RunDiff {
  runId: string;
  description: string;
  status: DiffStatus;
  before?: RunSnapshot;
  after?: RunSnapshot;
  /** Relative change of the average attempt duration. */
  durationChange?: number;
  statusFlipped?: boolean;
}

export interface DiffSummary {
  total: number;
  regressions: number;
  improvements: number;
  stable: number;
  added: number;
  removed: number;
}

export interface DiffReport {
  beforeVersion: string;
  afterVersion: string;
  runs: RunDiff[];
  summary: DiffSummary;
  hasRegressions: boolean;
}

export interface DiffOptions {
  /** Relative slowdown (0.2 = 20%) that counts as a regression. */
  durationThreshold?: number;
}

type Attempt = Pick<StoredResult, "runId" | "description" | "status" | "iteration" | "attempt" | "durationMs">;

/**
 * Collapses every attempt of a run into one snapshot. An iteration counts by
 * its last attempt; the run passed only if every iteration did.
 */
export function snapshotRuns(results: readonly Attempt[]): Map<string, { description: string; snapshot: RunSnapshot }> {
  const grouped = new Map<string, Attempt[]>();
  for (const r of results) {
    const list = grouped.get(r.runId);
    if (list) list.push(r);
    else grouped.set(r.runId, [r]);
  }

  const out = new Map<string, { description: string; snapshot: RunSnapshot }>();
  for (const [runId, attempts] of grouped) {
    const ran = attempts.filter((a) => a.status !== "skipped");
    const lastPerIteration = new Map<number, Attempt>();
    for (const a of ran) {
      const prev = lastPerIteration.get(a.iteration);
      if (!prev || a.attempt >= prev.attempt) lastPerIteration.set(a.iteration, a);
    }
    const finals = [...lastPerIteration.values()];

    let status: RunStatus = "skipped";
    if (finals.length > 0) {
      status = finals.find((a) => a.status === "failed")?.status ?? finals.find((a) => a.status === "aborted")?.status ?? "passed";
    }
    const snapshot: RunSnapshot = { status, attempts: ran.length };
    if (ran.length > 0) snapshot.averageDurationMs = ran.reduce((sum, a) => sum + a.durationMs, 0) / ran.length;
    out.set(runId, { description: attempts[0].description, snapshot });
  }
  return out;
}

export function diffResults(
  beforeVersion: string,
  beforeResults: readonly Attempt[],
  afterVersion: string,
  afterResults: readonly Attempt[],
  options?: DiffOptions
): DiffReport {
  const threshold = options?.durationThreshold ?? 0.2;

  const beforeMap = snapshotRuns(beforeResults);
  const afterMap = snapshotRuns(afterResults);

  const allRuns = new Set([...beforeMap.keys(), ...afterMap.keys()]);
  const runs: RunDiff[] = [];

  for (const runId of allRuns) {
    const before = beforeMap.get(runId);
    const after = afterMap.get(runId);

    if (before && after) {
      const b = before.snapshot;
      const a = after.snapshot;
      const wasGreen = b.status === "passed";
      const isGreen = a.status === "passed";
      const durationChange =
        b.averageDurationMs !== undefined && a.averageDurationMs !== undefined && b.averageDurationMs > 0
          ? (a.averageDurationMs - b.averageDurationMs) / b.averageDurationMs
          : undefined;

      let status: DiffStatus;
      if (b.status === "skipped" || a.status === "skipped") {
        status = "stable";
      } else if (wasGreen && !isGreen) {
        status = "regression";
      } else if (!wasGreen && isGreen) {
        status = "improvement";
      } else if (durationChange !== undefined && durationChange > threshold) {
        status = "regression";
      } else if (durationChange !== undefined && durationChange < -threshold) {
        status = "improvement";
      } else {
        status = "stable";
      }

      const diff: RunDiff = {
        runId,
        description: after.description,
        status,
        before: b,
        after: a,
        statusFlipped: b.status !== a.status,
      };
      if (durationChange !== undefined) diff.durationChange = durationChange;
      runs.push(diff);
    } else if (after) {
      runs.push({ runId, description: after.description, status: "added", after: after.snapshot });
    } else if (before) {
      runs.push({ runId, description: before.description, status: "removed", before: before.snapshot });
    }
  }

  const statusOrder: Record<DiffStatus, number> = {
    regression: 0,
    improvement: 1,
    stable: 2,
    added: 3,
    removed: 4,
  };
  runs.sort((a, b) => statusOrder[a.status] - statusOrder[b.status]);

  const summary: DiffSummary = {
    total: runs.length,
    regressions: runs.filter((s) => s.status === "regression").length,
    improvements: runs.filter((s) => s.status === "improvement").length,
    stable: runs.filter((s) => s.status === "stable").length,
    added: runs.filter((s) => s.status === "added").length,
    removed: runs.filter((s) => s.status === "removed").length,
  };

  return {
    beforeVersion,
    afterVersion,
    runs,
    summary,
    hasRegressions: summary.regressions > 0,
  };
}
