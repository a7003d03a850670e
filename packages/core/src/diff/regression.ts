import { ConfigError } from "../errors.js";
import type { HistoryStore, StoredSuite } from "../store/history.js";
import { diffResults, type DiffOptions, type DiffReport, type RunDiff } from "./engine.js";

export interface Regression {
  runId: string;
  description: string;
  reason: string;
}

export interface VersionComparison {
  diff: DiffReport;
  regressions: Regression[];
  /** 1 when any run regressed. */
  exitCode: 0 | 1;
}

/** `latest` and `previous` name the newest and second-newest stored versions. */
export function resolveVersion(store: HistoryStore, version: string): string {
  const versions = store.listVersions();
  if (version === "latest") {
    if (versions[0] === undefined) throw new ConfigError("No suites stored yet.");
    return versions[0];
  }
  if (version === "previous") {
    if (versions[1] === undefined) throw new ConfigError("Need at least 2 stored suites to use 'previous'.");
    return versions[1];
  }
  return version;
}

/** Diffs two stored versions, by label or as `latest`/`previous`. */
export function compareVersions(
  store: HistoryStore,
  before: string,
  after: string,
  options?: DiffOptions
): VersionComparison {
  const beforeSuite = loadVersion(store, resolveVersion(store, before));
  const afterSuite = loadVersion(store, resolveVersion(store, after));
  const diff = diffResults(
    beforeSuite.meta.version,
    beforeSuite.results,
    afterSuite.meta.version,
    afterSuite.results,
    options
  );
  const regressions = diff.runs
    .filter((run) => run.status === "regression")
    .map((run) => ({ runId: run.runId, description: run.description, reason: regressionReason(run) }));
  return { diff, regressions, exitCode: regressions.length > 0 ? 1 : 0 };
}

export function regressionReason(run: RunDiff): string {
  if (run.before?.status === "passed" && run.after && run.after.status !== "passed") {
    return `passed before, ${run.after.status} now`;
  }
  return `${Math.round((run.durationChange ?? 0) * 100)}% slower`;
}

function loadVersion(store: HistoryStore, version: string): StoredSuite {
  const suite = store.loadByVersion(version);
  if (!suite) throw new ConfigError(`Version "${version}" not found in history store.`);
  return suite;
}
