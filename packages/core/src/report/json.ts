import { calculatePassRate } from "../assert/scorer.js";
import { analyseResults, type SuiteAnalytics } from "../orchestrator/analytics.js";
import type { RunResult, RunSummary, SuiteResult, SuiteStatus } from "../orchestrator/types.js";

export interface ReportMeta {
  /** Version label the suite ran under, e.g. a git tag. */
  version?: string;
  packageDir?: string;
}

export interface JsonReport {
  reportVersion: number;
  createdAt: string;
  version?: string;
  packageDir?: string;
  status: SuiteStatus;
  startedAt: string;
  durationMs: number;
  summary: {
    runs: number;
    passed: number;
    failed: number;
    aborted: number;
    skipped: number;
    attempts: number;
    /** Share of all evaluated assertions that passed. */
    assertionPassRate: number;
  };
  runs: RunSummary[];
  results: RunResult[];
  analytics: SuiteAnalytics;
  cleanupErrors?: string[];
}

export const REPORT_VERSION = 1;

export function buildJsonReport(suite: SuiteResult, meta: ReportMeta = {}): JsonReport {
  const count = (status: RunSummary["status"]): number => suite.runs.filter((r) => r.status === status).length;
  const report: JsonReport = {
    reportVersion: REPORT_VERSION,
    createdAt: new Date().toISOString(),
    status: suite.status,
    startedAt: suite.startedAt,
    durationMs: Math.round(suite.durationMs),
    summary: {
      runs: suite.runs.length,
      passed: count("passed"),
      failed: count("failed"),
      aborted: count("aborted"),
      skipped: count("skipped"),
      attempts: suite.results.filter((r) => r.status !== "skipped").length,
      assertionPassRate: calculatePassRate(suite.results.flatMap((r) => r.assertions)),
    },
    runs: suite.runs,
    results: suite.results,
    analytics: analyseResults(suite.results),
  };
  if (meta.version) report.version = meta.version;
  if (meta.packageDir) report.packageDir = meta.packageDir;
  if (suite.cleanupErrors?.length) report.cleanupErrors = suite.cleanupErrors;
  return report;
}

export function generateJsonReport(suite: SuiteResult, meta: ReportMeta = {}): string {
  return JSON.stringify(buildJsonReport(suite, meta), null, 2);
}
