import type { AssertionResult } from "../assert/types.js";
import type { ExpectationResult, LogExpectation } from "../monitor/matcher.js";
import type { AssertionConfig } from "../plan/schema.js";
import type { PlaybackLog } from "../runner/types.js";
import type { ExpandedScenario } from "../scenario/types.js";

export type RunStatus = "passed" | "failed" | "aborted" | "skipped";
export type SuiteStatus = "passed" | "failed" | "aborted";
export type FailureCategory = "client" | "server_log" | "client_log" | "assertion" | "startup" | "aborted";

export const FAILURE_CATEGORIES: readonly FailureCategory[] = [
  "client",
  "server_log",
  "client_log",
  "assertion",
  "startup",
  "aborted",
];

export interface ClientExpectation extends LogExpectation {
  client: string;
  log: string;
}

export interface ClientLogExportSpec {
  client: string;
  log: string;
  /** Absolute target; without one the content stays in memory. */
  path?: string;
}

/** One configured run, fully resolved and expanded. */
export interface RunContext {
  id: string;
  description: string;
  slug: string;
  scenario: ExpandedScenario;
  clients: string[];
  serverExpectations: LogExpectation[];
  clientExpectations: ClientExpectation[];
  assertions: AssertionConfig[];
  tags: string[];
  iterations: number;
  intervalMs: number;
  retries: number;
  gracePeriodMs: number;
  failFast: boolean;
  enabled: boolean;
  waitBeforeMs: number;
  timeoutMs?: number;
  collectServerLog: boolean;
  serverLogExport?: string;
  clientLogExports: ClientLogExportSpec[];
  recordPlaybackDir?: string;
}

export interface Failure {
  category: FailureCategory;
  /** Client name, pattern or assertion name the failure is about. */
  subject: string;
  message: string;
}

export type ClientRunStatus = "completed" | "failed" | "aborted" | "not_started";

export interface ClientRunResult {
  client: string;
  status: ClientRunStatus;
  setup?: PlaybackLog;
  playback?: PlaybackLog;
  teardown?: PlaybackLog;
  playbackLogPath?: string;
  screenshots: string[];
  error?: string;
}

export interface ClientLogExportResult {
  client: string;
  log: string;
  path?: string;
  lines: number;
  content?: string;
}

export interface RunResult {
  runId: string;
  description: string;
  slug: string;
  scenario: string;
  tags: string[];
  status: RunStatus;
  /** 1-based; 0 for runs that never started. */
  iteration: number;
  attempt: number;
  startedAt: string;
  durationMs: number;
  clients: ClientRunResult[];
  serverExpectations: ExpectationResult[];
  clientExpectations: ExpectationResult[];
  assertions: AssertionResult[];
  failures: Failure[];
  serverLogPath?: string;
  serverLogExcerpt?: string;
  clientLogExports: ClientLogExportResult[];
  /** Artifact writes that failed without affecting the outcome. */
  warnings: string[];
  skipReason?: string;
}

/** Outcome of a run across all its iterations and attempts. */
export interface RunSummary {
  runId: string;
  description: string;
  status: RunStatus;
  attempts: number;
  iterations: number;
}

export interface SuiteResult {
  status: SuiteStatus;
  startedAt: string;
  durationMs: number;
  results: RunResult[];
  runs: RunSummary[];
  /** Teardown failures after the last run; the results above still stand. */
  cleanupErrors?: string[];
}

export type OrchestratorEvent =
  | { type: "suite:start"; runs: number }
  | { type: "server:ready"; address: string }
  | { type: "attempt:start"; run: RunContext; iteration: number; attempt: number }
  | { type: "attempt:end"; run: RunContext; result: RunResult }
  | { type: "attempt:retry"; run: RunContext; iteration: number; nextAttempt: number; gracePeriodMs: number }
  | { type: "run:skipped"; run: RunContext; reason: string }
  | { type: "suite:end"; suite: SuiteResult };
