import type { ActionType, MatchType, ScenarioAction } from "../scenario/types.js";

export type EventStatus = "ok" | "failed" | "skipped";
export type PlaybackOutcome = "completed" | "failed" | "aborted";
export type PlaybackPhase = "setup" | "scenario" | "teardown";

export interface PlaybackEvent {
  index: number;
  type: ActionType;
  action: ScenarioAction;
  /** Encoded lines handed to the transport for this action. */
  instructions: string[];
  status: EventStatus;
  /** ms since playback start (monotonic clock). */
  startedAt: number;
  finishedAt: number;
  error?: string;
  artifact?: string;
  /** wait / wait_for only: time spent suspended. */
  waitedMs?: number;
  /** wait_for only. */
  observed?: number;
}

export interface PlaybackLog {
  label: string;
  phase: PlaybackPhase;
  /** Wall-clock start, ISO 8601. */
  startedAt: string;
  durationMs: number;
  outcome: PlaybackOutcome;
  events: readonly PlaybackEvent[];
  error?: string;
}

export interface WaitRequest {
  pattern: string;
  matchType: MatchType;
  caseSensitive: boolean;
  occurrences: number;
  timeoutMs: number;
  /** `server`, `client` (the client's primary log) or `client:<name>`. */
  source: string;
}

export interface WaitOutcome {
  matched: boolean;
  observed: number;
  elapsedMs: number;
}

/** Resolves `wait_for` conditions, typically against the log monitors of the run. */
export interface ConditionWaiter {
  waitFor(request: WaitRequest, signal?: AbortSignal): Promise<WaitOutcome>;
}
