import { performance } from "node:perf_hooks";
import { toErrorMessage } from "../errors.js";
import type { WaitOutcome, WaitRequest } from "../runner/types.js";
import { abortReason } from "../util/async.js";
import { LogTail, type LogTailOptions } from "./log-tail.js";
import { ExpectationMatcher, type ExpectationResult, type LogExpectation } from "./matcher.js";

export interface LogMonitorOptions extends LogTailOptions {
  pollIntervalMs?: number;
  /** Monotonic ms clock. */
  now?: () => number;
  /** Lines kept for late watchers and export. */
  maxHistory?: number;
}

export interface LogLine {
  text: string;
  /** ms since the attempt began. */
  at: number;
}

interface Watcher {
  matcher: ExpectationMatcher;
  /** Clock origin for this watcher, on the monitor's clock. */
  origin: number;
  finish(aborted: boolean): void;
}

/**
 * Tails one log file for the duration of a run attempt. All watchers share a
 * single poll loop and the same tail, so each appended byte is read once no
 * matter how many expectations look at it.
 */
export class LogMonitor {
  readonly name: string;
  readonly path: string;
  readonly lastErrors: string[] = [];
  private readonly tail: LogTail;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private readonly maxHistory: number;
  private readonly watchers = new Set<Watcher>();
  private history: LogLine[] = [];
  private attemptStart = 0;
  private timer: NodeJS.Timeout | undefined;
  private polling: Promise<void> | undefined;

  constructor(name: string, path: string, options: LogMonitorOptions = {}) {
    this.name = name;
    this.path = path;
    this.tail = new LogTail(path, options);
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.now = options.now ?? (() => performance.now());
    this.maxHistory = options.maxHistory ?? 5000;
  }

  /** Starts a new attempt: skips existing content and restarts the attempt clock. */
  async begin(): Promise<void> {
    this.cancelWatchers();
    await this.polling;
    await this.tail.mark();
    this.history = [];
    this.lastErrors.length = 0;
    this.attemptStart = this.now();
  }

  /** ms since {@link begin}. */
  elapsed(): number {
    return this.now() - this.attemptStart;
  }

  /**
   * Resolves once the expectation is satisfied or its timeout, counted from
   * the start of the attempt, has passed. Lines already seen this attempt are
   * replayed first. Never rejects; an abort yields an unmatched result
   * flagged `aborted`.
   */
  watch(expectation: LogExpectation, signal?: AbortSignal): Promise<ExpectationResult> {
    const matcher = new ExpectationMatcher(expectation, this.name);
    for (const line of this.history) {
      if (matcher.feed(line.text, line.at)) break;
    }
    return this.track(matcher, this.attemptStart, signal).then((aborted) => matcher.result({ aborted }));
  }

  /**
   * `wait_for` support: counts only lines that arrive after the call, with a
   * timeout counted from the call. Rejects if the signal aborts.
   */
  async waitFor(request: WaitRequest, signal?: AbortSignal): Promise<WaitOutcome> {
    const origin = this.now();
    const matcher = new ExpectationMatcher(
      {
        pattern: request.pattern,
        matchType: request.matchType,
        caseSensitive: request.caseSensitive,
        occurrences: request.occurrences,
        timeoutMs: request.timeoutMs,
      },
      this.name
    );
    const aborted = await this.track(matcher, origin, signal);
    if (aborted && signal) throw abortReason(signal);
    return { matched: matcher.satisfied, observed: matcher.observed, elapsedMs: this.now() - origin };
  }

  /** Reads whatever has been appended and hands it to the watchers. */
  poll(): Promise<void> {
    this.polling ??= this.readOnce().finally(() => {
      this.polling = undefined;
    });
    return this.polling;
  }

  /** Final read of the attempt; also takes an unterminated last line. */
  async settle(): Promise<void> {
    await this.poll();
    const rest = this.tail.drainPartial();
    if (rest !== undefined) this.record([rest]);
  }

  lines(): readonly LogLine[] {
    return this.history;
  }

  /** Text of the current attempt, for export. */
  captured(): string {
    return this.history.map((l) => l.text).join("\n");
  }

  /** Stops polling and releases every pending watcher as aborted. */
  async close(): Promise<void> {
    this.cancelWatchers();
    await this.polling;
  }

  private track(matcher: ExpectationMatcher, origin: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      if (matcher.satisfied) {
        resolve(false);
        return;
      }
      if (signal?.aborted) {
        resolve(true);
        return;
      }

      let deadlineTimer: NodeJS.Timeout | undefined;
      const onAbort = (): void => watcher.finish(true);
      const watcher: Watcher = {
        matcher,
        origin,
        finish: (aborted) => {
          if (!this.watchers.delete(watcher)) return;
          clearTimeout(deadlineTimer);
          signal?.removeEventListener("abort", onAbort);
          if (this.watchers.size === 0) this.stopLoop();
          resolve(aborted);
        },
      };

      this.watchers.add(watcher);
      signal?.addEventListener("abort", onAbort, { once: true });
      const remaining = matcher.deadline - (this.now() - origin);
      deadlineTimer = setTimeout(() => watcher.finish(false), Math.max(0, remaining));
      this.startLoop();
    });
  }

  private async readOnce(): Promise<void> {
    let texts: string[];
    try {
      texts = await this.tail.read();
    } catch (e) {
      // The file may be mid-rotation; try again on the next tick.
      this.lastErrors.push(toErrorMessage(e));
      if (this.lastErrors.length > 10) this.lastErrors.shift();
      return;
    }
    if (texts.length > 0) this.record(texts);
  }

  private record(texts: string[]): void {
    const stamp = this.now();
    const at = stamp - this.attemptStart;
    for (const text of texts) {
      this.history.push({ text, at });
    }
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }

    for (const watcher of [...this.watchers]) {
      const local = stamp - watcher.origin;
      for (const text of texts) {
        if (watcher.matcher.feed(text, local)) {
          watcher.finish(false);
          break;
        }
      }
    }
  }

  private startLoop(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.poll();
    }, this.pollIntervalMs);
    void this.poll();
  }

  private stopLoop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private cancelWatchers(): void {
    for (const watcher of [...this.watchers]) watcher.finish(true);
    this.stopLoop();
  }
}

export class ServerLogMonitor extends LogMonitor {
  constructor(path: string, options: LogMonitorOptions = {}) {
    super("server", path, options);
  }
}

export class ClientLogMonitor extends LogMonitor {
  readonly client: string;
  readonly logName: string;

  constructor(client: string, logName: string, path: string, options: LogMonitorOptions = {}) {
    super(`${client}:${logName}`, path, options);
    this.client = client;
    this.logName = logName;
  }
}
