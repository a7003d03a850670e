import { InvalidPatternError, toErrorMessage } from "../errors.js";
import type { MatchType } from "../scenario/types.js";

export interface LogExpectation {
  pattern: string;
  matchType: MatchType;
  caseSensitive: boolean;
  occurrences: number;
  timeoutMs: number;
  /** Display name; defaults to the pattern. */
  name?: string;
}

export interface ExpectationResult {
  name: string;
  pattern: string;
  matchType: MatchType;
  /** `server` or `<client>:<log>`. */
  source: string;
  matched: boolean;
  required: number;
  observed: number;
  timeoutMs: number;
  firstMatchAt?: number;
  lastMatchAt?: number;
  captured: string[];
  aborted?: boolean;
}

const MAX_CAPTURED = 20;

export type LinePredicate = (line: string) => boolean;

/** Builds the line test for an expectation. Bad regexes fail here, not at match time. */
export function compilePattern(pattern: string, matchType: MatchType, caseSensitive: boolean): LinePredicate {
  if (matchType === "regex") {
    let re: RegExp;
    try {
      re = new RegExp(pattern, caseSensitive ? "" : "i");
    } catch (e) {
      throw new InvalidPatternError(pattern, toErrorMessage(e));
    }
    return (line) => re.test(line);
  }
  if (caseSensitive) return (line) => line.includes(pattern);
  const needle = pattern.toLowerCase();
  return (line) => line.toLowerCase().includes(needle);
}

/**
 * Counts matching lines against one expectation. Time is supplied by the
 * caller as ms since the expectation's clock started; lines fed at or after
 * the deadline are ignored.
 */
export class ExpectationMatcher {
  readonly expectation: LogExpectation;
  readonly source: string;
  private readonly test: LinePredicate;
  private observedCount = 0;
  private first: number | undefined;
  private last: number | undefined;
  private readonly lines: string[] = [];

  constructor(expectation: LogExpectation, source = "server") {
    this.expectation = expectation;
    this.source = source;
    this.test = compilePattern(expectation.pattern, expectation.matchType, expectation.caseSensitive);
  }

  get deadline(): number {
    return this.expectation.timeoutMs;
  }

  get observed(): number {
    return this.observedCount;
  }

  get satisfied(): boolean {
    return this.observedCount >= this.expectation.occurrences;
  }

  /** Returns true once the expectation is satisfied. */
  feed(line: string, atMs: number): boolean {
    if (this.satisfied) return true;
    if (atMs >= this.deadline) return false;
    if (!this.test(line)) return false;

    this.observedCount++;
    this.first ??= atMs;
    this.last = atMs;
    if (this.lines.length < MAX_CAPTURED) this.lines.push(line);
    return this.satisfied;
  }

  result(extra: { aborted?: boolean } = {}): ExpectationResult {
    const { expectation } = this;
    const result: ExpectationResult = {
      name: expectation.name ?? expectation.pattern,
      pattern: expectation.pattern,
      matchType: expectation.matchType,
      source: this.source,
      matched: this.satisfied,
      required: expectation.occurrences,
      observed: this.observedCount,
      timeoutMs: expectation.timeoutMs,
      captured: [...this.lines],
    };
    if (this.first !== undefined) result.firstMatchAt = this.first;
    if (this.last !== undefined) result.lastMatchAt = this.last;
    if (extra.aborted) result.aborted = true;
    return result;
  }
}
