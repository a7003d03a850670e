import type { AssertionBounds, AssertionResult } from "./types.js";

export function withinBounds(actual: number, bounds: AssertionBounds): boolean {
  if (bounds.min !== undefined && actual < bounds.min) return false;
  if (bounds.max !== undefined && actual > bounds.max) return false;
  return true;
}

function describeBounds(bounds: AssertionBounds): string {
  if (bounds.min !== undefined && bounds.max !== undefined) return `between ${bounds.min} and ${bounds.max}`;
  if (bounds.min !== undefined) return `>= ${bounds.min}`;
  return `<= ${bounds.max ?? "∞"}`;
}

/** Accumulates assertion outcomes for one run attempt. */
export class AssertionCollector {
  private results: AssertionResult[] = [];

  /** Records a measured value against its bounds. */
  check(measure: Omit<AssertionResult, "passed">): AssertionResult {
    const passed = withinBounds(measure.actual, measure.expected);
    const result: AssertionResult = { ...measure, passed };
    if (!passed && !measure.message) {
      result.message = `expected ${describeBounds(measure.expected)}, got ${round(measure.actual)}`;
    }
    this.results.push(result);
    return result;
  }

  getResults(): AssertionResult[] {
    return [...this.results];
  }
}

function round(n: number): number {
  return Math.round(n * 1000) / 1000;
}
