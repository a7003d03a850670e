import type { AssertionResult } from "./types.js";

/** Fraction of assertions that passed; 1 when there are none. */
export function calculatePassRate(results: readonly AssertionResult[]): number {
  if (results.length === 0) return 1;

  const passed = results.filter((r) => r.passed).length;
  return passed / results.length;
}
