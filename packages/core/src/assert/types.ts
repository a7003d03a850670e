import type { AssertionType } from "../plan/schema.js";

export interface AssertionBounds {
  min?: number;
  max?: number;
}

export interface AssertionResult {
  name: string;
  type: AssertionType;
  passed: boolean;
  /** Measured value, in seconds for durations. */
  actual: number;
  expected: AssertionBounds;
  client?: string;
  message?: string;
}
