import { z } from "zod";
import type { SuiteResult, SuiteStatus } from "../orchestrator/types.js";

export interface SuiteMeta {
  id: string;
  version: string;
  createdAt: string;
  status: SuiteStatus;
  runCount: number;
  passedCount: number;
  failedCount: number;
  durationMs: number;
}

/** The fields of a stored attempt the diff relies on; the rest is kept as written. */
export const StoredResultSchema = z
  .object({
    runId: z.string(),
    description: z.string(),
    status: z.enum(["passed", "failed", "aborted", "skipped"]),
    iteration: z.number(),
    attempt: z.number(),
    durationMs: z.number(),
  })
  .passthrough();

export type StoredResult = z.infer<typeof StoredResultSchema>;

export interface StoredSuite {
  meta: SuiteMeta;
  results: StoredResult[];
}

export interface HistoryStore {
  saveSuite(version: string, suite: SuiteResult, meta?: Record<string, unknown>): SuiteMeta;
  loadSuite(id: string): StoredSuite | null;
  /** Latest suite stored under the label. */
  loadByVersion(version: string): StoredSuite | null;
  listSuites(limit?: number): SuiteMeta[];
  listVersions(): string[];
  deleteSuite(id: string): void;
  close(): void;
}
