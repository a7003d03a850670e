import Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { SuiteResult } from "../orchestrator/types.js";
import { StoredResultSchema, type HistoryStore, type StoredResult, type StoredSuite, type SuiteMeta } from "./history.js";

const SuiteRowSchema = z.object({
  id: z.string(),
  version: z.string(),
  created_at: z.string(),
  status: z.enum(["passed", "failed", "aborted"]),
  duration_ms: z.number(),
  run_count: z.number(),
  passed_count: z.number(),
  failed_count: z.number(),
});

const DataRowSchema = z.object({ data: z.string() });
const VersionRowSchema = z.object({ version: z.string() });

type SuiteRow = z.infer<typeof SuiteRowSchema>;

/** Suite history in one SQLite file; `:memory:` works for tests. */
export class SqliteHistoryStore implements HistoryStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS suites (
        id           TEXT PRIMARY KEY,
        version      TEXT NOT NULL,
        created_at   TEXT NOT NULL,
        status       TEXT NOT NULL,
        duration_ms  REAL NOT NULL,
        run_count    INTEGER NOT NULL,
        passed_count INTEGER NOT NULL,
        failed_count INTEGER NOT NULL,
        meta         TEXT
      );
      CREATE TABLE IF NOT EXISTS results (
        id          TEXT PRIMARY KEY,
        suite_id    TEXT NOT NULL REFERENCES suites(id) ON DELETE CASCADE,
        seq         INTEGER NOT NULL,
        run_id      TEXT NOT NULL,
        status      TEXT NOT NULL,
        iteration   INTEGER NOT NULL,
        attempt     INTEGER NOT NULL,
        duration_ms REAL NOT NULL,
        data        TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_results_suite_id ON results(suite_id);
      CREATE INDEX IF NOT EXISTS idx_results_run_id ON results(run_id);
      CREATE INDEX IF NOT EXISTS idx_suites_version ON suites(version);
    `);
  }

  saveSuite(version: string, suite: SuiteResult, extraMeta?: Record<string, unknown>): SuiteMeta {
    const meta: SuiteMeta = {
      id: randomUUID(),
      version,
      createdAt: new Date().toISOString(),
      status: suite.status,
      runCount: suite.runs.length,
      passedCount: suite.runs.filter((r) => r.status === "passed").length,
      failedCount: suite.runs.filter((r) => r.status === "failed" || r.status === "aborted").length,
      durationMs: suite.durationMs,
    };

    const insertSuite = this.db.prepare(
      `INSERT INTO suites (id, version, created_at, status, duration_ms, run_count, passed_count, failed_count, meta)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertResult = this.db.prepare(
      `INSERT INTO results (id, suite_id, seq, run_id, status, iteration, attempt, duration_ms, data)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const transaction = this.db.transaction(() => {
      insertSuite.run(
        meta.id,
        version,
        meta.createdAt,
        meta.status,
        meta.durationMs,
        meta.runCount,
        meta.passedCount,
        meta.failedCount,
        extraMeta ? JSON.stringify(extraMeta) : null
      );
      suite.results.forEach((result, seq) => {
        insertResult.run(
          randomUUID(),
          meta.id,
          seq,
          result.runId,
          result.status,
          result.iteration,
          result.attempt,
          result.durationMs,
          JSON.stringify(result)
        );
      });
    });
    transaction();

    return meta;
  }

  loadSuite(id: string): StoredSuite | null {
    const row = this.db.prepare("SELECT * FROM suites WHERE id = ?").get(id);
    if (row === undefined) return null;

    const rows = this.db.prepare("SELECT data FROM results WHERE suite_id = ? ORDER BY seq").all(id);
    const results: StoredResult[] = rows.map((r) => {
      const parsed: unknown = JSON.parse(DataRowSchema.parse(r).data);
      return StoredResultSchema.parse(parsed);
    });

    return { meta: toMeta(SuiteRowSchema.parse(row)), results };
  }

  loadByVersion(version: string): StoredSuite | null {
    const row = this.db
      .prepare("SELECT id FROM suites WHERE version = ? ORDER BY created_at DESC, rowid DESC LIMIT 1")
      .get(version);
    if (row === undefined) return null;
    return this.loadSuite(z.object({ id: z.string() }).parse(row).id);
  }

  listSuites(limit = 50): SuiteMeta[] {
    const rows = this.db.prepare("SELECT * FROM suites ORDER BY created_at DESC, rowid DESC LIMIT ?").all(limit);
    return rows.map((row) => toMeta(SuiteRowSchema.parse(row)));
  }

  listVersions(): string[] {
    const rows = this.db
      .prepare(
        `SELECT version, MAX(created_at) AS latest, MAX(rowid) AS seq
         FROM suites GROUP BY version ORDER BY latest DESC, seq DESC`
      )
      .all();
    return rows.map((row) => VersionRowSchema.parse(row).version);
  }

  deleteSuite(id: string): void {
    this.db.prepare("DELETE FROM results WHERE suite_id = ?").run(id);
    this.db.prepare("DELETE FROM suites WHERE id = ?").run(id);
  }

  close(): void {
    this.db.close();
  }
}

function toMeta(row: SuiteRow): SuiteMeta {
  return {
    id: row.id,
    version: row.version,
    createdAt: row.created_at,
    status: row.status,
    runCount: row.run_count,
    passedCount: row.passed_count,
    failedCount: row.failed_count,
    durationMs: row.duration_ms,
  };
}
