import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { runResult, suiteResult } from "../testing/results.js";
import { formatDuration, printTerminalReport } from "./terminal.js";

const ANSI = /\u001b\[[0-9;]*m/g;

describe("printTerminalReport", () => {
  let log: MockInstance<Parameters<typeof console.log>, void>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
  });

  function printed(): string[] {
    return log.mock.calls.map((args) => args.map(String).join(" ").replace(ANSI, ""));
  }

  it("lists failures with their category and the run totals", () => {
    printTerminalReport(
      suiteResult([
        runResult({
          status: "failed",
          durationMs: 1500,
          failures: [{ category: "assertion", subject: "command_count", message: "expected <= 1, got 2" }],
          warnings: ["could not write /ro/server.log: EACCES"],
        }),
        runResult({ runId: "shop", description: "Shop", durationMs: 500 }),
      ])
    );

    const lines = printed();
    expect(lines).toContain("  ✗ Drive (iteration 1, attempt 1)");
    expect(lines).toContain("    [assertion] command_count: expected <= 1, got 2");
    expect(lines).toContain("    warning: could not write /ro/server.log: EACCES");
    expect(lines).toContain("  Failure categories: assertion 1");
    expect(lines).toContain("  2 runs · 1 passed · 1 failed");
    expect(lines).toContain("  Completed in 2.0s");
  });
});

describe("formatDuration", () => {
  it("switches to seconds from one second up", () => {
    expect(formatDuration(999.6)).toBe("1000ms");
    expect(formatDuration(1000)).toBe("1.0s");
    expect(formatDuration(12345)).toBe("12.3s");
  });
});
