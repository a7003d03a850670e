import { describe, expect, it } from "vitest";
import { z } from "zod";
import { AssertionSchema } from "../plan/schema.js";
import { clientResult } from "../testing/results.js";
import { evaluateAssertions, type AssertionInput } from "./assertions.js";

const configs = (raw: unknown[]) => z.array(AssertionSchema).parse(raw);

const input: AssertionInput = {
  durationMs: 4200,
  clients: [clientResult("a", ["/x", "wait", "/y"], 1500), { ...clientResult("b", ["/z"]), screenshots: ["/shots/b-1.png"] }],
  serverLines: ["[join] a", "[join] b", "[chat] hello"],
  clientLines: new Map([["a:chatlog", ["Welcome a"]]]),
};

describe("evaluateAssertions", () => {
  it("measures every assertion kind and keeps going past failures", () => {
    const results = evaluateAssertions(
      configs([
        { type: "total_duration", max: 5 },
        { type: "client_duration", max: 1 },
        { type: "command_count", client: "a", min: 3 },
        { type: "action_count", action: "wait", max: 0 },
        { type: "log_occurrences", pattern: "join", min: 2, max: 2 },
        { type: "require_log", pattern: "welcome", source: "a" },
        { type: "screenshot_count", min: 2, message: "need screenshots" },
        { type: "wait_time", max: 1, name: "waits" },
      ]),
      input
    );

    expect(results.map((r) => [r.name, r.passed, r.actual])).toEqual([
      ["total_duration", true, 4.2],
      ["client_duration:a", true, 0.01],
      ["client_duration:b", true, 0.01],
      ["command_count:a", true, 3],
      ["action_count:wait", false, 1],
      ["log_occurrences:join", true, 2],
      ["require_log:welcome", true, 1],
      ["screenshot_count", false, 1],
      ["waits", false, 1.5],
    ]);
    expect(results[4].message).toBe("expected <= 0, got 1");
    expect(results[7].message).toBe("need screenshots");
    expect(results[8].message).toBe("expected <= 1, got 1.5");
  });

  it("fails require_log when the pattern never appeared", () => {
    const [result] = evaluateAssertions(configs([{ type: "require_log", pattern: "^\\[kick\\]", match_type: "regex" }]), input);

    expect(result).toMatchObject({ passed: false, actual: 0, message: "expected >= 1, got 0" });
  });

  it("reads a named client log", () => {
    const [result] = evaluateAssertions(
      configs([{ type: "log_occurrences", pattern: "Welcome", case_sensitive: true, source: "a:chatlog", min: 1 }]),
      input
    );

    expect(result.passed).toBe(true);
  });
});
