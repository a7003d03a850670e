import { describe, expect, it } from "vitest";
import { InvalidPatternError } from "../errors.js";
import { ExpectationMatcher, compilePattern, type LogExpectation } from "./matcher.js";

function expectation(overrides: Partial<LogExpectation> = {}): LogExpectation {
  return {
    pattern: "joined",
    matchType: "substring",
    caseSensitive: false,
    occurrences: 1,
    timeoutMs: 5000,
    ...overrides,
  };
}

describe("compilePattern", () => {
  it("matches substrings case-insensitively by default", () => {
    const test = compilePattern("Joined", "substring", false);
    expect(test("[join] bot-1 JOINED the game")).toBe(true);
    expect(compilePattern("Joined", "substring", true)("bot-1 joined")).toBe(false);
  });

  it("compiles regexes and reports bad ones", () => {
    expect(compilePattern("^\\[chat\\] bot-\\d+:", "regex", false)("[CHAT] bot-12: hi")).toBe(true);
    expect(() => compilePattern("([", "regex", false)).toThrow(InvalidPatternError);
  });
});

describe("ExpectationMatcher", () => {
  it("counts only lines that arrive before the deadline", () => {
    const matcher = new ExpectationMatcher(expectation({ occurrences: 3 }));

    matcher.feed("bot-1 joined", 1000);
    matcher.feed("bot-2 joined", 4000);
    matcher.feed("bot-3 joined", 9000);

    const result = matcher.result();
    expect(result.matched).toBe(false);
    expect(result.observed).toBe(2);
    expect(result.required).toBe(3);
    expect(result.firstMatchAt).toBe(1000);
    expect(result.lastMatchAt).toBe(4000);
    expect(result.captured).toEqual(["bot-1 joined", "bot-2 joined"]);
  });

  it("stops counting once satisfied", () => {
    const matcher = new ExpectationMatcher(expectation({ occurrences: 2 }), "bot-1:chatlog");

    expect(matcher.feed("a joined", 10)).toBe(false);
    expect(matcher.feed("b joined", 20)).toBe(true);
    expect(matcher.feed("c joined", 30)).toBe(true);

    const result = matcher.result();
    expect(result).toMatchObject({ matched: true, observed: 2, source: "bot-1:chatlog", lastMatchAt: 20 });
  });

  it("uses the pattern as the name unless one is given", () => {
    expect(new ExpectationMatcher(expectation()).result().name).toBe("joined");
    expect(new ExpectationMatcher(expectation({ name: "login" })).result({ aborted: true })).toMatchObject({
      name: "login",
      aborted: true,
      matched: false,
    });
  });
});
