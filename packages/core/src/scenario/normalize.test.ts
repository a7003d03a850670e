import { describe, expect, it } from "vitest";
import { ConfigError, UnknownActionError } from "../errors.js";
import { ensureLeadingSlash, normalizeStep } from "./normalize.js";

describe("normalizeStep", () => {
  it("adds a leading slash to commands", () => {
    expect(ensureLeadingSlash("  kill ")).toBe("/kill");
    expect(normalizeStep({ type: "command", command: "heal" }, "test")).toEqual({
      type: "command",
      command: "/heal",
      delay: 0,
    });
  });

  it("accepts action aliases", () => {
    expect(normalizeStep({ type: "key", key: "w" }, "test")).toEqual({
      type: "keypress",
      key: "w",
      state: "press",
      delay: 0,
    });
    expect(normalizeStep({ action: "click", button: "RIGHT" }, "test")).toEqual({
      type: "mouse_click",
      button: "right",
      state: "click",
      delay: 0,
    });
  });

  it("maps older field names onto the canonical ones", () => {
    expect(normalizeStep({ type: "chat", text: "hello" }, "test")).toEqual({ type: "chat", message: "hello", delay: 0 });
    expect(normalizeStep({ type: "wait_for", phrase: "Welcome", seconds: 5 }, "test")).toEqual({
      type: "wait_for",
      pattern: "Welcome",
      timeout: 5,
      match_type: "substring",
      case_sensitive: false,
      occurrences: 1,
      source: "server",
      fatal: false,
      delay: 0,
    });
  });

  it("reads an inline macro command list as a sequence", () => {
    expect(normalizeStep({ type: "macro", commands: ["a", "/b"] }, "test")).toEqual({
      type: "sequence",
      commands: ["a", "/b"],
      delay: 0,
    });
  });

  it("coerces string flags from substituted variables", () => {
    const action = normalizeStep({ type: "wait_for", pattern: "x", fatal: "yes", case_sensitive: "0" }, "test");

    expect(action.type === "wait_for" && [action.fatal, action.case_sensitive]).toEqual([true, false]);
  });

  it("rejects unknown action types", () => {
    expect(() => normalizeStep({ type: "fly" }, "test")).toThrow(UnknownActionError);
  });

  it("names the step and field when a field is invalid", () => {
    expect(() => normalizeStep({ type: "mouse_move", y: 10 }, 'scenario "x" step 2')).toThrow(
      /Invalid mouse_move step in scenario "x" step 2/
    );
    expect(() => normalizeStep({ type: "mouse_move", y: 10 }, "test")).toThrow(ConfigError);
  });
});
