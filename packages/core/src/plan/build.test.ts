import { describe, expect, it } from "vitest";
import { ConfigError, UnknownReferenceError } from "../errors.js";
import { buildRunPlan, parseBotConfig, type BuildPlanOptions } from "./build.js";

function plan(raw: unknown, options?: BuildPlanOptions) {
  return buildRunPlan(parseBotConfig(raw), options);
}

describe("parseBotConfig", () => {
  it("lists every schema problem with its path", () => {
    let caught: unknown;
    try {
      parseBotConfig({ bot_automation: { runs: [{ iterations: 0 }] } }, "botrun.config.json");
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.some((i) => i.startsWith("bot_automation.runs.0.scenario:"))).toBe(true);
    expect(issues.some((i) => i.startsWith("bot_automation.runs.0.iterations:"))).toBe(true);
  });

  it("keeps unrelated world-document keys", () => {
    const config = parseBotConfig({ world: { name: "Los Santos" } });
    expect(config.world).toEqual({ name: "Los Santos" });
  });
});

describe("buildRunPlan", () => {
  it("runs every scenario once on a default client when nothing is configured", () => {
    const result = plan({ bot_scenarios: [{ description: "Drive Test", steps: ["car infernus"] }] });

    expect(result.clients.map((c) => c.definition.name)).toEqual(["bot-1"]);
    expect(result.runs).toHaveLength(1);
    expect(result.runs[0]).toMatchObject({
      id: "drive_test",
      description: "Drive Test",
      slug: "drive_test",
      clients: ["bot-1"],
      iterations: 1,
      retries: 0,
    });
    expect(result.runs[0].scenario.actions).toEqual([{ type: "command", command: "/car infernus", delay: 0 }]);
    expect(result.server.startup_phrase).toBe("Started server on");
  });

  it("layers suite, run and command-line variables", () => {
    const raw = {
      bot_variables: { speed: 1 },
      bot_scenarios: [{ name: "s", steps: ["/speed {{speed}}"] }],
      bot_automation: { runs: [{ scenario: "s", variables: { speed: 2 } }] },
    };

    const command = (options?: BuildPlanOptions): unknown => {
      const [action] = plan(raw, options).runs[0].scenario.actions;
      return action.type === "command" ? action.command : action.type;
    };
    expect(command()).toBe("/speed 2");
    expect(command({ overrides: { speed: "3" } })).toBe("/speed 3");
  });

  it("finds scenarios by description as well as by name", () => {
    const result = plan({
      bot_scenarios: [{ name: "drive", description: "Drive Test", steps: ["/v"] }],
      bot_automation: { runs: [{ scenario: "drive test" }, { scenario: "Drive Test" }] },
    });

    expect(result.runs.map((r) => r.id)).toEqual(["drive_test", "drive_test-2"]);
    expect(result.runs.every((r) => r.scenario.name === "drive")).toBe(true);
  });

  it("merges scenarios loaded from files", () => {
    const result = plan(
      {},
      {
        extraScenarios: [
          { name: "from-file", description: "From file", steps: ["/x"], macros: {}, variables: {}, tags: ["files"] },
        ],
      }
    );

    expect(result.runs[0].tags).toEqual(["files"]);
  });

  it("rejects duplicate scenario names", () => {
    expect(() =>
      plan({ bot_scenarios: [{ name: "a", steps: ["/x"] }, { name: "a", steps: ["/y"] }] })
    ).toThrow('Duplicate scenario name "a"');
  });

  it("rejects references to unknown scenarios and clients", () => {
    expect(() => plan({ bot_automation: { runs: [{ scenario: "nope" }] } })).toThrow(
      'Unknown scenario "nope" referenced in bot_automation.runs[0]'
    );
    expect(() =>
      plan({
        bot_scenarios: [{ name: "s", steps: ["/x"] }],
        bot_automation: { clients: [{ name: "a" }], runs: [{ scenario: "s", clients: ["b"] }] },
      })
    ).toThrow(UnknownReferenceError);
  });

  it("only accepts client log expectations for logs the client has", () => {
    const base = {
      bot_scenarios: [{ name: "s", steps: ["/x"] }],
      bot_automation: {
        clients: [{ name: "file-bot" }, { name: "gta", type: "wine", gta_dir: "/games/gta" }],
        runs: [{ scenario: "s", expect_client_logs: [{ client: "gta", pattern: "Connected" }] }],
      },
    };
    const result = plan(base);
    expect(result.runs[0].clientExpectations).toEqual([
      {
        client: "gta",
        log: "chatlog",
        pattern: "Connected",
        matchType: "substring",
        caseSensitive: false,
        occurrences: 1,
        timeoutMs: 10000,
      },
    ]);

    const broken = {
      ...base,
      bot_automation: {
        ...base.bot_automation,
        runs: [{ scenario: "s", expect_client_logs: [{ client: "file-bot", pattern: "Connected" }] }],
      },
    };
    expect(() => plan(broken)).toThrow('Unknown log "file-bot:chatlog"');
  });

  it("compiles patterns up front", () => {
    expect(() =>
      plan({
        bot_scenarios: [{ name: "s", steps: ["/x"] }],
        bot_automation: { runs: [{ scenario: "s", expect_server_logs: [{ pattern: "([", match_type: "regex" }] }] },
      })
    ).toThrow(/expect_server_logs\[0\]/);
    expect(() =>
      plan({ bot_scenarios: [{ name: "s", steps: [{ type: "wait_for", pattern: "([", match_type: "regex" }] }] })
    ).toThrow(ConfigError);
  });

  it("checks wait_for sources against the run's clients and their logs", () => {
    const config = (source: string, teardown: unknown[] = []) => ({
      bot_scenarios: [{ name: "s", steps: [{ type: "wait_for", pattern: "ready", source }] }],
      bot_automation: {
        clients: [
          { name: "bot-1", logs: [{ name: "out", path: "out.txt" }], teardown },
          { name: "gta", type: "wine", gta_dir: "/games/gta" },
        ],
      },
    });

    expect(() => plan(config("server"))).not.toThrow();
    expect(() => plan(config("client"))).not.toThrow();
    expect(() => plan(config("gta:chatlog"))).not.toThrow();
    expect(() => plan(config("client:nosuch"))).toThrow(
      'Unknown log "bot-1:nosuch" referenced in scenario "s" in bot_automation.runs[0]'
    );
    expect(() => plan(config("nobody:chatlog"))).toThrow(UnknownReferenceError);
    expect(() => plan(config("chatlog"))).toThrow('Unknown log "chatlog"');
    expect(() =>
      plan({
        bot_scenarios: [{ name: "s", steps: ["/x"] }],
        bot_automation: {
          clients: [{ name: "bot-1", teardown: [{ type: "wait_for", pattern: "bye", source: "client" }] }],
        },
      })
    ).toThrow('Unknown log "bot-1:chatlog" referenced in teardown of client "bot-1" in bot_automation.runs[0]');
  });

  it("accepts the keyed assertion form and checks bounds", () => {
    const result = plan({
      bot_scenarios: [{ name: "s", steps: ["/x"] }],
      bot_automation: {
        runs: [{ scenario: "s", assertions: { total_duration: { max: 30 }, require_log: ["Welcome"] } }],
      },
    });
    expect(result.runs[0].assertions.map((a) => [a.type, a.max, a.pattern])).toEqual([
      ["total_duration", 30, undefined],
      ["require_log", undefined, "Welcome"],
    ]);

    expect(() =>
      plan({
        bot_scenarios: [{ name: "s", steps: ["/x"] }],
        bot_automation: { runs: [{ scenario: "s", assertions: [{ type: "command_count" }] }] },
      })
    ).toThrow('needs "min" or "max"');
  });

  it("resolves artifact paths against the package directory", () => {
    const result = plan(
      {
        bot_scenarios: [{ name: "s", steps: ["/x"] }],
        bot_automation: { runs: [{ scenario: "s", server_log_export: "logs/server.log", timeout: 2.5 }] },
      },
      { baseDir: "/srv/pkg" }
    );

    expect(result.runs[0]).toMatchObject({
      serverLogExport: "/srv/pkg/logs/server.log",
      collectServerLog: true,
      timeoutMs: 2500,
    });
  });

  it("expands client setup and teardown with suite macros", () => {
    const result = plan({
      bot_macros: { login: { params: ["pw"], body: ["/login {{pw}}"] } },
      bot_scenarios: [{ name: "s", steps: ["/x"] }],
      bot_automation: {
        clients: [{ name: "a", setup: [{ type: "macro", name: "login", args: { pw: "test-secret" } }], teardown: ["/quit"] }],
      },
    });

    expect(result.clients[0].setup).toEqual([{ type: "command", command: "/login test-secret", delay: 0 }]);
    expect(result.clients[0].teardown).toEqual([{ type: "command", command: "/quit", delay: 0 }]);
  });
});
