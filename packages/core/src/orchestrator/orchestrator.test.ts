import { appendFile, appendFileSync } from "node:fs";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ClientLogMonitor } from "../monitor/log-monitor.js";
import { buildRunPlan, parseBotConfig } from "../plan/build.js";
import { DummyBotClient } from "../process/dummy-client.js";
import { createClients } from "../process/factory.js";
import { ExternalServer } from "../process/server.js";
import { BufferedCommandTransport } from "../transport/buffered.js";
import type { Instruction } from "../transport/instruction.js";
import type { SendReceipt } from "../transport/interface.js";
import { OrchestratorContext } from "./context.js";
import { TestOrchestrator, withSuffix } from "./orchestrator.js";
import type { OrchestratorEvent } from "./types.js";

/** Buffered transport that reports every server command it carries. */
class HookedTransport extends BufferedCommandTransport {
  private count = 0;

  constructor(private readonly onCommand: (text: string, count: number) => void) {
    super();
  }

  async send(instruction: Instruction): Promise<SendReceipt> {
    const receipt = await super.send(instruction);
    if (instruction.op === "command") this.onCommand(instruction.text, ++this.count);
    return receipt;
  }
}

describe("TestOrchestrator", () => {
  let dir: string;
  let serverLog: string;
  const pending: Promise<void>[] = [];
  const contexts: OrchestratorContext[] = [];

  /** Appends a line a little later, the way a server logs in response to a command. */
  function emitLater(path: string, line: string): void {
    pending.push(
      new Promise<void>((resolve, reject) => {
        setTimeout(() => appendFile(path, `${line}\n`, (err) => (err ? reject(err) : resolve())), 20);
      })
    );
  }

  function planFor(scenarios: unknown[], automation: Record<string, unknown>) {
    return buildRunPlan(
      parseBotConfig({ bot_scenarios: scenarios, bot_automation: { clients: [{ name: "bot-1" }], ...automation } })
    );
  }

  function harness(
    onCommand: (text: string, count: number) => void = () => {},
    monitors: ClientLogMonitor[] = [],
    listener: (event: OrchestratorEvent) => void = () => {}
  ) {
    const server = new ExternalServer("127.0.0.1:7777", serverLog, { pollIntervalMs: 10 });
    const transport = new HookedTransport(onCommand);
    const client = new DummyBotClient("bot-1", { transport, monitors });
    const context = new OrchestratorContext({ server, clients: [client] });
    contexts.push(context);
    const events: OrchestratorEvent[] = [];
    const orchestrator = new TestOrchestrator({
      context,
      onEvent: (e) => {
        events.push(e);
        listener(e);
      },
    });
    return { transport, events, orchestrator };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "botrun-orchestrator-"));
    serverLog = join(dir, "server_log.txt");
    await writeFile(serverLog, "");
  });

  afterEach(async () => {
    await Promise.all(pending.splice(0));
    await Promise.all(contexts.splice(0).map((c) => c.close()));
    await rm(dir, { recursive: true, force: true });
  });

  it("retries an iteration until an attempt passes", async () => {
    const plan = planFor([{ name: "spawn", steps: ["/spawn"] }], {
      runs: [{ scenario: "spawn", retries: 2, expect_server_logs: [{ pattern: "spawned", timeout: 0.5 }] }],
    });
    const { events, orchestrator } = harness((text, count) => {
      if (text === "/spawn" && count >= 2) emitLater(serverLog, "[spawn] bot-1 spawned");
    });

    const suite = await orchestrator.runSuite(plan.runs);

    expect(suite.results.map((r) => [r.status, r.iteration, r.attempt])).toEqual([
      ["failed", 1, 1],
      ["passed", 1, 2],
    ]);
    expect(suite.results[0].failures).toEqual([
      { category: "server_log", subject: "spawned", message: '"spawned" seen 0/1 within 0.5s' },
    ]);
    expect(suite.runs).toEqual([{ runId: "spawn", description: "spawn", status: "passed", attempts: 2, iterations: 1 }]);
    expect(suite.status).toBe("passed");
    expect(events.filter((e) => e.type === "attempt:retry")).toHaveLength(1);
  });

  it("records every attempt when all retries fail", async () => {
    const plan = planFor([{ name: "spawn", steps: ["/spawn"] }], {
      runs: [{ scenario: "spawn", retries: 2, expect_server_logs: [{ pattern: "spawned", timeout: 0.05 }] }],
    });
    const { orchestrator } = harness();

    const suite = await orchestrator.runSuite(plan.runs);

    expect(suite.results.map((r) => [r.status, r.attempt])).toEqual([
      ["failed", 1],
      ["failed", 2],
      ["failed", 3],
    ]);
    expect(suite.runs[0]).toMatchObject({ status: "failed", attempts: 3 });
    expect(suite.status).toBe("failed");
  });

  it("skips the remaining runs after a failure in fail-fast mode", async () => {
    const plan = planFor(
      [
        { name: "a", steps: ["/a"] },
        { name: "b", steps: ["/b"] },
        { name: "c", steps: ["/c"] },
      ],
      { runs: [{ scenario: "a", expect_server_logs: [{ pattern: "never", timeout: 0.05 }] }, { scenario: "b" }, { scenario: "c" }] }
    );
    const { transport, events, orchestrator } = harness();

    const suite = await orchestrator.runSuite(plan.runs, { failFast: true });

    expect(suite.runs.map((r) => [r.runId, r.status])).toEqual([
      ["a", "failed"],
      ["b", "skipped"],
      ["c", "skipped"],
    ]);
    expect(suite.results[1]).toMatchObject({
      status: "skipped",
      iteration: 0,
      attempt: 0,
      skipReason: 'fail-fast: run "a" did not pass',
    });
    expect(transport.lines()).toEqual(["/a"]);
    expect(events.filter((e) => e.type === "run:skipped")).toHaveLength(2);
    expect(suite.status).toBe("failed");
  });

  it("waits for server log lines in the middle of a scenario", async () => {
    const plan = planFor(
      [{ name: "spawn", steps: ["/spawn", { type: "wait_for", pattern: "spawned", timeout: 2, fatal: true }, "/done"] }],
      {}
    );
    const { transport, events, orchestrator } = harness((text) => {
      if (text === "/spawn") emitLater(serverLog, "[spawn] bot-1 spawned");
    });

    const suite = await orchestrator.runSuite(plan.runs);

    const [result] = suite.results;
    expect(result.status).toBe("passed");
    expect(transport.lines()).toEqual(["/spawn", "/done"]);
    expect(result.clients[0].status).toBe("completed");
    expect(result.clients[0].playback?.events[1]).toMatchObject({ status: "ok", observed: 1 });
    expect(events).toContainEqual({ type: "server:ready", address: "127.0.0.1:7777" });
  });

  it("aborts an attempt that runs past its timeout and moves on", async () => {
    const plan = planFor(
      [
        { name: "slow", steps: [{ type: "wait", seconds: 5 }] },
        { name: "fast", steps: ["/ok"] },
      ],
      { runs: [{ scenario: "slow", timeout: 0.1 }, { scenario: "fast" }] }
    );
    const { orchestrator } = harness();

    const suite = await orchestrator.runSuite(plan.runs);

    expect(suite.results.map((r) => r.status)).toEqual(["aborted", "passed"]);
    expect(suite.results[0].failures).toEqual([
      { category: "aborted", subject: "bot-1", message: "scenario: Run timed out after 100ms" },
    ]);
    expect(suite.status).toBe("failed");
  });

  it("skips the rest of the suite once aborted from outside", async () => {
    const plan = planFor(
      [
        { name: "a", steps: ["/a"] },
        { name: "b", steps: ["/b"] },
      ],
      {}
    );
    const controller = new AbortController();
    const { transport, orchestrator } = harness(undefined, [], (e) => {
      if (e.type === "attempt:end") controller.abort();
    });

    const suite = await orchestrator.runSuite(plan.runs, { signal: controller.signal });

    expect(transport.lines()).toEqual(["/a"]);
    expect(suite.runs.map((r) => r.status)).toEqual(["passed", "skipped"]);
    expect(suite.results[1].skipReason).toBe("suite aborted");
    expect(suite.status).toBe("aborted");
  });

  it("writes per-iteration artifacts and evaluates assertions", async () => {
    const plan = planFor([{ name: "s", steps: ["/a", "/b"] }], {
      runs: [
        {
          scenario: "s",
          iterations: 2,
          collect_server_log: true,
          server_log_export: join(dir, "out", "server.log"),
          record_playback_dir: join(dir, "playback"),
          assertions: [{ type: "command_count", max: 1 }],
        },
      ],
    });
    const { orchestrator } = harness((text) => appendFileSync(serverLog, `[cmd] ${text}\n`));

    const suite = await orchestrator.runSuite(plan.runs);

    expect(suite.results.map((r) => [r.iteration, r.status])).toEqual([
      [1, "failed"],
      [2, "failed"],
    ]);
    const [first, second] = suite.results;
    expect(first.serverLogExcerpt).toBe("[cmd] /a\n[cmd] /b");
    expect(first.serverLogPath).toBe(join(dir, "out", "server.log"));
    expect(second.serverLogPath).toBe(join(dir, "out", "server_i2_a1.log"));
    expect(await readFile(join(dir, "out", "server_i2_a1.log"), "utf-8")).toBe("[cmd] /a\n[cmd] /b");
    expect((await readdir(join(dir, "playback"))).sort()).toEqual(["s_bot-1_i1_a1.json", "s_bot-1_i2_a1.json"]);
    expect(first.assertions).toMatchObject([{ name: "command_count", passed: false, actual: 2, message: "expected <= 1, got 2" }]);
    expect(first.failures).toEqual([{ category: "assertion", subject: "command_count", message: "expected <= 1, got 2" }]);
    expect(suite.runs[0]).toMatchObject({ status: "failed", iterations: 2, attempts: 2 });
  });

  it("matches and exports client logs", async () => {
    const chatlog = join(dir, "chatlog.txt");
    await writeFile(chatlog, "");
    const plan = buildRunPlan(
      parseBotConfig({
        bot_scenarios: [{ name: "talk", steps: ["/say hi"] }],
        bot_automation: {
          clients: [{ name: "bot-1", logs: [{ name: "chatlog", path: chatlog }] }],
          runs: [
            {
              scenario: "talk",
              expect_client_logs: [{ client: "bot-1", pattern: "hello back", timeout: 1 }],
              export_client_logs: [{ client: "bot-1" }],
            },
          ],
        },
      })
    );
    const { orchestrator } = harness(
      () => emitLater(chatlog, "[chat] server: hello back"),
      [new ClientLogMonitor("bot-1", "chatlog", chatlog, { pollIntervalMs: 10 })]
    );

    const suite = await orchestrator.runSuite(plan.runs);

    const [result] = suite.results;
    expect(result.status).toBe("passed");
    expect(result.clientExpectations[0]).toMatchObject({ source: "bot-1:chatlog", matched: true, observed: 1 });
    expect(result.clientLogExports).toEqual([
      { client: "bot-1", log: "chatlog", lines: 1, content: "[chat] server: hello back" },
    ]);
  });

  it("drives clients built from the configuration with their declared logs", async () => {
    const plan = buildRunPlan(
      parseBotConfig({
        bot_scenarios: [
          { name: "talk", steps: ["/say hi"] },
          { name: "after", steps: ["/bye"] },
        ],
        bot_automation: {
          clients: [{ name: "bot-1", logs: [{ name: "out", path: join("Test", "bot-1_commands.log") }] }],
          runs: [
            {
              scenario: "talk",
              expect_client_logs: [{ client: "bot-1", log: "out", pattern: "/say hi", timeout: 1 }],
              export_client_logs: [{ client: "bot-1", log: "out" }],
            },
            { scenario: "after" },
          ],
        },
      })
    );
    const server = new ExternalServer("127.0.0.1:7777", serverLog, { pollIntervalMs: 10 });
    const clients = createClients(plan.clients, { packageDir: dir, monitor: { pollIntervalMs: 10 } });
    const context = new OrchestratorContext({ server, clients });
    contexts.push(context);

    const suite = await new TestOrchestrator({ context }).runSuite(plan.runs);

    expect(suite.runs.map((r) => [r.runId, r.status])).toEqual([
      ["talk", "passed"],
      ["after", "passed"],
    ]);
    expect(suite.results[0].clientExpectations[0]).toMatchObject({ source: "bot-1:out", matched: true, observed: 1 });
    expect(suite.results[0].clientLogExports).toEqual([{ client: "bot-1", log: "out", lines: 1, content: "/say hi" }]);
  });
});

describe("withSuffix", () => {
  it("inserts the suffix before the extension", () => {
    expect(withSuffix("/logs/server.log", "_i2_a1")).toBe("/logs/server_i2_a1.log");
    expect(withSuffix("/logs/server", "_i1_a3")).toBe("/logs/server_i1_a3");
    expect(withSuffix("/logs/server.log", "")).toBe("/logs/server.log");
  });
});
