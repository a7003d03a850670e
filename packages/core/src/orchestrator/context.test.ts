import { describe, expect, it } from "vitest";
import { CleanupError, StartupError } from "../errors.js";
import { DummyBotClient } from "../process/dummy-client.js";
import { ExternalServer } from "../process/server.js";
import { BufferedCommandTransport } from "../transport/buffered.js";
import { runResult, suiteResult } from "../testing/results.js";
import { OrchestratorContext } from "./context.js";

class StuckTransport extends BufferedCommandTransport {
  async close(): Promise<void> {
    throw new Error("command file locked");
  }
}

class StuckServer extends ExternalServer {
  async stop(): Promise<void> {
    throw new Error("server did not exit");
  }
}

const server = () => new ExternalServer("10.0.0.5:7777", "/nonexistent/server_log.txt");

describe("OrchestratorContext", () => {
  it("looks clients up by name and reports the server address", async () => {
    const ctx = new OrchestratorContext({ server: server(), clients: [new DummyBotClient("a"), new DummyBotClient("b")] });

    expect(ctx.client("b")?.name).toBe("b");
    expect(ctx.client("c")).toBeUndefined();
    expect(await ctx.ensureServer()).toBe("10.0.0.5:7777");

    await ctx.close();
    await expect(ctx.ensureServer()).rejects.toBeInstanceOf(StartupError);
  });

  it("closes everything even when the callback throws", async () => {
    const client = new DummyBotClient("a");

    await expect(
      OrchestratorContext.run({ server: server(), clients: [client] }, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(client.commandTransport.isReady()).toBe(false);
  });

  it("keeps a finished suite when cleanup fails", async () => {
    const suite = suiteResult([runResult()]);

    const result = await OrchestratorContext.run(
      { server: new StuckServer("10.0.0.5:7777", "/nonexistent/server_log.txt"), clients: [new DummyBotClient("a")] },
      async () => suite
    );

    expect(result.status).toBe("passed");
    expect(result.results).toEqual(suite.results);
    expect(result.cleanupErrors).toEqual(["server did not exit"]);
  });

  it("collects cleanup failures", async () => {
    const healthy = new DummyBotClient("a");
    const ctx = new OrchestratorContext({
      server: server(),
      clients: [healthy, new DummyBotClient("b", { transport: new StuckTransport() })],
    });

    await expect(ctx.close()).rejects.toThrow(new CleanupError(["command file locked"]));
    expect(healthy.commandTransport.isReady()).toBe(false);
    await expect(ctx.close()).resolves.toBeUndefined();
  });
});
