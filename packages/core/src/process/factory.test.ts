import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import type { PlannedClient } from "../plan/build.js";
import { ClientDefinitionSchema, ServerDefinitionSchema } from "../plan/schema.js";
import { FileCommandTransport } from "../transport/file.js";
import { DummyBotClient } from "./dummy-client.js";
import { createClient, createServer } from "./factory.js";
import { ExternalServer, SampServerController } from "./server.js";
import { WineSampClient } from "./wine-client.js";

function planned(raw: Record<string, unknown>): PlannedClient {
  return { definition: ClientDefinitionSchema.parse(raw), logNames: [], setup: [], teardown: [] };
}

const packageDir = "/srv/package";

describe("createClient", () => {
  it("keeps buffer clients in memory", () => {
    const client = createClient(planned({ name: "mem", type: "buffer" }), { packageDir });

    expect(client).toBeInstanceOf(DummyBotClient);
    expect(client instanceof DummyBotClient && client.commandTransport.kind).toBe("buffered");
  });

  it("writes file clients to Test/<name>_commands.log by default", () => {
    const client = createClient(planned({ name: "bot-1" }), { packageDir });

    const transport = client instanceof DummyBotClient ? client.commandTransport : undefined;
    expect(transport).toBeInstanceOf(FileCommandTransport);
    expect(transport instanceof FileCommandTransport && transport.path).toBe(
      join(packageDir, "Test", "bot-1_commands.log")
    );
  });

  it("replaces wine clients with file clients on a dry run", () => {
    const client = createClient(planned({ name: "gta", type: "wine" }), { packageDir, dryRun: true });

    expect(client.kind).toBe("dummy");
  });

  it("monitors the logs a file client declares", () => {
    const client = createClient(
      planned({ name: "bot-1", logs: [{ name: "out", path: "logs/bot-1.txt" }, { name: "abs", path: "/var/log/b.txt" }] }),
      { packageDir }
    );

    expect(client.logMonitors().map((m) => [m.name, m.path])).toEqual([
      ["bot-1:out", join(packageDir, "logs", "bot-1.txt")],
      ["bot-1:abs", "/var/log/b.txt"],
    ]);
  });

  it("keeps the chat log of a wine client on a dry run", () => {
    const client = createClient(planned({ name: "gta", type: "wine", gta_dir: "/games/gta" }), {
      packageDir,
      dryRun: true,
    });

    expect(client.logMonitors().map((m) => [m.name, m.path])).toEqual([
      ["gta:chatlog", join("/games/gta", "SAMP", "chatlog.txt")],
    ]);
  });

  it("builds a wine client when a game directory is known", () => {
    const client = createClient(planned({ name: "gta", type: "wine" }), { packageDir, gtaDir: "/games/gta" });

    expect(client).toBeInstanceOf(WineSampClient);
    expect(client instanceof WineSampClient && client.gameDir).toBe("/games/gta");
  });

  it("refuses a wine client without a game directory", () => {
    expect(() => createClient(planned({ name: "gta", type: "wine" }), { packageDir })).toThrow(ConfigError);
  });
});

describe("createServer", () => {
  it("assumes an external server on a dry run", async () => {
    const server = createServer(ServerDefinitionSchema.parse({ host: "192.168.1.20" }), { packageDir, dryRun: true });

    expect(server).toBeInstanceOf(ExternalServer);
    expect(await server.serverAddress()).toBe("192.168.1.20:7777");
    expect(server.logPath).toBe(join(packageDir, "server_log.txt"));
  });

  it("controls the package's server otherwise", () => {
    const server = createServer(ServerDefinitionSchema.parse({}), { packageDir });

    expect(server).toBeInstanceOf(SampServerController);
  });
});
