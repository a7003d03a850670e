import { appendFileSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ExitInfo, LaunchSpec, ManagedProcess } from "./interface.js";
import { ExternalServer, SampServerController, parseServerPort } from "./server.js";

function runningProcess(): ManagedProcess {
  let running = true;
  let done: (info: ExitInfo) => void = () => {};
  const exited = new Promise<ExitInfo>((resolve) => {
    done = resolve;
  });
  return {
    pid: 1,
    exited,
    isRunning: () => running,
    kill: (signal) => {
      running = false;
      done({ code: null, signal });
    },
  };
}

describe("parseServerPort", () => {
  it("reads the port line of server.cfg", () => {
    expect(parseServerPort("echo Executing Server Config...\nlanmode 0\nport 8888\nhostname Test")).toBe(8888);
    expect(parseServerPort("hostname no port here")).toBeUndefined();
  });
});

describe("SampServerController", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "botrun-server-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("becomes ready when the startup phrase is logged after launch", async () => {
    const logPath = join(dir, "server_log.txt");
    await writeFile(logPath, "Started server on port 7777 (previous boot)\n");
    const launches: LaunchSpec[] = [];
    const server = new SampServerController(dir, {
      readyPollMs: 5,
      startupTimeoutMs: 2000,
      spawn: (spec) => {
        launches.push(spec);
        appendFileSync(logPath, "Loading gamemode...\nStarted server on port 7777\n");
        return runningProcess();
      },
    });

    await server.start();

    expect(server.state).toBe("ready");
    expect(launches).toEqual([{ command: join(dir, "samp03svr"), args: [], cwd: dir, env: {} }]);
    await server.stop();
    expect(server.state).toBe("stopped");
  });

  it("takes its address from server.cfg", async () => {
    const server = new SampServerController(dir, { host: "10.0.0.5" });
    expect(await server.serverAddress()).toBe("10.0.0.5:7777");

    await writeFile(join(dir, "server.cfg"), "port 7780\n");
    expect(await server.serverAddress()).toBe("10.0.0.5:7780");
  });
});

describe("ExternalServer", () => {
  it("launches nothing and reports the configured address", async () => {
    const server = new ExternalServer("127.0.0.1:7777", "/nonexistent/server_log.txt");

    await server.start();
    expect(await server.serverAddress()).toBe("127.0.0.1:7777");
    expect(server.logMonitor.name).toBe("server");
    await server.stop();
  });
});
