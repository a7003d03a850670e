import { describe, expect, it, vi } from "vitest";
import { AbortedError, ProcessExitedEarlyError, StartupTimeoutError } from "../errors.js";
import { ProcessController, type ControllerOptions } from "./controller.js";
import type { ExitInfo, LaunchSpec, ManagedProcess } from "./interface.js";

class FakeProcess implements ManagedProcess {
  readonly pid = 4242;
  readonly exited: Promise<ExitInfo>;
  readonly signals: NodeJS.Signals[] = [];
  private running = true;
  private resolveExit: (info: ExitInfo) => void = () => {};

  constructor(private readonly ignoreTerm = false) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.ignoreTerm) return;
    this.exit({ code: null, signal });
  }

  exit(info: ExitInfo): void {
    this.running = false;
    this.resolveExit(info);
  }
}

class TestController extends ProcessController {
  ready = true;
  /** When set, readiness checks wait on it. */
  readyGate: Promise<boolean> | undefined;
  checks = 0;
  readonly launched: FakeProcess[] = [];

  constructor(makeProcess: () => FakeProcess, options: ControllerOptions = {}) {
    super("test-server", {
      readyPollMs: 5,
      killTimeoutMs: 20,
      ...options,
      spawn: () => {
        const proc = makeProcess();
        this.launched.push(proc);
        return proc;
      },
    });
  }

  protected launchSpec(): LaunchSpec {
    return { command: "samp03svr", args: [] };
  }

  protected async checkReady(): Promise<boolean> {
    this.checks++;
    return this.readyGate ?? this.ready;
  }
}

describe("ProcessController", () => {
  it("starts, reports ready and stops with SIGTERM", async () => {
    const controller = new TestController(() => new FakeProcess());

    await controller.start();
    expect(controller.state).toBe("ready");
    expect(controller.isRunning()).toBe(true);
    expect(controller.pid).toBe(4242);

    await controller.stop();
    expect(controller.state).toBe("stopped");
    expect(controller.launched[0].signals).toEqual(["SIGTERM"]);
  });

  it("treats stop before start as a no-op", async () => {
    const controller = new TestController(() => new FakeProcess());

    await controller.stop();
    expect(controller.state).toBe("stopped");
    expect(controller.launched).toHaveLength(0);
  });

  it("rejects a start that is stopped before it completes", async () => {
    const controller = new TestController(() => new FakeProcess());
    let release: (ready: boolean) => void = () => {};
    controller.readyGate = new Promise((resolve) => {
      release = resolve;
    });

    const starting = controller.start();
    await vi.waitFor(() => expect(controller.checks).toBe(1));
    const stopping = controller.stop();
    release(true);

    await expect(starting).rejects.toBeInstanceOf(AbortedError);
    await stopping;
    expect(controller.state).toBe("stopped");
    expect(controller.isRunning()).toBe(false);
    expect(controller.launched[0].signals).toEqual(["SIGTERM"]);
  });

  it("signals the process only once when stopped twice", async () => {
    const controller = new TestController(() => new FakeProcess());
    await controller.start();

    await Promise.all([controller.stop(), controller.stop()]);
    await controller.stop();

    expect(controller.launched[0].signals).toEqual(["SIGTERM"]);
  });

  it("shares one launch between concurrent starts", async () => {
    const controller = new TestController(() => new FakeProcess());

    await Promise.all([controller.start(), controller.start()]);
    await controller.start();

    expect(controller.launched).toHaveLength(1);
    await controller.stop();
  });

  it("escalates to SIGKILL when SIGTERM is ignored", async () => {
    const controller = new TestController(() => new FakeProcess(true));
    await controller.start();

    await controller.stop();
    expect(controller.launched[0].signals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("fails when the process exits before it is ready", async () => {
    const controller = new TestController(() => {
      const proc = new FakeProcess();
      proc.exit({ code: 1, signal: null });
      return proc;
    });
    controller.ready = false;

    await expect(controller.start()).rejects.toBeInstanceOf(ProcessExitedEarlyError);
    expect(controller.state).toBe("stopped");
  });

  it("times out and kills a process that never becomes ready", async () => {
    const controller = new TestController(() => new FakeProcess(), { startupTimeoutMs: 30 });
    controller.ready = false;

    await expect(controller.start()).rejects.toBeInstanceOf(StartupTimeoutError);
    expect(controller.state).toBe("stopped");
    expect(controller.launched[0].isRunning()).toBe(false);
  });
});
