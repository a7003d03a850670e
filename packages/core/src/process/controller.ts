import { performance } from "node:perf_hooks";
import {
  AbortedError,
  BotrunError,
  ProcessExitedEarlyError,
  StartupError,
  StartupTimeoutError,
  toErrorMessage,
} from "../errors.js";
import { abortReason, linkSignals, sleep as defaultSleep, type LinkedSignal, type Sleep } from "../util/async.js";
import type { LaunchSpec, ManagedProcess, Spawner } from "./interface.js";
import { spawnProcess } from "./spawn.js";

export type ControllerState = "stopped" | "starting" | "ready" | "failed";

export interface ControllerOptions {
  spawn?: Spawner;
  startupTimeoutMs?: number;
  /** Grace between SIGTERM and SIGKILL. */
  killTimeoutMs?: number;
  readyPollMs?: number;
  sleep?: Sleep;
}

/**
 * Owns one external process: `stopped → starting → ready → stopped`, or
 * `starting/ready → failed → stopped`. Whatever happens during start, the
 * process is not left running.
 */
export abstract class ProcessController {
  readonly name: string;
  protected readonly startupTimeoutMs: number;
  protected readonly sleep: Sleep;
  private readonly spawner: Spawner;
  private readonly killTimeoutMs: number;
  private readonly readyPollMs: number;
  private current: ManagedProcess | undefined;
  private stateValue: ControllerState = "stopped";
  private starting: Promise<void> | undefined;
  private stopping: Promise<void> | undefined;
  private startScope: LinkedSignal | undefined;

  constructor(name: string, options: ControllerOptions = {}) {
    this.name = name;
    this.spawner = options.spawn ?? spawnProcess;
    this.startupTimeoutMs = options.startupTimeoutMs ?? 30000;
    this.killTimeoutMs = options.killTimeoutMs ?? 5000;
    this.readyPollMs = options.readyPollMs ?? 100;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): ControllerState {
    return this.stateValue;
  }

  get pid(): number | undefined {
    return this.current?.pid;
  }

  isRunning(): boolean {
    return this.stateValue === "ready" && (this.current?.isRunning() ?? false);
  }

  protected abstract launchSpec(): LaunchSpec | Promise<LaunchSpec>;

  /** Polled after launch until it returns true. */
  protected abstract checkReady(process: ManagedProcess, elapsedMs: number): Promise<boolean>;

  /** Runs before the process is launched, e.g. to mark a log offset. */
  protected async prepare(): Promise<void> {}

  /** Concurrent callers share one start. */
  start(signal?: AbortSignal): Promise<void> {
    if (this.stateValue === "ready" && this.current?.isRunning()) return Promise.resolve();
    this.starting ??= this.doStart(signal).finally(() => {
      this.starting = undefined;
    });
    return this.starting;
  }

  /** Idempotent; concurrent callers share one stop. Aborts a pending start. */
  stop(): Promise<void> {
    this.stopping ??= this.doStop().finally(() => {
      this.stopping = undefined;
    });
    return this.stopping;
  }

  private async doStart(signal?: AbortSignal): Promise<void> {
    await this.stopping;
    const scope = linkSignals(signal);
    this.startScope = scope;
    this.stateValue = "starting";

    try {
      await this.prepare();
      if (scope.signal.aborted) throw abortReason(scope.signal);
      const spec = await this.launchSpec();
      if (scope.signal.aborted) throw abortReason(scope.signal);

      const proc = this.spawner(spec);
      this.current = proc;
      await this.waitUntilReady(proc, scope.signal);
      if (this.current !== proc) throw new AbortedError(`${this.name} stopped during startup`);
      this.stateValue = "ready";
    } catch (e) {
      this.stateValue = "failed";
      await this.stop();
      if (e instanceof BotrunError) throw e;
      throw new StartupError(`${this.name} failed to start: ${toErrorMessage(e)}`, "STARTUP", { cause: e });
    } finally {
      scope.dispose();
      if (this.startScope === scope) this.startScope = undefined;
    }
  }

  private async waitUntilReady(proc: ManagedProcess, signal: AbortSignal): Promise<void> {
    const began = performance.now();
    for (;;) {
      if (signal.aborted) throw abortReason(signal);
      if (!proc.isRunning()) {
        const exit = await proc.exited;
        if (exit.error) throw new StartupError(`${this.name} could not be launched: ${exit.error}`);
        throw new ProcessExitedEarlyError(this.name, exit.code, exit.signal);
      }
      const elapsed = performance.now() - began;
      const ready = await this.checkReady(proc, elapsed);
      if (signal.aborted) throw abortReason(signal);
      if (ready) return;
      if (elapsed >= this.startupTimeoutMs) throw new StartupTimeoutError(this.name, this.startupTimeoutMs);
      await this.sleep(Math.min(this.readyPollMs, this.startupTimeoutMs - elapsed), signal);
    }
  }

  private async doStop(): Promise<void> {
    this.startScope?.abort(new AbortedError(`${this.name} stopped during startup`));
    const proc = this.current;
    this.current = undefined;
    if (proc) await this.terminate(proc);
    this.stateValue = "stopped";
  }

  private async terminate(proc: ManagedProcess): Promise<void> {
    if (!proc.isRunning()) return;
    proc.kill("SIGTERM");
    if (await this.exitsWithin(proc, this.killTimeoutMs)) return;
    proc.kill("SIGKILL");
    await this.exitsWithin(proc, this.killTimeoutMs);
  }

  private async exitsWithin(proc: ManagedProcess, ms: number): Promise<boolean> {
    const timer = new AbortController();
    try {
      return await Promise.race([
        proc.exited.then(() => true),
        this.sleep(ms, timer.signal).then(
          () => !proc.isRunning(),
          () => !proc.isRunning()
        ),
      ]);
    } finally {
      timer.abort();
    }
  }
}
