import { isAbsolute, join } from "node:path";
import type { ClientLogMonitor } from "../monitor/log-monitor.js";
import { ScriptRunner, type ScriptRunnerOptions } from "../runner/script-runner.js";
import type { ConditionWaiter, PlaybackLog, PlaybackPhase } from "../runner/types.js";
import type { ScenarioAction } from "../scenario/types.js";
import type { CommandTransport } from "../transport/interface.js";

export type ClientKind = "dummy" | "wine";

export interface ExecuteOptions {
  label?: string;
  phase?: PlaybackPhase;
  signal?: AbortSignal;
  waiter?: ConditionWaiter;
}

/** A simulated player the orchestrator can connect and drive. */
export interface BotClient {
  readonly name: string;
  readonly kind: ClientKind;
  readonly setupActions: readonly ScenarioAction[];
  readonly teardownActions: readonly ScenarioAction[];
  isConnected(): boolean;
  connect(address: string, signal?: AbortSignal): Promise<void>;
  execute(actions: readonly ScenarioAction[], options?: ExecuteOptions): Promise<PlaybackLog>;
  disconnect(): Promise<void>;
  /** Releases the transport; the client is unusable afterwards. */
  close(): Promise<void>;
  logMonitors(): readonly ClientLogMonitor[];
  /** Screenshot paths captured since the last {@link clearScreenshots}. */
  screenshots(): readonly string[];
  clearScreenshots(): void;
}

export interface BaseClientOptions extends ScriptRunnerOptions {
  setup?: readonly ScenarioAction[];
  teardown?: readonly ScenarioAction[];
  /** Where client-side screenshots land when the transport reports no path. */
  screenshotDir?: string;
  monitors?: readonly ClientLogMonitor[];
}

export abstract class BaseBotClient implements BotClient {
  readonly name: string;
  abstract readonly kind: ClientKind;
  readonly setupActions: readonly ScenarioAction[];
  readonly teardownActions: readonly ScenarioAction[];
  protected readonly transport: CommandTransport;
  private readonly runner: ScriptRunner;
  private readonly screenshotDir: string | undefined;
  private readonly monitors: readonly ClientLogMonitor[];
  private captured: string[] = [];

  constructor(name: string, transport: CommandTransport, options: BaseClientOptions = {}) {
    this.name = name;
    this.transport = transport;
    this.runner = new ScriptRunner(transport, options);
    this.setupActions = options.setup ?? [];
    this.teardownActions = options.teardown ?? [];
    this.screenshotDir = options.screenshotDir;
    this.monitors = options.monitors ?? [];
  }

  abstract isConnected(): boolean;
  abstract connect(address: string, signal?: AbortSignal): Promise<void>;
  abstract disconnect(): Promise<void>;

  async execute(actions: readonly ScenarioAction[], options: ExecuteOptions = {}): Promise<PlaybackLog> {
    const log = await this.runner.run(actions, { ...options, label: options.label ?? this.name });
    for (const event of log.events) {
      if (event.action.type !== "screenshot" || event.status !== "ok") continue;
      const path = event.artifact ?? this.expectedScreenshotPath(event.action.name, event.action.path);
      if (path) this.captured.push(path);
    }
    return log;
  }

  async close(): Promise<void> {
    await this.disconnect();
    await this.transport.close();
  }

  logMonitors(): readonly ClientLogMonitor[] {
    return this.monitors;
  }

  screenshots(): readonly string[] {
    return [...this.captured];
  }

  clearScreenshots(): void {
    this.captured = [];
  }

  private expectedScreenshotPath(name: string, path: string | undefined): string | undefined {
    if (path && isAbsolute(path)) return path;
    if (!this.screenshotDir) return undefined;
    return join(this.screenshotDir, path ?? `${name}.png`);
  }
}
