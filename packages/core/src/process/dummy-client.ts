import { BufferedCommandTransport } from "../transport/buffered.js";
import type { CommandTransport } from "../transport/interface.js";
import type { PlaybackLog } from "../runner/types.js";
import type { ScenarioAction } from "../scenario/types.js";
import { sleep, type Sleep } from "../util/async.js";
import { BaseBotClient, type BaseClientOptions, type ExecuteOptions } from "./client.js";

export interface DummyClientOptions extends BaseClientOptions {
  transport?: CommandTransport;
  connectDelayMs?: number;
  /** Truncate the transport on connect. */
  resetOnConnect?: boolean;
}

/**
 * Dry-run client: never launches anything, is ready as soon as it connects
 * and records every instruction to its transport (in memory by default).
 */
export class DummyBotClient extends BaseBotClient {
  readonly kind = "dummy" as const;
  readonly executedLogs: PlaybackLog[] = [];
  connectedTo: string | undefined;
  private readonly connectDelayMs: number;
  private readonly resetOnConnect: boolean;
  private readonly pause: Sleep;

  constructor(name: string, options: DummyClientOptions = {}) {
    super(name, options.transport ?? new BufferedCommandTransport(), options);
    this.connectDelayMs = options.connectDelayMs ?? 0;
    this.resetOnConnect = options.resetOnConnect ?? false;
    this.pause = options.sleep ?? sleep;
  }

  get commandTransport(): CommandTransport {
    return this.transport;
  }

  isConnected(): boolean {
    return this.connectedTo !== undefined;
  }

  async connect(address: string, signal?: AbortSignal): Promise<void> {
    if (this.resetOnConnect) await this.transport.clear?.();
    if (this.connectDelayMs > 0) await this.pause(this.connectDelayMs, signal);
    this.connectedTo = address;
  }

  async execute(actions: readonly ScenarioAction[], options: ExecuteOptions = {}): Promise<PlaybackLog> {
    const log = await super.execute(actions, options);
    this.executedLogs.push(log);
    return log;
  }

  async disconnect(): Promise<void> {
    if (this.connectedTo === undefined) return;
    await this.transport.flush();
    this.connectedTo = undefined;
  }
}

