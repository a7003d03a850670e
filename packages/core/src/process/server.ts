import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { LogTail } from "../monitor/log-tail.js";
import { ServerLogMonitor, type LogMonitor, type LogMonitorOptions } from "../monitor/log-monitor.js";
import { ProcessController, type ControllerOptions } from "./controller.js";
import { isNotFound } from "../util/fs.js";
import type { LaunchSpec } from "./interface.js";

export const DEFAULT_SERVER_PORT = 7777;

export interface ServerControllerOptions extends ControllerOptions {
  /** Relative paths resolve against the package directory. */
  executable?: string;
  args?: string[];
  startupPhrase?: string;
  logFile?: string;
  configFile?: string;
  host?: string;
  env?: Record<string, string>;
  monitor?: LogMonitorOptions;
}

/** What the orchestrator needs from the game server of a run. */
export interface GameServer {
  readonly logPath: string;
  readonly logMonitor: LogMonitor;
  start(signal?: AbortSignal): Promise<void>;
  stop(): Promise<void>;
  serverAddress(): Promise<string>;
}

/** Reads `port` from a server.cfg body. */
export function parseServerPort(cfg: string): number | undefined {
  for (const raw of cfg.split(/\r?\n/)) {
    const match = /^\s*port\s+(\d+)\s*$/i.exec(raw);
    if (match) return Number(match[1]);
  }
  return undefined;
}

/**
 * The dedicated server of a generated package. Ready once the startup phrase
 * shows up in the server log after launch.
 */
export class SampServerController extends ProcessController implements GameServer {
  readonly packageDir: string;
  readonly logPath: string;
  readonly logMonitor: ServerLogMonitor;
  private readonly executable: string;
  private readonly args: string[];
  private readonly startupPhrase: string;
  private readonly configPath: string;
  private readonly host: string;
  private readonly env: Record<string, string>;
  private readonly tailOptions: LogMonitorOptions;
  private readinessTail: LogTail;

  constructor(packageDir: string, options: ServerControllerOptions = {}) {
    super("server", options);
    this.packageDir = packageDir;
    this.executable = options.executable ?? "samp03svr";
    this.args = options.args ?? [];
    this.startupPhrase = options.startupPhrase ?? "Started server on";
    this.logPath = join(packageDir, options.logFile ?? "server_log.txt");
    this.configPath = join(packageDir, options.configFile ?? "server.cfg");
    this.host = options.host ?? "127.0.0.1";
    this.env = options.env ?? {};
    this.tailOptions = options.monitor ?? {};
    this.readinessTail = new LogTail(this.logPath, this.tailOptions);
    this.logMonitor = new ServerLogMonitor(this.logPath, options.monitor);
  }

  /** `host:port`, port taken from server.cfg. */
  async serverAddress(): Promise<string> {
    let port = DEFAULT_SERVER_PORT;
    try {
      port = parseServerPort(await readFile(this.configPath, "utf-8")) ?? DEFAULT_SERVER_PORT;
    } catch (e) {
      if (!isNotFound(e)) throw e;
    }
    return `${this.host}:${port}`;
  }

  protected async prepare(): Promise<void> {
    this.readinessTail = new LogTail(this.logPath, this.tailOptions);
    await this.readinessTail.mark();
  }

  protected launchSpec(): LaunchSpec {
    const command = isAbsolute(this.executable) ? this.executable : join(this.packageDir, this.executable);
    return { command, args: this.args, cwd: this.packageDir, env: this.env };
  }

  protected async checkReady(): Promise<boolean> {
    const lines = await this.readinessTail.read();
    return lines.some((line) => line.includes(this.startupPhrase));
  }
}

/**
 * A server somebody else runs (or none at all, for dry runs). Only its log is
 * watched.
 */
export class ExternalServer implements GameServer {
  readonly logPath: string;
  readonly logMonitor: ServerLogMonitor;
  private readonly address: string;

  constructor(address: string, logPath: string, options: LogMonitorOptions = {}) {
    this.address = address;
    this.logPath = logPath;
    this.logMonitor = new ServerLogMonitor(logPath, options);
  }

  async start(): Promise<void> {}

  async stop(): Promise<void> {
    await this.logMonitor.close();
  }

  async serverAddress(): Promise<string> {
    return this.address;
  }
}
