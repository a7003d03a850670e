import { existsSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { StartupError, toErrorMessage } from "../errors.js";
import type { LogMonitorOptions } from "../monitor/log-monitor.js";
import { FileCommandTransport } from "../transport/file.js";
import { InputDriverTransport } from "../transport/input-driver.js";
import type { CommandTransport } from "../transport/interface.js";
import { XdotoolDriver } from "../transport/xdotool.js";
import { BaseBotClient, type BaseClientOptions } from "./client.js";
import { buildClientMonitors, withChatlog, type ClientLogFile } from "./client-logs.js";
import { ProcessController, type ControllerOptions } from "./controller.js";
import type { LaunchSpec } from "./interface.js";

export interface WineClientOptions extends BaseClientOptions, ControllerOptions {
  gameDir: string;
  launcher?: string;
  wineBinary?: string;
  commandFile?: string;
  dryRun?: boolean;
  env?: Record<string, string>;
  /** The client counts as ready once it has stayed up this long. */
  connectDelayMs?: number;
  resetCommandsOnConnect?: boolean;
  focusWindow?: boolean;
  windowTitle?: string;
  xdotoolBinary?: string;
  logs?: ClientLogFile[];
  chatlogPath?: string;
  chatlogEncoding?: BufferEncoding;
  monitor?: LogMonitorOptions;
}

class WineClientProcess extends ProcessController {
  address = "";
  private readonly launcherPath: string;
  private readonly wineBinary: string;
  private readonly gameDir: string;
  private readonly env: Record<string, string>;
  private readonly connectDelayMs: number;

  constructor(name: string, options: WineClientOptions) {
    super(name, options);
    const launcher = options.launcher ?? "samp.exe";
    this.launcherPath = isAbsolute(launcher) ? launcher : join(options.gameDir, launcher);
    this.wineBinary = options.wineBinary ?? "wine";
    this.gameDir = options.gameDir;
    this.env = options.env ?? {};
    this.connectDelayMs = options.connectDelayMs ?? 0;
  }

  protected async prepare(): Promise<void> {
    if (!existsSync(this.launcherPath)) {
      throw new StartupError(`${this.name}: client launcher not found at ${this.launcherPath}`);
    }
  }

  protected launchSpec(): LaunchSpec {
    return { command: this.wineBinary, args: [this.launcherPath, this.address], cwd: this.gameDir, env: this.env };
  }

  protected async checkReady(_process: unknown, elapsedMs: number): Promise<boolean> {
    return elapsedMs >= this.connectDelayMs;
  }
}

/** SA-MP client under Wine, fed through its command file and optionally xdotool. */
export class WineSampClient extends BaseBotClient {
  readonly kind = "wine" as const;
  readonly gameDir: string;
  readonly commandFile: FileCommandTransport;
  readonly driver: XdotoolDriver | undefined;
  private readonly process: WineClientProcess;
  private readonly dryRun: boolean;
  private readonly resetCommandsOnConnect: boolean;
  private connected = false;

  constructor(name: string, options: WineClientOptions) {
    const commandFile = new FileCommandTransport(options.commandFile ?? join(options.gameDir, "bot_commands.txt"));
    const dryRun = options.dryRun ?? false;
    const driver = options.focusWindow
      ? new XdotoolDriver({
          windowTitle: options.windowTitle,
          xdotoolBinary: options.xdotoolBinary,
          screenshotDir: options.screenshotDir ?? options.gameDir,
          dryRun,
        })
      : undefined;
    const holder: { process?: WineClientProcess } = {};
    const transport: CommandTransport = driver
      ? new InputDriverTransport(driver, {
          passthrough: commandFile,
          ready: () => dryRun || (holder.process?.isRunning() ?? false),
        })
      : commandFile;

    super(name, transport, {
      ...options,
      screenshotDir: options.screenshotDir ?? options.gameDir,
      monitors:
        options.monitors ??
        buildClientMonitors(
          name,
          options.gameDir,
          withChatlog(options.logs ?? [], options.chatlogPath, options.chatlogEncoding),
          options.monitor
        ),
    });

    this.gameDir = options.gameDir;
    this.commandFile = commandFile;
    this.driver = driver;
    this.dryRun = dryRun;
    this.resetCommandsOnConnect = options.resetCommandsOnConnect ?? true;
    this.process = new WineClientProcess(name, options);
    holder.process = this.process;
  }

  isConnected(): boolean {
    return this.connected && (this.dryRun || this.process.isRunning());
  }

  async connect(address: string, signal?: AbortSignal): Promise<void> {
    if (this.resetCommandsOnConnect) await this.commandFile.clear();
    if (!this.dryRun) {
      this.process.address = address;
      await this.process.start(signal);
    }
    if (this.driver) {
      try {
        await this.driver.focus();
      } catch (e) {
        await this.process.stop();
        throw new StartupError(`${this.name}: could not focus client window: ${toErrorMessage(e)}`, "STARTUP", {
          cause: e,
        });
      }
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    await this.commandFile.flush();
    await this.process.stop();
  }
}
