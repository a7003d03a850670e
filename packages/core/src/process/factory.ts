import { isAbsolute, join } from "node:path";
import { ConfigError } from "../errors.js";
import type { ClientLogMonitor, LogMonitorOptions } from "../monitor/log-monitor.js";
import type { PlannedClient } from "../plan/build.js";
import type { ServerDefinition } from "../plan/schema.js";
import { BufferedCommandTransport } from "../transport/buffered.js";
import { FileCommandTransport } from "../transport/file.js";
import { secondsToMs, type Sleep } from "../util/async.js";
import type { BotClient } from "./client.js";
import { buildClientMonitors, withChatlog } from "./client-logs.js";
import { DummyBotClient } from "./dummy-client.js";
import type { Spawner } from "./interface.js";
import { DEFAULT_SERVER_PORT, ExternalServer, SampServerController, type GameServer } from "./server.js";
import { WineSampClient } from "./wine-client.js";

export interface FactoryOptions {
  /** Root of the generated server package. */
  packageDir: string;
  /** Nothing is launched: clients write to their command files, the server is assumed. */
  dryRun?: boolean;
  /** Default game directory for wine clients that name none. */
  gtaDir?: string;
  screenshotDir?: string;
  monitor?: LogMonitorOptions;
  spawn?: Spawner;
  sleep?: Sleep;
}

export function createServer(definition: ServerDefinition, options: FactoryOptions): GameServer {
  if (options.dryRun) {
    return new ExternalServer(
      `${definition.host}:${DEFAULT_SERVER_PORT}`,
      resolveIn(options.packageDir, definition.log_file),
      options.monitor
    );
  }
  return new SampServerController(options.packageDir, {
    executable: definition.executable,
    args: definition.args,
    startupPhrase: definition.startup_phrase,
    logFile: definition.log_file,
    configFile: definition.config_file,
    host: definition.host,
    env: definition.environment,
    startupTimeoutMs: secondsToMs(definition.startup_timeout),
    monitor: options.monitor,
    spawn: options.spawn,
    sleep: options.sleep,
  });
}

export function createClients(planned: readonly PlannedClient[], options: FactoryOptions): BotClient[] {
  return planned.map((client) => createClient(client, options));
}

export function createClient({ definition, setup, teardown }: PlannedClient, options: FactoryOptions): BotClient {
  const common = {
    setup,
    teardown,
    screenshotDir: options.screenshotDir,
    sleep: options.sleep,
  };
  const commandFile = resolveIn(
    options.packageDir,
    definition.command_file ?? join("Test", `${definition.name}_commands.log`)
  );
  const fileTransport = (): FileCommandTransport =>
    new FileCommandTransport(commandFile, { separator: definition.command_separator });

  const gameDir = definition.gta_dir ?? options.gtaDir;
  // A dry-run wine client still reads its chat log from the game directory.
  const monitors = (): ClientLogMonitor[] =>
    definition.type === "wine"
      ? buildClientMonitors(
          definition.name,
          gameDir ? resolveIn(options.packageDir, gameDir) : options.packageDir,
          withChatlog(definition.logs, definition.chatlog, definition.chatlog_encoding),
          options.monitor
        )
      : buildClientMonitors(definition.name, options.packageDir, definition.logs, options.monitor);

  if (definition.type === "buffer") {
    return new DummyBotClient(definition.name, {
      ...common,
      transport: new BufferedCommandTransport(),
      monitors: monitors(),
    });
  }
  if (definition.type !== "wine" || options.dryRun) {
    return new DummyBotClient(definition.name, {
      ...common,
      monitors: monitors(),
      transport: fileTransport(),
      connectDelayMs: options.dryRun ? 0 : secondsToMs(definition.connect_delay),
      resetOnConnect: definition.reset_commands_on_connect,
    });
  }

  if (!gameDir) {
    throw new ConfigError(`Client "${definition.name}" is a wine client but no gta_dir is configured`);
  }
  return new WineSampClient(definition.name, {
    ...common,
    gameDir: resolveIn(options.packageDir, gameDir),
    launcher: definition.launcher,
    wineBinary: definition.wine_binary,
    commandFile: definition.command_file ? commandFile : undefined,
    dryRun: definition.dry_run,
    env: definition.environment,
    connectDelayMs: secondsToMs(definition.connect_delay),
    startupTimeoutMs: secondsToMs(definition.startup_timeout),
    resetCommandsOnConnect: definition.reset_commands_on_connect,
    focusWindow: definition.focus_window,
    windowTitle: definition.window_title,
    xdotoolBinary: definition.xdotool_binary,
    logs: definition.logs,
    chatlogPath: definition.chatlog,
    chatlogEncoding: definition.chatlog_encoding,
    monitor: options.monitor,
    spawn: options.spawn,
  });
}

function resolveIn(base: string, path: string): string {
  return isAbsolute(path) ? path : join(base, path);
}
