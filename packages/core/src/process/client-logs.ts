import { isAbsolute, join } from "node:path";
import { ClientLogMonitor, type LogMonitorOptions } from "../monitor/log-monitor.js";

export interface ClientLogFile {
  name: string;
  path: string;
  encoding?: BufferEncoding;
}

export const DEFAULT_CHATLOG_PATH = join("SAMP", "chatlog.txt");

/** Adds the SA-MP chat log unless a log named `chatlog` is already declared. */
export function withChatlog(
  logs: readonly ClientLogFile[],
  path: string = DEFAULT_CHATLOG_PATH,
  encoding?: BufferEncoding
): ClientLogFile[] {
  if (logs.some((entry) => entry.name === "chatlog")) return [...logs];
  return [...logs, { name: "chatlog", path, encoding }];
}

/** One monitor per declared log; relative paths resolve against `baseDir`. */
export function buildClientMonitors(
  client: string,
  baseDir: string,
  logs: readonly ClientLogFile[],
  options: LogMonitorOptions = {}
): ClientLogMonitor[] {
  return logs.map(
    (entry) =>
      new ClientLogMonitor(client, entry.name, isAbsolute(entry.path) ? entry.path : join(baseDir, entry.path), {
        ...options,
        encoding: entry.encoding ?? options.encoding,
      })
  );
}
