import { join } from "node:path";
import type { ClientLogExportSpec, RunContext } from "../orchestrator/types.js";
import type { PlannedClient } from "./build.js";

/** Suite-wide settings from the command line, layered over each run. */
export interface RunDefaults {
  /** Raises each run's retries to at least this. */
  retries?: number;
  /** Used where the run configures no grace period. */
  gracePeriodMs?: number;
  /** Used where the run configures no timeout. */
  timeoutMs?: number;
  recordPlaybackDir?: string;
  /** Every run exports its server log here unless it names its own file. */
  serverLogDir?: string;
  /** Every log of every client of a run is exported here, unless already exported. */
  clientLogDir?: string;
}

export function applyRunDefaults(
  runs: readonly RunContext[],
  clients: readonly PlannedClient[],
  defaults: RunDefaults
): RunContext[] {
  const logNames = new Map(clients.map((c) => [c.definition.name, c.logNames]));

  return runs.map((source) => {
    const run: RunContext = { ...source, clientLogExports: [...source.clientLogExports] };
    if (defaults.retries !== undefined) run.retries = Math.max(run.retries, defaults.retries);
    if (defaults.gracePeriodMs !== undefined && run.gracePeriodMs === 0) run.gracePeriodMs = defaults.gracePeriodMs;
    if (defaults.timeoutMs !== undefined && run.timeoutMs === undefined) run.timeoutMs = defaults.timeoutMs;
    if (defaults.recordPlaybackDir && !run.recordPlaybackDir) run.recordPlaybackDir = defaults.recordPlaybackDir;

    if (defaults.serverLogDir && !run.serverLogExport) {
      run.serverLogExport = join(defaults.serverLogDir, `${run.slug}_server.log`);
      run.collectServerLog = true;
    }

    const clientLogDir = defaults.clientLogDir;
    if (clientLogDir) {
      for (const client of run.clients) {
        for (const log of logNames.get(client) ?? []) {
          const existing = run.clientLogExports.find((e) => e.client === client && e.log === log);
          const path = join(clientLogDir, `${run.slug}_${client}_${log}.log`);
          if (!existing) run.clientLogExports.push({ client, log, path });
          else if (!existing.path) replaceExport(run.clientLogExports, existing, { ...existing, path });
        }
      }
    }
    return run;
  });
}

function replaceExport(list: ClientLogExportSpec[], old: ClientLogExportSpec, next: ClientLogExportSpec): void {
  list[list.indexOf(old)] = next;
}
