import { AssertionCollector } from "../assert/collector.js";
import type { AssertionBounds, AssertionResult } from "../assert/types.js";
import { compilePattern } from "../monitor/matcher.js";
import type { AssertionConfig } from "../plan/schema.js";
import type { PlaybackEvent, PlaybackLog } from "../runner/types.js";
import type { ClientRunResult } from "./types.js";

export interface AssertionInput {
  durationMs: number;
  clients: readonly ClientRunResult[];
  serverLines: readonly string[];
  /** Lines of a client log this attempt, keyed `<client>:<log>`. */
  clientLines: ReadonlyMap<string, readonly string[]>;
}

/** Every assertion is evaluated; one failing never hides the others. */
export function evaluateAssertions(configs: readonly AssertionConfig[], input: AssertionInput): AssertionResult[] {
  const collector = new AssertionCollector();
  for (const config of configs) evaluate(config, input, collector);
  return collector.getResults();
}

function evaluate(config: AssertionConfig, input: AssertionInput, collector: AssertionCollector): void {
  const bounds: AssertionBounds = { min: config.min, max: config.max };
  const base = { type: config.type, expected: bounds, message: config.message };
  const clients = config.client ? input.clients.filter((c) => c.client === config.client) : input.clients;
  const label = (suffix?: string): string => config.name ?? (suffix ? `${config.type}:${suffix}` : config.type);

  switch (config.type) {
    case "total_duration":
      collector.check({ ...base, name: label(), actual: input.durationMs / 1000 });
      return;

    case "client_duration":
      // One result per client, so a slow client is named in the report.
      for (const client of clients) {
        const ms = playbacks(client).reduce((sum, log) => sum + log.durationMs, 0);
        collector.check({ ...base, name: label(client.client), client: client.client, actual: ms / 1000 });
      }
      return;

    case "command_count":
      collector.check({
        ...base,
        name: label(config.client),
        client: config.client,
        actual: sumEvents(clients, (e) => e.instructions.length),
      });
      return;

    case "action_count":
      collector.check({
        ...base,
        name: label(config.action),
        client: config.client,
        actual: sumEvents(clients, (e) => (e.type === config.action && e.status !== "skipped" ? 1 : 0)),
      });
      return;

    case "wait_time":
      collector.check({
        ...base,
        name: label(config.client),
        client: config.client,
        actual: sumEvents(clients, (e) => e.waitedMs ?? 0) / 1000,
      });
      return;

    case "screenshot_count":
      collector.check({
        ...base,
        name: label(config.client),
        client: config.client,
        actual: clients.reduce((sum, c) => sum + c.screenshots.length, 0),
      });
      return;

    case "require_log":
    case "log_occurrences": {
      const pattern = config.pattern ?? "";
      const test = compilePattern(pattern, config.match_type, config.case_sensitive);
      const lines = sourceLines(config.source, input);
      const count = lines.filter((line) => test(line)).length;
      const expected = config.type === "require_log" ? { min: config.min ?? 1, max: config.max } : bounds;
      collector.check({ ...base, expected, name: label(pattern), actual: count });
      return;
    }
  }
}

function playbacks(client: ClientRunResult): PlaybackLog[] {
  return [client.setup, client.playback, client.teardown].flatMap((log) => (log ? [log] : []));
}

function sumEvents(clients: readonly ClientRunResult[], measure: (event: PlaybackEvent) => number): number {
  let total = 0;
  for (const client of clients) {
    for (const event of client.playback?.events ?? []) total += measure(event);
  }
  return total;
}

/** `server`, `<client>:<log>`, or a bare client name for its chatlog. */
function sourceLines(source: string, input: AssertionInput): readonly string[] {
  if (source === "server") return input.serverLines;
  const key = source.includes(":") ? source : `${source}:chatlog`;
  return input.clientLines.get(key) ?? [];
}
