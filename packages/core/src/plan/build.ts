import { isAbsolute, join } from "node:path";
import { ConfigError, UnknownReferenceError } from "../errors.js";
import { compilePattern, type LogExpectation } from "../monitor/matcher.js";
import type { ClientExpectation, ClientLogExportSpec, RunContext } from "../orchestrator/types.js";
import { expandScenario } from "../scenario/expander.js";
import { ACTION_TYPES } from "../scenario/schema.js";
import type { Bindings, ExpandedScenario, MacroTable, RawStep, ScenarioAction, ScenarioDefinition } from "../scenario/types.js";
import { toMacroTable } from "../scenario/validator.js";
import { secondsToMs } from "../util/async.js";
import { slugify } from "../util/slug.js";
import {
  BotConfigSchema,
  ClientDefinitionSchema,
  RunDefinitionSchema,
  ServerDefinitionSchema,
  type AssertionConfig,
  type BotConfig,
  type ClientDefinition,
  type LogExpectationConfig,
  type RunDefinition,
  type ScenarioEntry,
  type ServerDefinition,
} from "./schema.js";

export interface PlannedClient {
  definition: ClientDefinition;
  /** Log names expectations and exports may refer to. */
  logNames: string[];
  setup: ScenarioAction[];
  teardown: ScenarioAction[];
}

export interface RunPlan {
  clients: PlannedClient[];
  runs: RunContext[];
  scenarios: ExpandedScenario[];
  server: ServerDefinition;
  failFast: boolean;
}

export interface BuildPlanOptions {
  /** CLI `--var` bindings; win over everything else. */
  overrides?: Bindings;
  /** Scenarios loaded from files, in addition to `bot_scenarios`. */
  extraScenarios?: ScenarioDefinition[];
  /** Relative artifact paths in the config resolve against this directory. */
  baseDir?: string;
}

export const DEFAULT_CLIENT_NAME = "bot-1";

/** Validates a raw document into a {@link BotConfig}; every schema issue is listed. */
export function parseBotConfig(raw: unknown, source = "configuration"): BotConfig {
  const parsed = BotConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid ${source}`,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  return parsed.data;
}

export function scenarioFromEntry(entry: ScenarioEntry, index: number): ScenarioDefinition {
  const name = entry.name ?? (entry.description ? slugify(entry.description) : `scenario_${index + 1}`);
  const steps: RawStep[] = entry.steps ?? entry.actions ?? entry.commands ?? [];
  return {
    name,
    description: entry.description || name,
    steps,
    macros: toMacroTable(entry.macros),
    variables: entry.variables,
    tags: entry.tags,
  };
}

/**
 * Resolves every reference in the configuration, compiles every pattern and
 * expands every scenario. Anything wrong surfaces here as a ConfigError,
 * before a single process is started.
 */
export function buildRunPlan(config: BotConfig, options: BuildPlanOptions = {}): RunPlan {
  const automation = config.bot_automation;
  const macros = toMacroTable(config.bot_macros);
  const globals: Bindings = { ...config.bot_variables, ...(automation?.variables ?? {}) };
  const overrides = options.overrides ?? {};
  const resolvePath = (path: string | undefined): string | undefined =>
    path === undefined || isAbsolute(path) || !options.baseDir ? path : join(options.baseDir, path);

  const definitions = collectScenarios(config, options.extraScenarios ?? []);

  const clientDefs: ClientDefinition[] =
    automation && automation.clients.length > 0 ? automation.clients : [defaultClient()];
  const clients = planClients(clientDefs, macros, globals, overrides);
  const clientIndex = new Map(clients.map((c) => [c.definition.name, c]));

  const runDefs: RunDefinition[] =
    automation && automation.runs.length > 0
      ? automation.runs
      : [...definitions.values()].map((s) => defaultRun(s.name));

  const expanded = new Map<string, ExpandedScenario>();
  const usedIds = new Set<string>();
  const runs: RunContext[] = runDefs.map((def, i) => {
    const where = `bot_automation.runs[${i}]`;
    const definition = lookupScenario(definitions, def.scenario);
    if (!definition) throw new UnknownReferenceError("scenario", def.scenario, where);

    const runOverrides = { ...def.variables, ...overrides };
    const scenario = expandScenario(definition, { macros, variables: globals, overrides: runOverrides });
    checkActionPatterns(scenario);
    if (Object.keys(def.variables).length === 0) expanded.set(scenario.name, scenario);

    const runClients = def.clients.length > 0 ? def.clients : clients.map((c) => c.definition.name);
    for (const name of runClients) {
      if (!clientIndex.has(name)) throw new UnknownReferenceError("client", name, where);
    }
    if (new Set(runClients).size !== runClients.length) {
      throw new ConfigError(`Duplicate client in ${where}: ${runClients.join(", ")}`);
    }

    for (const name of runClients) {
      const client = clientIndex.get(name);
      if (!client) continue;
      checkWaitSources(scenario.actions, client, clientIndex, runClients, `scenario "${scenario.name}" in ${where}`);
      checkWaitSources(client.setup, client, clientIndex, runClients, `setup of client "${name}" in ${where}`);
      checkWaitSources(client.teardown, client, clientIndex, runClients, `teardown of client "${name}" in ${where}`);
    }

    const description = def.description ?? scenario.description;
    const id = uniqueId(def.id ?? slugify(description), usedIds);

    const clientExpectations = def.expect_client_logs.map((e, j): ClientExpectation => {
      const at = `${where}.expect_client_logs[${j}]`;
      checkClientLog(clientIndex, runClients, e.client, e.log, at);
      return { ...toExpectation(e, at), client: e.client, log: e.log };
    });
    const exports = def.export_client_logs.map((e, j): ClientLogExportSpec => {
      checkClientLog(clientIndex, runClients, e.client, e.log, `${where}.export_client_logs[${j}]`);
      const path = resolvePath(e.path);
      return path ? { client: e.client, log: e.log, path } : { client: e.client, log: e.log };
    });

    const run: RunContext = {
      id,
      description,
      slug: slugify(description),
      scenario,
      clients: runClients,
      serverExpectations: def.expect_server_logs.map((e, j) => toExpectation(e, `${where}.expect_server_logs[${j}]`)),
      clientExpectations,
      assertions: def.assertions.map((a, j) => checkAssertion(a, runClients, `${where}.assertions[${j}]`)),
      tags: [...new Set([...scenario.tags, ...def.tags])],
      iterations: def.iterations,
      intervalMs: secondsToMs(def.interval),
      retries: def.retries,
      gracePeriodMs: secondsToMs(def.grace_period),
      failFast: def.fail_fast,
      enabled: def.enabled,
      waitBeforeMs: secondsToMs(def.wait_before),
      collectServerLog: def.collect_server_log || def.server_log_export !== undefined,
      clientLogExports: exports,
    };
    if (def.timeout !== undefined) run.timeoutMs = secondsToMs(def.timeout);
    const serverLogExport = resolvePath(def.server_log_export);
    if (serverLogExport) run.serverLogExport = serverLogExport;
    const recordDir = resolvePath(def.record_playback_dir);
    if (recordDir) run.recordPlaybackDir = recordDir;
    return run;
  });

  for (const definition of definitions.values()) {
    if (!expanded.has(definition.name)) {
      expanded.set(definition.name, expandScenario(definition, { macros, variables: globals, overrides }));
    }
  }

  return {
    clients,
    runs,
    scenarios: [...expanded.values()],
    server: automation?.server ?? defaultServer(),
    failFast: automation?.fail_fast ?? false,
  };
}

function collectScenarios(config: BotConfig, extra: ScenarioDefinition[]): Map<string, ScenarioDefinition> {
  const out = new Map<string, ScenarioDefinition>();
  const all = [...config.bot_scenarios.map(scenarioFromEntry), ...extra];
  for (const scenario of all) {
    if (out.has(scenario.name)) {
      throw new ConfigError(`Duplicate scenario name "${scenario.name}"`);
    }
    out.set(scenario.name, scenario);
  }
  return out;
}

/** By name, then by description or its slug. */
function lookupScenario(scenarios: Map<string, ScenarioDefinition>, ref: string): ScenarioDefinition | undefined {
  const direct = scenarios.get(ref);
  if (direct) return direct;
  const wanted = ref.trim().toLowerCase();
  for (const scenario of scenarios.values()) {
    if (scenario.description.toLowerCase() === wanted || slugify(scenario.description) === slugify(ref)) {
      return scenario;
    }
  }
  return undefined;
}

function planClients(
  definitions: ClientDefinition[],
  macros: MacroTable,
  variables: Bindings,
  overrides: Bindings
): PlannedClient[] {
  const seen = new Set<string>();
  return definitions.map((definition) => {
    if (seen.has(definition.name)) {
      throw new ConfigError(`Duplicate client name "${definition.name}" in bot_automation.clients`);
    }
    seen.add(definition.name);

    const phase = (label: string, steps: RawStep[]): ScenarioAction[] => {
      if (steps.length === 0) return [];
      const expanded = expandScenario(
        { name: `${label}:${definition.name}`, description: "", steps, macros: {}, variables: {}, tags: [] },
        { macros, variables, overrides }
      );
      checkActionPatterns(expanded);
      return expanded.actions;
    };

    const logNames =
      definition.type === "wine"
        ? [...new Set([...definition.logs.map((l) => l.name), "chatlog"])]
        : definition.logs.map((l) => l.name);

    return {
      definition,
      logNames,
      setup: phase("setup", definition.setup),
      teardown: phase("teardown", definition.teardown),
    };
  });
}

function checkClientLog(
  clients: Map<string, PlannedClient>,
  runClients: string[],
  client: string,
  log: string,
  where: string
): void {
  const planned = clients.get(client);
  if (!planned || !runClients.includes(client)) throw new UnknownReferenceError("client", client, where);
  if (!planned.logNames.includes(log)) throw new UnknownReferenceError("log", `${client}:${log}`, where);
}

function toExpectation(config: LogExpectationConfig, where: string): LogExpectation {
  try {
    compilePattern(config.pattern, config.match_type, config.case_sensitive);
  } catch (e) {
    if (e instanceof ConfigError) throw new ConfigError(`${e.message} (in ${where})`, [], e.code);
    throw e;
  }
  const expectation: LogExpectation = {
    pattern: config.pattern,
    matchType: config.match_type,
    caseSensitive: config.case_sensitive,
    occurrences: config.occurrences,
    timeoutMs: secondsToMs(config.timeout),
  };
  if (config.description) expectation.name = config.description;
  return expectation;
}

const UNBOUNDED_OK = new Set<string>(["require_log"]);

function checkAssertion(assertion: AssertionConfig, runClients: string[], where: string): AssertionConfig {
  if (assertion.min === undefined && assertion.max === undefined && !UNBOUNDED_OK.has(assertion.type)) {
    throw new ConfigError(`Assertion ${assertion.type} in ${where} needs "min" or "max"`);
  }
  if (assertion.client !== undefined && !runClients.includes(assertion.client)) {
    throw new UnknownReferenceError("client", assertion.client, where);
  }
  if (assertion.type === "action_count") {
    if (!assertion.action) throw new ConfigError(`Assertion action_count in ${where} needs "action"`);
    const action = assertion.action;
    if (!ACTION_TYPES.some((t) => t === action)) {
      throw new ConfigError(`Assertion action_count in ${where} names unknown action "${assertion.action}"`);
    }
  }
  if (assertion.type === "require_log" || assertion.type === "log_occurrences") {
    if (!assertion.pattern) throw new ConfigError(`Assertion ${assertion.type} in ${where} needs "pattern"`);
    compilePattern(assertion.pattern, assertion.match_type, assertion.case_sensitive);
  }
  return assertion;
}

function checkActionPatterns(scenario: ExpandedScenario): void {
  for (const action of scenario.actions) {
    if (action.type === "wait_for") compilePattern(action.pattern, action.match_type, action.case_sensitive);
  }
}

/** `wait_for` sources resolve the same way the orchestrator routes them. */
function checkWaitSources(
  actions: readonly ScenarioAction[],
  executor: PlannedClient,
  clients: Map<string, PlannedClient>,
  runClients: string[],
  where: string
): void {
  const self = executor.definition.name;
  for (const action of actions) {
    if (action.type !== "wait_for" || action.source === "server") continue;
    const { source } = action;
    if (source === "client") {
      if (executor.logNames.length === 0) throw new UnknownReferenceError("log", `${self}:chatlog`, where);
    } else if (source.startsWith("client:")) {
      checkClientLog(clients, runClients, self, source.slice("client:".length), where);
    } else {
      const split = source.indexOf(":");
      if (split <= 0) throw new UnknownReferenceError("log", source, where);
      checkClientLog(clients, runClients, source.slice(0, split), source.slice(split + 1), where);
    }
  }
}

function uniqueId(base: string, used: Set<string>): string {
  let id = base;
  for (let n = 2; used.has(id); n++) id = `${base}-${n}`;
  used.add(id);
  return id;
}

function defaultClient(): ClientDefinition {
  return ClientDefinitionSchema.parse({ name: DEFAULT_CLIENT_NAME });
}

function defaultRun(scenario: string): RunDefinition {
  return RunDefinitionSchema.parse({ scenario });
}

function defaultServer(): ServerDefinition {
  return ServerDefinitionSchema.parse({});
}
