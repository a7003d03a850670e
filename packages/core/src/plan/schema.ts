import { z } from "zod";
import { MacrosSchema, MatchTypeSchema, RawStepSchema, VariablesSchema } from "../scenario/schema.js";

const seconds = (fallback: number) => z.coerce.number().finite().min(0).default(fallback);

export const EncodingSchema = z.enum(["utf-8", "utf8", "latin1", "binary", "ascii", "utf16le", "ucs2"]);

const ExpectationFieldsSchema = z.object({
  pattern: z.string().min(1).optional(),
  phrase: z.string().min(1).optional(),
  occurrences: z.coerce.number().int().min(1, "occurrences must be at least 1").default(1),
  timeout: z.coerce.number().positive("timeout must be greater than 0").default(10),
  match_type: MatchTypeSchema.default("substring"),
  case_sensitive: z.boolean().default(false),
  description: z.string().optional(),
});

const hasPattern = (e: { pattern?: string; phrase?: string }): boolean =>
  e.pattern !== undefined || e.phrase !== undefined;

/** `phrase` is the older spelling of `pattern`. */
function withPattern<T extends { pattern?: string; phrase?: string }>({ pattern, phrase, ...rest }: T) {
  return { ...rest, pattern: pattern ?? phrase ?? "" };
}

export const LogExpectationSchema = z.preprocess(
  (raw) => (typeof raw === "string" ? { pattern: raw } : raw),
  ExpectationFieldsSchema.refine(hasPattern, { message: "pattern is required" }).transform(withPattern)
);

export const ClientLogExpectationSchema = ExpectationFieldsSchema.extend({
  client: z.string().min(1, "client log expectation requires a client"),
  log: z.string().min(1).default("chatlog"),
})
  .refine(hasPattern, { message: "pattern is required" })
  .transform(withPattern);

export const AssertionTypeSchema = z.enum([
  "total_duration",
  "client_duration",
  "command_count",
  "action_count",
  "require_log",
  "screenshot_count",
  "log_occurrences",
  "wait_time",
]);

export const AssertionSchema = z.object({
  type: AssertionTypeSchema,
  name: z.string().optional(),
  min: z.coerce.number().finite().optional(),
  max: z.coerce.number().finite().optional(),
  client: z.string().optional(),
  /** action_count */
  action: z.string().optional(),
  /** require_log / log_occurrences */
  pattern: z.string().optional(),
  match_type: MatchTypeSchema.default("substring"),
  case_sensitive: z.boolean().default(false),
  /** `server` or `<client>:<log>` */
  source: z.string().default("server"),
  message: z.string().optional(),
});

/**
 * Accepts `[{ type, ... }]` or the keyed form `{ total_duration: { max: 30 },
 * require_log: ["pattern", ...] }`.
 */
export const AssertionsSchema = z.preprocess((raw) => {
  if (raw === undefined || raw === null) return [];
  if (Array.isArray(raw)) return raw;
  if (typeof raw !== "object") return raw;
  const out: unknown[] = [];
  for (const [type, spec] of Object.entries(raw)) {
    const items: unknown[] = Array.isArray(spec) ? spec : [spec];
    for (const item of items) {
      if (typeof item === "string") out.push({ type, pattern: item });
      else if (typeof item === "number") out.push({ type, max: item });
      else if (typeof item === "object" && item !== null) out.push({ type, ...item });
      else out.push({ type });
    }
  }
  return out;
}, z.array(AssertionSchema));

export const ClientLogExportSchema = z.object({
  client: z.string().min(1),
  log: z.string().min(1).default("chatlog"),
  path: z.string().optional(),
});

export const ClientLogDefinitionSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  encoding: EncodingSchema.default("utf-8"),
});

export const ClientDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["file", "buffer", "dummy", "wine"]).default("file"),
  command_file: z.string().optional(),
  command_separator: z.string().optional(),
  gta_dir: z.string().optional(),
  launcher: z.string().optional(),
  wine_binary: z.string().optional(),
  focus_window: z.boolean().default(false),
  window_title: z.string().optional(),
  xdotool_binary: z.string().optional(),
  dry_run: z.boolean().default(false),
  environment: z.record(z.string()).default({}),
  connect_delay: seconds(0),
  startup_timeout: seconds(30),
  reset_commands_on_connect: z.boolean().default(true),
  logs: z.array(ClientLogDefinitionSchema).default([]),
  chatlog: z.string().optional(),
  chatlog_encoding: EncodingSchema.optional(),
  setup: z.array(RawStepSchema).default([]),
  teardown: z.array(RawStepSchema).default([]),
});

export const RunDefinitionSchema = z
  .object({
    id: z.string().min(1).optional(),
    scenario: z.string().min(1, "run requires a scenario"),
    description: z.string().optional(),
    clients: z.array(z.string()).default([]),
    expect_server_logs: z.array(LogExpectationSchema).default([]),
    expect_client_logs: z.array(ClientLogExpectationSchema).default([]),
    iterations: z.coerce.number().int().min(1).default(1),
    interval: seconds(0),
    assertions: AssertionsSchema,
    tags: z.array(z.string()).default([]),
    retries: z.coerce.number().int().min(0).optional(),
    max_retries: z.coerce.number().int().min(0).optional(),
    grace_period: seconds(0),
    fail_fast: z.boolean().default(false),
    enabled: z.boolean().default(true),
    collect_server_log: z.boolean().default(false),
    server_log_export: z.string().optional(),
    export_client_logs: z.array(ClientLogExportSchema).default([]),
    record_playback_dir: z.string().optional(),
    variables: VariablesSchema,
    timeout: z.coerce.number().positive().optional(),
    wait_before: seconds(0),
  })
  .transform(({ retries, max_retries, ...rest }) => ({ ...rest, retries: retries ?? max_retries ?? 0 }));

export const ServerDefinitionSchema = z.object({
  executable: z.string().optional(),
  args: z.array(z.string()).default([]),
  startup_phrase: z.string().default("Started server on"),
  log_file: z.string().default("server_log.txt"),
  config_file: z.string().default("server.cfg"),
  startup_timeout: seconds(30),
  host: z.string().default("127.0.0.1"),
  environment: z.record(z.string()).default({}),
});

export const BotAutomationSchema = z.object({
  clients: z.array(ClientDefinitionSchema).default([]),
  runs: z.array(RunDefinitionSchema).default([]),
  variables: VariablesSchema,
  fail_fast: z.boolean().default(false),
  server: ServerDefinitionSchema.default({}),
});

export const ScenarioEntrySchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().default(""),
  steps: z.array(RawStepSchema).optional(),
  actions: z.array(RawStepSchema).optional(),
  commands: z.array(z.string()).optional(),
  macros: MacrosSchema,
  variables: VariablesSchema,
  tags: z.array(z.string()).default([]),
});

export const ToolSettingsSchema = z.object({
  packageDir: z.string().optional(),
  scenariosDir: z.string().optional(),
  reportDir: z.string().default(".botrun/reports"),
  store: z.object({ path: z.string().default(".botrun/history.db") }).default({}),
  diff: z.object({ durationThreshold: z.number().min(0).default(0.2) }).default({}),
});

/** The parts of the world document the test engine reads; everything else passes. */
export const BotConfigSchema = z
  .object({
    bot_scenarios: z.array(ScenarioEntrySchema).default([]),
    bot_macros: MacrosSchema,
    bot_variables: VariablesSchema,
    bot_automation: BotAutomationSchema.optional(),
    botrun: ToolSettingsSchema.default({}),
  })
  .passthrough();

export type LogExpectationConfig = z.output<typeof LogExpectationSchema>;
export type ClientLogExpectationConfig = z.output<typeof ClientLogExpectationSchema>;
export type AssertionConfig = z.output<typeof AssertionSchema>;
export type AssertionType = z.output<typeof AssertionTypeSchema>;
export type ClientDefinition = z.output<typeof ClientDefinitionSchema>;
export type RunDefinition = z.output<typeof RunDefinitionSchema>;
export type ServerDefinition = z.output<typeof ServerDefinitionSchema>;
export type BotAutomation = z.output<typeof BotAutomationSchema>;
export type ScenarioEntry = z.output<typeof ScenarioEntrySchema>;
export type ToolSettings = z.output<typeof ToolSettingsSchema>;
export type BotConfig = z.output<typeof BotConfigSchema>;
export type BotConfigInput = z.input<typeof BotConfigSchema>;
