import { z } from "zod";

const num = (fallback: number) => z.coerce.number().finite().default(fallback);
const requiredNum = z.coerce.number().finite();
const text = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

/** Accepts real booleans and the strings produced by variable substitution. */
const flag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.enum(["true", "false", "1", "0", "yes", "no"])])
    .transform((v) => v === true || v === "true" || v === "1" || v === "yes")
    .default(fallback);

const optionValue = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((v) => (v === null ? "" : String(v)));

const delay = { delay: num(0) };

export const MatchTypeSchema = z.enum(["substring", "regex"]);

export const CommandActionSchema = z.object({ type: z.literal("command"), command: z.string().min(1), ...delay });
export const ChatActionSchema = z.object({ type: z.literal("chat"), message: text, ...delay });
export const WaitActionSchema = z.object({ type: z.literal("wait"), seconds: num(1).pipe(z.number().min(0)), ...delay });
export const WaitForActionSchema = z.object({
  type: z.literal("wait_for"),
  pattern: z.string().min(1),
  timeout: num(10).pipe(z.number().positive()),
  match_type: MatchTypeSchema.default("substring"),
  case_sensitive: flag(false),
  occurrences: num(1).pipe(z.number().int().min(1)),
  source: z.string().default("server"),
  fatal: flag(false),
  ...delay,
});
export const TeleportActionSchema = z.object({
  type: z.literal("teleport"),
  x: num(0),
  y: num(0),
  z: num(0),
  interior: num(0).pipe(z.number().int()),
  world: num(0).pipe(z.number().int()),
  ...delay,
});
export const KeyStateSchema = z.enum(["press", "down", "hold", "up", "release"]);
export const KeypressActionSchema = z.object({
  type: z.literal("keypress"),
  key: z.string().trim().min(1, "keypress requires a key"),
  state: z.string().toLowerCase().pipe(KeyStateSchema).default("press"),
  ...delay,
});
export const KeySequenceActionSchema = z.object({
  type: z.literal("key_sequence"),
  keys: z.array(z.string().trim().min(1)).min(1),
  interval: num(0),
  ...delay,
});
export const KeyComboActionSchema = z.object({
  type: z.literal("key_combo"),
  keys: z.array(z.string().trim().min(1)).min(1),
  hold: num(0),
  ...delay,
});
export const OptionActionSchema = z.object({
  type: z.literal("option"),
  name: z.string().min(1, "option requires a name"),
  value: optionValue.default(""),
  ...delay,
});
export const SequenceActionSchema = z.object({
  type: z.literal("sequence"),
  commands: z.array(text).min(1),
  ...delay,
});
export const FocusWindowActionSchema = z.object({
  type: z.literal("focus_window"),
  title: z.string().optional(),
  ...delay,
});
export const TypeTextActionSchema = z.object({ type: z.literal("type_text"), text, ...delay });
export const MouseMoveActionSchema = z.object({
  type: z.literal("mouse_move"),
  x: requiredNum,
  y: requiredNum,
  mode: z.enum(["absolute", "relative"]).default("absolute"),
  duration: num(0),
  ...delay,
});
export const MouseButtonSchema = z.string().toLowerCase().default("left");
export const ClickStateSchema = z.enum(["click", "down", "hold", "up", "release", "double"]);
export const MouseClickActionSchema = z.object({
  type: z.literal("mouse_click"),
  button: MouseButtonSchema,
  state: z.string().toLowerCase().pipe(ClickStateSchema).default("click"),
  ...delay,
});
export const MouseScrollActionSchema = z.object({
  type: z.literal("mouse_scroll"),
  direction: z.enum(["up", "down"]).default("down"),
  steps: num(1).pipe(z.number().int().min(1)),
  interval: num(0),
  ...delay,
});
export const MouseDragActionSchema = z.object({
  type: z.literal("mouse_drag"),
  start_x: requiredNum,
  start_y: requiredNum,
  end_x: requiredNum,
  end_y: requiredNum,
  button: MouseButtonSchema,
  duration: num(0),
  hold: num(0),
  ...delay,
});
export const ScreenshotActionSchema = z.object({
  type: z.literal("screenshot"),
  name: z.string().min(1).default("capture"),
  path: z.string().optional(),
  ...delay,
});
export const ConfigActionSchema = z.object({
  type: z.literal("config"),
  name: z.string().min(1, "config requires a setting name"),
  value: optionValue.default(""),
  ...delay,
});

export const ActionSchema = z.discriminatedUnion("type", [
  CommandActionSchema,
  ChatActionSchema,
  WaitActionSchema,
  WaitForActionSchema,
  TeleportActionSchema,
  KeypressActionSchema,
  KeySequenceActionSchema,
  KeyComboActionSchema,
  OptionActionSchema,
  SequenceActionSchema,
  FocusWindowActionSchema,
  TypeTextActionSchema,
  MouseMoveActionSchema,
  MouseClickActionSchema,
  MouseScrollActionSchema,
  MouseDragActionSchema,
  ScreenshotActionSchema,
  ConfigActionSchema,
]);

export const ACTION_TYPES = ActionSchema.options.map((o) => o.shape.type.value);

/** `{{name}}` placeholders. */
export const VARIABLE_TOKEN = /\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}/g;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const RawStepSchema = z.union([z.string(), z.record(JsonValueSchema)]);

const MacroParamSchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1), default: JsonValueSchema.optional() }),
]);

const MacroBodySchema = z.object({
  params: z.array(MacroParamSchema).default([]),
  body: z.array(RawStepSchema),
});

const MacroListEntrySchema = z.object({
  name: z.string().min(1),
  parameters: z.array(MacroParamSchema).optional(),
  params: z.array(MacroParamSchema).optional(),
  steps: z.array(RawStepSchema).optional(),
  body: z.array(RawStepSchema).optional(),
});

/** Record form `{ name: { params, body } }` or list form `[{ name, parameters, steps }]`. */
export const MacrosSchema = z
  .union([z.record(MacroBodySchema), z.array(MacroListEntrySchema)])
  .default({})
  .transform((input) => {
    const out: Record<string, z.infer<typeof MacroBodySchema>> = {};
    if (Array.isArray(input)) {
      for (const entry of input) {
        out[entry.name] = {
          params: entry.parameters ?? entry.params ?? [],
          body: entry.steps ?? entry.body ?? [],
        };
      }
      return out;
    }
    return input;
  });

export const VariablesSchema = z.record(JsonValueSchema).default({});

export const ScenarioSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  steps: z.array(RawStepSchema),
  macros: MacrosSchema,
  variables: VariablesSchema,
  tags: z.array(z.string()).default([]),
});

export type ScenarioInput = z.input<typeof ScenarioSchema>;
