import { ConfigError, UnknownActionError } from "../errors.js";
import { ACTION_TYPES, ActionSchema, type JsonValue } from "./schema.js";
import type { RawStep, ScenarioAction } from "./types.js";

const ALIASES: Record<string, string> = {
  key: "keypress",
  mouse: "mouse_move",
  click: "mouse_click",
};

/** Alternate field names accepted for each action kind, mapped to the canonical one. */
const FIELD_ALIASES: Record<string, Record<string, string>> = {
  command: { value: "command" },
  chat: { value: "message", text: "message" },
  wait: { value: "seconds" },
  wait_for: { phrase: "pattern", value: "pattern", seconds: "timeout" },
  option: { key: "name" },
  config: { key: "name" },
  type_text: { value: "text" },
  mouse_click: { mode: "state" },
  screenshot: { directory: "path" },
  sequence: { steps: "commands" },
};

const KNOWN = new Set<string>(ACTION_TYPES);

export function ensureLeadingSlash(command: string): string {
  const trimmed = command.trim();
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/**
 * Turns an expanded raw step into a typed action. `where` names the step for
 * error messages (e.g. `scenario "heist" step 3`).
 */
export function normalizeStep(raw: RawStep, where: string): ScenarioAction {
  if (typeof raw === "string") {
    return { type: "command", command: ensureLeadingSlash(raw), delay: 0 };
  }

  const declared = raw.type ?? raw.action ?? "command";
  if (typeof declared !== "string") {
    throw new ConfigError(`Step type must be a string in ${where}`);
  }

  let type = ALIASES[declared] ?? declared;
  // `{ type: "macro", commands: [...] }` is an inline command list, not a macro call.
  if (type === "macro" && raw.name === undefined && (raw.commands !== undefined || raw.steps !== undefined)) {
    type = "sequence";
  }
  if (!KNOWN.has(type)) {
    throw new UnknownActionError(declared, where);
  }

  const fields: Record<string, JsonValue> = {};
  const aliases = FIELD_ALIASES[type] ?? {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === "type" || key === "action") continue;
    const canonical = aliases[key] ?? key;
    if (canonical in fields && canonical !== key) continue;
    fields[canonical] = value;
  }

  if (type === "command" && typeof fields.command === "string") {
    fields.command = ensureLeadingSlash(fields.command);
  }

  const parsed = ActionSchema.safeParse({ ...fields, type });
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid ${type} step in ${where}`,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(step)"}: ${i.message}`)
    );
  }
  return parsed.data;
}
