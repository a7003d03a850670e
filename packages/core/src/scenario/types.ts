import type { z } from "zod";
import type { ActionSchema, JsonValue, MatchTypeSchema } from "./schema.js";

export type { JsonValue } from "./schema.js";

export type ScenarioAction = z.infer<typeof ActionSchema>;
export type ActionType = ScenarioAction["type"];
export type ActionOf<T extends ActionType> = Extract<ScenarioAction, { type: T }>;
export type MatchType = z.infer<typeof MatchTypeSchema>;

/** A step as written in config: a bare server command or `{ type, ...fields }`. */
export type RawStep = string | { [key: string]: JsonValue };

export interface MacroParam {
  name: string;
  default?: JsonValue;
}

export interface MacroDefinition {
  name: string;
  params: MacroParam[];
  body: RawStep[];
}

export type MacroTable = Record<string, MacroDefinition>;
export type Bindings = Record<string, JsonValue>;

export interface ScenarioDefinition {
  name: string;
  description: string;
  steps: RawStep[];
  macros: MacroTable;
  variables: Bindings;
  tags: string[];
  filePath?: string;
}

export interface ExpandedScenario {
  name: string;
  description: string;
  tags: string[];
  actions: ScenarioAction[];
  variables: Record<string, string>;
}
