import type { z } from "zod";
import { ScenarioSchema, type MacrosSchema } from "./schema.js";
import type { MacroParam, MacroTable, ScenarioDefinition } from "./types.js";
import { slugify } from "../util/slug.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  scenario?: ScenarioDefinition;
}

/**
 * Checks a parsed scenario document. `fallbackName` is used when the document
 * carries neither `name` nor `description` (usually the file name).
 */
export function validateScenario(obj: unknown, fallbackName = "scenario"): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!obj || typeof obj !== "object" || Array.isArray(obj)) {
    return { valid: false, errors: ["Scenario must be an object"], warnings };
  }

  const parsed = ScenarioSchema.safeParse(obj);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push(`${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
    return { valid: false, errors, warnings };
  }

  const data = parsed.data;
  if (data.steps.length === 0) {
    warnings.push("Scenario has no steps; only client setup and teardown will run");
  }

  const macros = toMacroTable(data.macros);
  for (const macro of Object.values(macros)) {
    if (macro.body.length === 0) warnings.push(`Macro "${macro.name}" has an empty body`);
  }

  const name = data.name ?? (data.description ? slugify(data.description) : fallbackName);
  return {
    valid: true,
    errors,
    warnings,
    scenario: {
      name,
      description: data.description ?? name,
      steps: data.steps,
      macros,
      variables: data.variables,
      tags: data.tags,
    },
  };
}

/** Parsed `macros` (either accepted form) to the expander's table. */
export function toMacroTable(macros: z.output<typeof MacrosSchema>): MacroTable {
  const table: MacroTable = {};
  for (const [name, macro] of Object.entries(macros)) {
    const params: MacroParam[] = macro.params.map((p) => (typeof p === "string" ? { name: p } : p));
    table[name] = { name, params, body: macro.body };
  }
  return table;
}
