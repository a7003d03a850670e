import {
  ConfigError,
  MacroCycleError,
  UnknownMacroError,
  UnresolvedVariableError,
} from "../errors.js";
import { normalizeStep } from "./normalize.js";
import { VARIABLE_TOKEN, type JsonValue } from "./schema.js";
import type {
  Bindings,
  ExpandedScenario,
  MacroTable,
  RawStep,
  ScenarioAction,
  ScenarioDefinition,
} from "./types.js";

export interface ExpandOptions {
  /** Suite-wide macros; scenario-local macros shadow these. */
  macros?: MacroTable;
  /** Global defaults, lowest precedence. */
  variables?: Bindings;
  /** Caller overrides (CLI, run config), highest precedence. */
  overrides?: Bindings;
}

const WHOLE_TOKEN = /^\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}$/;

export function stringifyBinding(value: JsonValue): string {
  if (value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Replaces every `{{name}}` token in a string. A string consisting of exactly
 * one token keeps the bound value's JSON type, so `"{{count}}"` can feed a
 * numeric field.
 */
export function substituteString(input: string, bindings: Bindings, where: string): JsonValue {
  const whole = WHOLE_TOKEN.exec(input);
  if (whole) {
    const name = whole[1];
    if (!Object.hasOwn(bindings, name)) throw new UnresolvedVariableError(name, where);
    return bindings[name];
  }
  return input.replace(VARIABLE_TOKEN, (_, name: string) => {
    if (!Object.hasOwn(bindings, name)) throw new UnresolvedVariableError(name, where);
    return stringifyBinding(bindings[name]);
  });
}

export function substitute(value: JsonValue, bindings: Bindings, where: string): JsonValue {
  if (typeof value === "string") return substituteString(value, bindings, where);
  if (Array.isArray(value)) return value.map((v) => substitute(v, bindings, where));
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, v] of Object.entries(value)) out[key] = substitute(v, bindings, where);
    return out;
  }
  return value;
}

function isMacroCall(step: RawStep): step is { [key: string]: JsonValue } {
  return typeof step === "object" && step.type === "macro" && typeof step.name === "string";
}

function macroRefs(body: RawStep[]): string[] {
  const refs: string[] = [];
  for (const step of body) {
    if (isMacroCall(step) && typeof step.name === "string") refs.push(step.name);
  }
  return refs;
}

/**
 * Walks the static macro reference graph and returns the first cycle found,
 * e.g. `["a", "b", "a"]`, or null.
 */
export function findMacroCycle(macros: MacroTable): string[] | null {
  const done = new Set<string>();

  const visit = (name: string, path: string[]): string[] | null => {
    const at = path.indexOf(name);
    if (at !== -1) return [...path.slice(at), name];
    if (done.has(name)) return null;
    const macro = macros[name];
    if (!macro) return null;
    for (const ref of macroRefs(macro.body)) {
      const cycle = visit(ref, [...path, name]);
      if (cycle) return cycle;
    }
    done.add(name);
    return null;
  };

  for (const name of Object.keys(macros)) {
    const cycle = visit(name, []);
    if (cycle) return cycle;
  }
  return null;
}

export function toBindingStrings(bindings: Bindings): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(bindings)) out[key] = stringifyBinding(value);
  return out;
}

export class MacroExpander {
  private readonly macros: MacroTable;
  private readonly scenario: ScenarioDefinition;

  constructor(scenario: ScenarioDefinition, globalMacros: MacroTable = {}) {
    this.scenario = scenario;
    this.macros = { ...globalMacros, ...scenario.macros };

    const cycle = findMacroCycle(this.macros);
    if (cycle) throw new MacroCycleError(cycle);
  }

  expand(bindings: Bindings): ScenarioAction[] {
    const actions: ScenarioAction[] = [];
    this.scenario.steps.forEach((step, i) => {
      const where = `scenario "${this.scenario.name}" step ${i + 1}`;
      this.expandStep(step, bindings, where, [], actions);
    });
    return actions;
  }

  private expandStep(
    step: RawStep,
    bindings: Bindings,
    where: string,
    stack: string[],
    out: ScenarioAction[]
  ): void {
    if (!isMacroCall(step)) {
      const expanded = typeof step === "string" ? substituteString(step, bindings, where) : substitute(step, bindings, where);
      out.push(normalizeStep(toRawStep(expanded, where), where));
      return;
    }

    const name = String(substitute(step.name, bindings, where));
    const macro = this.macros[name];
    if (!macro) throw new UnknownMacroError(name, where);
    if (stack.includes(name)) throw new MacroCycleError([...stack, name]);

    const args: JsonValue = step.arguments ?? step.args ?? {};
    if (args === null || typeof args !== "object" || Array.isArray(args)) {
      throw new ConfigError(`Macro arguments must be an object in ${where}`);
    }
    const resolvedArgs: Bindings = {};
    for (const [key, value] of Object.entries(args)) resolvedArgs[key] = substitute(value, bindings, where);

    const scope: Bindings = { ...bindings };
    for (const param of macro.params) {
      if (Object.hasOwn(resolvedArgs, param.name)) continue;
      if (param.default !== undefined) {
        scope[param.name] = param.default;
      } else {
        throw new UnresolvedVariableError(param.name, `call to macro "${name}" in ${where}`);
      }
    }
    Object.assign(scope, resolvedArgs);

    macro.body.forEach((inner, i) => {
      this.expandStep(inner, scope, `macro "${name}" step ${i + 1} (from ${where})`, [...stack, name], out);
    });
  }
}

function toRawStep(value: JsonValue, where: string): RawStep {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object" && !Array.isArray(value)) return value;
  throw new ConfigError(`Step must be a string or an object in ${where}`);
}

/**
 * Flattens a scenario into actions. Bindings are layered as
 * global defaults < scenario variables < overrides.
 */
export function expandScenario(scenario: ScenarioDefinition, options: ExpandOptions = {}): ExpandedScenario {
  const bindings: Bindings = {
    ...(options.variables ?? {}),
    ...scenario.variables,
    ...(options.overrides ?? {}),
  };
  const expander = new MacroExpander(scenario, options.macros);
  return {
    name: scenario.name,
    description: scenario.description,
    tags: [...scenario.tags],
    actions: expander.expand(bindings),
    variables: toBindingStrings(bindings),
  };
}
