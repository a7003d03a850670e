import { resolve } from "node:path";
import chalk from "chalk";
import {
  buildRunPlan,
  encodeInstruction,
  loadScenarioFiles,
  registerScript,
  ActionTranslator,
  type ExpandedScenario,
  type ScenarioDefinition,
} from "@botrun/core";
import { loadConfig, parseVarOverrides } from "../config.js";

export interface ExpandOptions {
  config?: string;
  scenarios?: string;
  vars: string[];
  /** Writes each scenario as JSON here instead of printing it. */
  output?: string;
  json?: boolean;
}

export async function runExpand(options: ExpandOptions): Promise<ExpandedScenario[]> {
  const loaded = await loadConfig({ configPath: options.config });
  const extraScenarios: ScenarioDefinition[] = [];
  const scenariosDir = options.scenarios ?? loaded.config.botrun.scenariosDir;
  if (scenariosDir) {
    const { scenarios, warnings } = await loadScenarioFiles(resolve(loaded.baseDir, scenariosDir));
    for (const warning of warnings) console.error(chalk.yellow(`  Warning: ${warning}`));
    extraScenarios.push(...scenarios);
  }

  const plan = buildRunPlan(loaded.config, {
    overrides: parseVarOverrides(options.vars),
    extraScenarios,
    baseDir: loaded.baseDir,
  });
  const scenarios = plan.runs.length > 0 ? plan.runs.map((r) => r.scenario) : plan.scenarios;

  if (options.json) {
    console.log(JSON.stringify(scenarios, null, 2));
    return scenarios;
  }

  console.log();
  console.log(chalk.bold("  Botrun — Expanded scenarios"));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();

  if (options.output) {
    const dir = resolve(options.output);
    const used = new Set<string>();
    for (const scenario of scenarios) {
      const path = await registerScript(dir, scenario, used);
      console.log(chalk.green(`  Wrote ${path}`));
    }
    console.log();
    return scenarios;
  }

  const translator = new ActionTranslator();
  for (const scenario of scenarios) {
    console.log(chalk.bold(`  ${scenario.description || scenario.name}`) + chalk.dim(` (${scenario.actions.length} actions)`));
    for (const action of scenario.actions) {
      for (const instruction of translator.translate(action)) {
        console.log("    " + encodeInstruction(instruction));
      }
    }
    console.log();
  }
  return scenarios;
}
