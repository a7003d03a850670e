import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { toErrorMessage } from "../errors.js";
import { isNotFound } from "../util/fs.js";
import type { ScenarioDefinition } from "./types.js";
import { validateScenario } from "./validator.js";

export interface LoadScenariosResult {
  scenarios: ScenarioDefinition[];
  warnings: string[];
}

/**
 * Loads every `*.json` scenario document under `dir` (recursively). Files that
 * fail to parse or validate are skipped and reported in `warnings`.
 */
export async function loadScenarioFiles(dir: string, filter?: string): Promise<LoadScenariosResult> {
  const absDir = resolve(dir);
  const scenarios: ScenarioDefinition[] = [];
  const warnings: string[] = [];

  const files = (await scanDir(absDir)).filter((f) => f.endsWith(".json")).sort();
  const filtered = filter
    ? files.filter((f) => f.replace(/\\/g, "/").toLowerCase().includes(filter.toLowerCase()))
    : files;

  for (const file of filtered) {
    let data: unknown;
    try {
      data = JSON.parse(await readFile(file, "utf-8"));
    } catch (e) {
      warnings.push(`Failed to read scenario file ${file}: ${toErrorMessage(e)}`);
      continue;
    }

    const result = validateScenario(data, basename(file, extname(file)));
    if (result.valid && result.scenario) {
      scenarios.push({ ...result.scenario, filePath: file });
    } else {
      warnings.push(`Skipping invalid scenario in ${file}: ${result.errors.join(", ")}`);
    }
    for (const w of result.warnings) {
      warnings.push(`${file}: ${w}`);
    }
  }

  return { scenarios, warnings };
}

async function scanDir(dir: string): Promise<string[]> {
  const files: string[] = [];
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isNotFound(e)) return files;
    throw e;
  }
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await scanDir(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}
