import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ExpandedScenario } from "../scenario/types.js";
import { slugify } from "../util/slug.js";

/**
 * Writes an expanded scenario as `<slug>.json` under `dir`, replacing an
 * older file of the same name. Names already in `used` get a `_2`, `_3`, ...
 * suffix, so two scenarios of one invocation never overwrite each other.
 */
export async function registerScript(
  dir: string,
  scenario: ExpandedScenario,
  used: Set<string> = new Set()
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const base = slugify(scenario.description || scenario.name);

  let name = base;
  for (let n = 2; used.has(name); n++) name = `${base}_${n}`;
  used.add(name);

  const path = join(dir, `${name}.json`);
  const body = {
    name: scenario.name,
    description: scenario.description,
    tags: scenario.tags,
    variables: scenario.variables,
    actions: scenario.actions,
  };
  await writeFile(path, JSON.stringify(body, null, 2) + "\n", "utf-8");
  return path;
}
