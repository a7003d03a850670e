import type { RunContext } from "../orchestrator/types.js";
import { slugify } from "../util/slug.js";

export interface RunFilter {
  only?: string[];
  skip?: string[];
}

/** Lower-cased tokens a run can be selected by: id, description, its slug and tags. */
export function runTokens(run: RunContext): Set<string> {
  const tokens = new Set<string>();
  const add = (value: string | undefined): void => {
    const token = value?.trim().toLowerCase();
    if (token) tokens.add(token);
  };
  add(run.id);
  add(run.description);
  add(run.description ? slugify(run.description, "") : undefined);
  add(run.slug);
  add(run.scenario.name);
  for (const tag of run.tags) add(tag);
  return tokens;
}

/**
 * Applies `only` / `skip` before scheduling. Disabled runs are dropped too;
 * none of the removed runs count as failures.
 */
export function selectRuns(runs: readonly RunContext[], filter: RunFilter = {}): RunContext[] {
  const only = normalise(filter.only);
  const skip = normalise(filter.skip);

  return runs.filter((run) => {
    if (!run.enabled) return false;
    const tokens = runTokens(run);
    if (only.size > 0 && ![...only].some((t) => tokens.has(t))) return false;
    if (skip.size > 0 && [...skip].some((t) => tokens.has(t))) return false;
    return true;
  });
}

function normalise(values: string[] | undefined): Set<string> {
  return new Set((values ?? []).map((v) => v.trim().toLowerCase()).filter(Boolean));
}
