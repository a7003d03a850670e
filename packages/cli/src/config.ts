import { dirname, resolve } from "node:path";
import { cosmiconfig } from "cosmiconfig";
import { ConfigError, parseBotConfig, type BotConfig, type BotConfigInput } from "@botrun/core";

export interface LoadedConfig {
  config: BotConfig;
  /** File the configuration came from. */
  filepath: string;
  /** Directory of that file; relative paths in it resolve from here. */
  baseDir: string;
}

export interface LoadConfigOptions {
  /** Explicit file; skips the search. */
  configPath?: string;
  searchFrom?: string;
}

export function defineConfig(config: BotConfigInput): BotConfigInput {
  return config;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const explorer = cosmiconfig("botrun", {
    searchPlaces: [
      "botrun.config.json",
      "botrun.config.yaml",
      "botrun.config.yml",
      "botrun.config.ts",
      ".botrunrc",
      ".botrunrc.json",
      ".botrunrc.yaml",
    ],
  });

  const result = options.configPath
    ? await explorer.load(resolve(options.configPath))
    : await explorer.search(options.searchFrom);

  if (!result || result.isEmpty) {
    throw new ConfigError(
      options.configPath
        ? `Configuration file ${options.configPath} is empty.`
        : "No botrun.config.json found. Run `botrun init` to create one."
    );
  }

  const raw: unknown = result.config;
  return {
    config: parseBotConfig(interpolateEnvVars(raw), result.filepath),
    filepath: result.filepath,
    baseDir: dirname(result.filepath),
  };
}

/** Replaces `${env.NAME}` in every string value; unset variables become "". */
export function interpolateEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => env[key] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnvVars(item, env));
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = interpolateEnvVars(item, env);
    }
    return result;
  }
  return value;
}

/** `--var key=value`; a bare key binds "true". */
export function parseVarOverrides(pairs: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    const key = (eq === -1 ? pair : pair.slice(0, eq)).trim();
    if (!key) throw new ConfigError(`Invalid --var "${pair}": missing name`);
    out[key] = eq === -1 ? "true" : pair.slice(eq + 1).trim();
  }
  return out;
}
