import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "@botrun/core";
import { interpolateEnvVars, loadConfig, parseVarOverrides } from "./config.js";

describe("interpolateEnvVars", () => {
  it("replaces env references in nested strings", () => {
    const env = { GTA_DIR: "/games/gta", PASS: "test-secret" };

    expect(
      interpolateEnvVars({ dir: "${env.GTA_DIR}/SAMP", list: ["pw=${env.PASS}", 3], unset: "${env.MISSING}x" }, env)
    ).toEqual({ dir: "/games/gta/SAMP", list: ["pw=test-secret", 3], unset: "x" });
  });
});

describe("parseVarOverrides", () => {
  it("splits on the first equals sign", () => {
    expect(parseVarOverrides(["car=infernus", " speed = 2 ", "url=a=b", "debug"])).toEqual({
      car: "infernus",
      speed: "2",
      url: "a=b",
      debug: "true",
    });
  });

  it("rejects a missing name", () => {
    expect(() => parseVarOverrides(["=1"])).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "botrun-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("parses the file and resolves its directory", async () => {
    const path = join(dir, "botrun.config.json");
    await writeFile(
      path,
      JSON.stringify({ bot_variables: { password: "${env.BOTRUN_TEST_PASSWORD}" }, bot_scenarios: [{ name: "s", steps: ["/x"] }] })
    );
    process.env.BOTRUN_TEST_PASSWORD = "test-secret";

    try {
      const loaded = await loadConfig({ configPath: path });

      expect(loaded.filepath).toBe(path);
      expect(loaded.baseDir).toBe(dir);
      expect(loaded.config.bot_variables).toEqual({ password: "test-secret" });
    } finally {
      delete process.env.BOTRUN_TEST_PASSWORD;
    }
  });

  it("reports schema problems as a ConfigError", async () => {
    const path = join(dir, "botrun.config.json");
    await writeFile(path, JSON.stringify({ bot_automation: { runs: [{}] } }));

    await expect(loadConfig({ configPath: path })).rejects.toBeInstanceOf(ConfigError);
  });
});
