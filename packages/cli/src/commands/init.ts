import { mkdir, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";

const DEFAULT_CONFIG = {
  bot_variables: { player: "tester" },
  bot_macros: {
    login: {
      params: ["password"],
      body: ["/login {{password}}", { type: "wait_for", pattern: "Welcome back", timeout: 10 }],
    },
  },
  bot_scenarios: [
    {
      name: "smoke",
      description: "Smoke test",
      variables: { password: "test-secret" },
      steps: [{ type: "macro", name: "login", args: { password: "{{password}}" } }, "/stats", { type: "wait", seconds: 1 }],
    },
  ],
  bot_automation: {
    clients: [{ name: "bot-1", type: "file" }],
    runs: [
      {
        scenario: "smoke",
        expect_server_logs: [{ pattern: "Started server on", timeout: 30 }],
        assertions: { total_duration: { max: 60 } },
      },
    ],
    server: { executable: "samp03svr" },
  },
  botrun: {
    scenariosDir: "./scenarios",
    store: { path: ".botrun/history.db" },
  },
};

const EXAMPLE_SCENARIO = {
  name: "spawn-and-drive",
  description: "Spawn and drive",
  tags: ["vehicles"],
  steps: ["/v infernus", { type: "wait", seconds: 2 }, { type: "keypress", key: "W", state: "hold" }],
};

export async function runInit(cwd: string = process.cwd()): Promise<void> {
  console.log();
  console.log(chalk.bold("  Botrun — Initializing project"));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();

  const configPath = join(cwd, "botrun.config.json");
  if (existsSync(configPath)) {
    console.log(chalk.yellow("  botrun.config.json already exists, skipping"));
  } else {
    await writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");
    console.log(chalk.green("  Created botrun.config.json"));
  }

  const scenariosDir = join(cwd, "scenarios");
  if (existsSync(scenariosDir)) {
    console.log(chalk.yellow("  scenarios/ directory already exists, skipping"));
  } else {
    await mkdir(scenariosDir, { recursive: true });
    await writeFile(join(scenariosDir, "spawn-and-drive.json"), JSON.stringify(EXAMPLE_SCENARIO, null, 2) + "\n", "utf-8");
    console.log(chalk.green("  Created scenarios/ with an example"));
  }

  const stateDir = join(cwd, ".botrun");
  if (!existsSync(stateDir)) {
    await mkdir(stateDir, { recursive: true });
    console.log(chalk.green("  Created .botrun/ directory"));
  }

  console.log();
  console.log(chalk.bold("  Next steps:"));
  console.log(chalk.dim("  1. Point bot_automation.server.executable at your server binary"));
  console.log(chalk.dim("  2. Preview the scripts: botrun expand"));
  console.log(chalk.dim("  3. Try it without a game: botrun run --dry-run"));
  console.log();
}
