import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { buildRunPlan, parseBotConfig } from "./build.js";
import { applyRunDefaults } from "./defaults.js";
import { selectRuns } from "./filter.js";

const config = parseBotConfig({
  bot_scenarios: [
    { name: "drive", description: "Drive Test", steps: ["/v"], tags: ["vehicles"] },
    { name: "shop", description: "Buy Weapon", steps: ["/buy"], tags: ["economy"] },
  ],
  bot_automation: {
    clients: [{ name: "a", logs: [{ name: "debug", path: "debug.txt" }] }, { name: "b" }],
    runs: [
      { scenario: "drive", retries: 3, grace_period: 1, timeout: 20 },
      { scenario: "shop", enabled: true },
      { scenario: "shop", id: "shop-disabled", enabled: false },
    ],
  },
});
const plan = buildRunPlan(config);

describe("applyRunDefaults", () => {
  it("raises retries and fills grace period and timeout only where unset", () => {
    const [drive, shop] = applyRunDefaults(plan.runs, plan.clients, { retries: 1, gracePeriodMs: 500, timeoutMs: 9000 });

    expect([drive.retries, drive.gracePeriodMs, drive.timeoutMs]).toEqual([3, 1000, 20000]);
    expect([shop.retries, shop.gracePeriodMs, shop.timeoutMs]).toEqual([1, 500, 9000]);
  });

  it("exports server and client logs into the given directories", () => {
    const [drive] = applyRunDefaults(plan.runs, plan.clients, { serverLogDir: "/out/server", clientLogDir: "/out/clients" });

    expect(drive.collectServerLog).toBe(true);
    expect(drive.serverLogExport).toBe(join("/out/server", "drive_test_server.log"));
    expect(drive.clientLogExports).toEqual([{ client: "a", log: "debug", path: join("/out/clients", "drive_test_a_debug.log") }]);
  });

  it("leaves the input runs untouched", () => {
    applyRunDefaults(plan.runs, plan.clients, { retries: 5, clientLogDir: "/out" });

    expect(plan.runs[1].retries).toBe(0);
    expect(plan.runs[1].clientLogExports).toEqual([]);
  });
});

describe("selectRuns", () => {
  it("drops disabled runs", () => {
    expect(selectRuns(plan.runs).map((r) => r.id)).toEqual(["drive_test", "buy_weapon"]);
  });

  it("selects by id, description, scenario name or tag", () => {
    expect(selectRuns(plan.runs, { only: ["vehicles"] }).map((r) => r.id)).toEqual(["drive_test"]);
    expect(selectRuns(plan.runs, { only: ["Buy Weapon"] }).map((r) => r.id)).toEqual(["buy_weapon"]);
    expect(selectRuns(plan.runs, { only: ["drive"] }).map((r) => r.id)).toEqual(["drive_test"]);
  });

  it("applies skip after only", () => {
    expect(selectRuns(plan.runs, { only: ["drive_test", "shop"], skip: ["economy"] }).map((r) => r.id)).toEqual([
      "drive_test",
    ]);
  });
});
