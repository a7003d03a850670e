import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { XdotoolDriver } from "./xdotool.js";

describe("XdotoolDriver (dry run)", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "botrun-xdotool-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("builds xdotool argv lists", async () => {
    const driver = new XdotoolDriver({ dryRun: true, typingDelayMs: 10 });

    await driver.focus();
    await driver.typeText("hi");
    await driver.keyEvent("F", "down");
    await driver.mouseMove(10.7, 20, "absolute", 0.25);
    await driver.mouseMove(-5, 3, "relative", 0);
    await driver.mouseClick("Right", "double");
    await driver.mouseScroll("down", 3, 0.1);

    expect(driver.executedCommands).toEqual([
      ["xdotool", "search", "--name", "San Andreas Multiplayer"],
      ["xdotool", "windowactivate", "--sync", "0x1"],
      ["xdotool", "windowraise", "0x1"],
      ["xdotool", "type", "--delay", "10", "hi"],
      ["xdotool", "keydown", "f"],
      ["xdotool", "mousemove", "--sync", "10", "20", "--delay", "250"],
      ["xdotool", "mousemove_relative", "--", "-5", "3"],
      ["xdotool", "click", "--repeat", "2", "3"],
      ["xdotool", "click", "--repeat", "3", "--delay", "100", "5"],
    ]);
  });

  it("changes the typing delay through configure", async () => {
    const driver = new XdotoolDriver({ dryRun: true });

    driver.configure("typing_delay", "80");
    driver.configure("typing_delay", "fast");
    await driver.typeText("go");
    await driver.typeText("");

    expect(driver.executedCommands).toEqual([["xdotool", "type", "--delay", "80", "go"]]);
  });

  it("resolves screenshot targets against the screenshot directory", async () => {
    const driver = new XdotoolDriver({ dryRun: true, screenshotDir: dir });

    expect(await driver.screenshot("spawn")).toBe(join(dir, "spawn.png"));
    expect(await driver.screenshot("car", "shots/car.png")).toBe(join(dir, "shots", "car.png"));
    expect(driver.executedCommands[1]).toEqual(["import", "-window", "root", join(dir, "shots", "car.png")]);
  });
});
