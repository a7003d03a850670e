import { execFile as execFileCb } from "node:child_process";
import { mkdir } from "node:fs/promises";
import { dirname, isAbsolute, join } from "node:path";
import { promisify } from "node:util";
import type { InputDriver } from "./interface.js";

const execFileAsync = promisify(execFileCb);

const BUTTONS: Record<string, string> = { left: "1", middle: "2", right: "3" };

export interface XdotoolDriverOptions {
  windowTitle?: string;
  xdotoolBinary?: string;
  /** argv prefix for captures; the output path is appended. */
  screenshotCommand?: string[];
  screenshotDir?: string;
  /** Per-character delay passed to `xdotool type`, in ms. */
  typingDelayMs?: number;
  dryRun?: boolean;
  dryRunWindowId?: string;
}

/** Drives the Wine-hosted client window through xdotool. */
export class XdotoolDriver implements InputDriver {
  readonly executedCommands: string[][] = [];
  private readonly windowTitle: string;
  private readonly binary: string;
  private readonly screenshotCommand: string[];
  private readonly screenshotDir: string;
  private readonly dryRun: boolean;
  private readonly dryRunWindowId: string;
  private typingDelayMs: number;

  constructor(options: XdotoolDriverOptions = {}) {
    this.windowTitle = options.windowTitle ?? "San Andreas Multiplayer";
    this.binary = options.xdotoolBinary ?? "xdotool";
    this.screenshotCommand = options.screenshotCommand ?? ["import", "-window", "root"];
    this.screenshotDir = options.screenshotDir ?? process.cwd();
    this.typingDelayMs = options.typingDelayMs ?? 25;
    this.dryRun = options.dryRun ?? false;
    this.dryRunWindowId = options.dryRunWindowId ?? "0x1";
  }

  async focus(title?: string): Promise<void> {
    const windowId = await this.searchWindow(title);
    if (!windowId) {
      throw new Error(`No window titled "${title ?? this.windowTitle}" found`);
    }
    await this.xdotool("windowactivate", "--sync", windowId);
    await this.xdotool("windowraise", windowId);
  }

  async typeText(text: string): Promise<void> {
    if (!text) return;
    await this.xdotool("type", "--delay", String(this.typingDelayMs), text);
  }

  async keyEvent(key: string, state: "down" | "up"): Promise<void> {
    await this.xdotool(state === "down" ? "keydown" : "keyup", key.toLowerCase());
  }

  async mouseMove(x: number, y: number, mode: "absolute" | "relative", durationSeconds: number): Promise<void> {
    if (mode === "relative") {
      await this.xdotool("mousemove_relative", "--", String(Math.trunc(x)), String(Math.trunc(y)));
      return;
    }
    const args = ["mousemove", "--sync", String(Math.trunc(x)), String(Math.trunc(y))];
    if (durationSeconds > 0) args.push("--delay", String(Math.round(durationSeconds * 1000)));
    await this.xdotool(...args);
  }

  async mouseClick(button: string, state: "click" | "down" | "up" | "double"): Promise<void> {
    const target = BUTTONS[button.toLowerCase()] ?? button;
    switch (state) {
      case "down":
        await this.xdotool("mousedown", target);
        return;
      case "up":
        await this.xdotool("mouseup", target);
        return;
      case "double":
        await this.xdotool("click", "--repeat", "2", target);
        return;
      case "click":
        await this.xdotool("click", target);
    }
  }

  async mouseScroll(direction: "up" | "down", steps: number, intervalSeconds: number): Promise<void> {
    const button = direction === "up" ? "4" : "5";
    const args = ["click", "--repeat", String(steps)];
    if (intervalSeconds > 0) args.push("--delay", String(Math.round(intervalSeconds * 1000)));
    await this.xdotool(...args, button);
  }

  async screenshot(name: string, path?: string): Promise<string> {
    const target = path ? (isAbsolute(path) ? path : join(this.screenshotDir, path)) : join(this.screenshotDir, `${name}.png`);
    const [command, ...args] = this.screenshotCommand;
    if (!command) throw new Error("Screenshot command is empty");
    await mkdir(dirname(target), { recursive: true });
    await this.invoke(command, [...args, target]);
    return target;
  }

  configure(name: string, value: string): void {
    if (name === "typing_delay" || name === "typing_speed") {
      const ms = Number(value);
      if (Number.isFinite(ms) && ms >= 0) this.typingDelayMs = ms;
    }
  }

  private async searchWindow(title?: string): Promise<string | undefined> {
    const stdout = await this.xdotool("search", "--name", title ?? this.windowTitle);
    if (this.dryRun) return this.dryRunWindowId;
    return stdout.trim().split("\n").find((line) => line.trim().length > 0)?.trim();
  }

  private xdotool(...args: string[]): Promise<string> {
    return this.invoke(this.binary, args);
  }

  private async invoke(command: string, args: string[]): Promise<string> {
    this.executedCommands.push([command, ...args]);
    if (this.dryRun) return "";
    const { stdout } = await execFileAsync(command, args, { timeout: 15000 });
    return stdout;
  }
}
