import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TransportUnavailableError } from "../errors.js";
import { FileCommandTransport } from "./file.js";

describe("FileCommandTransport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "botrun-transport-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the file and appends encoded lines", async () => {
    const path = join(dir, "nested", "commands.txt");
    const transport = new FileCommandTransport(path);

    const receipt = await transport.send({ op: "chat", text: "hello" });
    await transport.send({ op: "wait", seconds: 0.5 });

    expect(receipt).toEqual({ line: "CHAT hello" });
    expect(await readFile(path, "utf-8")).toBe("CHAT hello\nWAIT:0.5\n");
  });

  it("honours a custom separator", async () => {
    const path = join(dir, "commands.txt");
    const transport = new FileCommandTransport(path, { separator: "\r\n" });

    await transport.send({ op: "command", text: "/v" });

    expect(await readFile(path, "utf-8")).toBe("/v\r\n");
  });

  it("clears stale commands", async () => {
    const path = join(dir, "commands.txt");
    await writeFile(path, "/old\n");
    const transport = new FileCommandTransport(path);

    await transport.clear();
    await transport.send({ op: "key", key: "F", state: "down" });

    expect(await readFile(path, "utf-8")).toBe("KEY:F:down\n");
  });

  it("refuses to send once closed", async () => {
    const transport = new FileCommandTransport(join(dir, "commands.txt"));
    await transport.close();

    expect(transport.isReady()).toBe(false);
    await expect(transport.send({ op: "command", text: "/v" })).rejects.toBeInstanceOf(TransportUnavailableError);
  });
});
