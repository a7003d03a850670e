import { appendFile, mkdir, truncate, utimes, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { TransportUnavailableError } from "../errors.js";
import { encodeInstruction, type Instruction } from "./instruction.js";
import type { CommandTransport, SendReceipt } from "./interface.js";

export interface FileTransportOptions {
  separator?: string;
  encoding?: BufferEncoding;
}

/** Appends encoded instructions to a command file the client polls and consumes. */
export class FileCommandTransport implements CommandTransport {
  readonly kind = "file" as const;
  readonly path: string;
  private readonly separator: string;
  private readonly encoding: BufferEncoding;
  private prepared: Promise<void> | undefined;
  private closed = false;

  constructor(path: string, options: FileTransportOptions = {}) {
    this.path = path;
    this.separator = options.separator ?? "\n";
    this.encoding = options.encoding ?? "utf-8";
  }

  isReady(): boolean {
    return !this.closed;
  }

  async send(instruction: Instruction): Promise<SendReceipt> {
    if (this.closed) throw new TransportUnavailableError("file", `${this.path} is closed`);
    await this.prepare();
    const line = encodeInstruction(instruction);
    await appendFile(this.path, line + this.separator, this.encoding);
    return { line };
  }

  async flush(): Promise<void> {
    if (!existsSync(this.path)) return;
    const now = new Date();
    await utimes(this.path, now, now);
  }

  /** Truncates the command file so stale commands from an earlier run are not replayed. */
  async clear(): Promise<void> {
    await this.prepare();
    await truncate(this.path, 0);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
  }

  private prepare(): Promise<void> {
    this.prepared ??= (async () => {
      await mkdir(dirname(this.path), { recursive: true });
      if (!existsSync(this.path)) await writeFile(this.path, "", this.encoding);
    })();
    return this.prepared;
  }
}
