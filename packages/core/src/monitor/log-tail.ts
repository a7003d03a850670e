import { open, stat } from "node:fs/promises";
import { StringDecoder } from "node:string_decoder";
import { isNotFound } from "../util/fs.js";

export interface LogTailOptions {
  encoding?: BufferEncoding;
  /** Upper bound for one read, in bytes. */
  chunkSize?: number;
}

/**
 * Incremental reader for a file that keeps growing. Only bytes appended since
 * the previous read are decoded; an unterminated last line is held back until
 * its newline arrives. A file that shrinks is treated as rotated and re-read
 * from the start.
 */
export class LogTail {
  readonly path: string;
  private readonly encoding: BufferEncoding;
  private readonly chunkSize: number;
  private offset = 0;
  private partial = "";
  private decoder: StringDecoder;

  constructor(path: string, options: LogTailOptions = {}) {
    this.path = path;
    this.encoding = options.encoding ?? "utf-8";
    this.chunkSize = options.chunkSize ?? 64 * 1024;
    this.decoder = new StringDecoder(this.encoding);
  }

  get position(): number {
    return this.offset;
  }

  /** Skips everything currently in the file. */
  async mark(): Promise<void> {
    this.offset = await this.size();
    this.reset();
  }

  /** Complete lines appended since the last call. */
  async read(): Promise<string[]> {
    const size = await this.size();
    if (size < this.offset) {
      this.offset = 0;
      this.reset();
    }
    if (size === this.offset) return [];

    const handle = await open(this.path, "r");
    let text = "";
    try {
      const buffer = Buffer.alloc(Math.min(this.chunkSize, size - this.offset));
      while (this.offset < size) {
        const length = Math.min(buffer.length, size - this.offset);
        const { bytesRead } = await handle.read(buffer, 0, length, this.offset);
        if (bytesRead === 0) break;
        this.offset += bytesRead;
        text += this.decoder.write(buffer.subarray(0, bytesRead));
      }
    } finally {
      await handle.close();
    }

    const pieces = (this.partial + text).split(/\r?\n/);
    this.partial = pieces.pop() ?? "";
    return pieces;
  }

  /** Returns the held-back unterminated line, if any, and forgets it. */
  drainPartial(): string | undefined {
    const rest = this.partial + this.decoder.end();
    this.reset();
    return rest.length > 0 ? rest : undefined;
  }

  private reset(): void {
    this.partial = "";
    this.decoder = new StringDecoder(this.encoding);
  }

  private async size(): Promise<number> {
    try {
      return (await stat(this.path)).size;
    } catch (e) {
      if (isNotFound(e)) return 0;
      throw e;
    }
  }
}
