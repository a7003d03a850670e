import { TransportUnavailableError } from "../errors.js";
import { encodeInstruction, type Instruction } from "./instruction.js";
import type { CommandTransport, SendReceipt } from "./interface.js";

/** In-memory transport for dry runs and tests. */
export class BufferedCommandTransport implements CommandTransport {
  readonly kind = "buffered" as const;
  readonly instructions: Instruction[] = [];
  private closed = false;

  isReady(): boolean {
    return !this.closed;
  }

  async send(instruction: Instruction): Promise<SendReceipt> {
    if (this.closed) throw new TransportUnavailableError("buffered", "transport is closed");
    this.instructions.push(instruction);
    return { line: encodeInstruction(instruction) };
  }

  async flush(): Promise<void> {}

  async clear(): Promise<void> {
    this.instructions.length = 0;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  lines(): string[] {
    return this.instructions.map(encodeInstruction);
  }
}
