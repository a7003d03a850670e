import { TransportError, TransportUnavailableError, toErrorMessage } from "../errors.js";
import { encodeInstruction, type Instruction } from "./instruction.js";
import type { CommandTransport, InputDriver, SendReceipt } from "./interface.js";

export interface InputDriverTransportOptions {
  /** Receives every instruction as well, typically the client's command file. */
  passthrough?: CommandTransport;
  /** Reports whether the target window/process can take input. */
  ready?: () => boolean;
}

/**
 * Forwards input-level instructions (focus, typing, keys, mouse, screenshots)
 * to an {@link InputDriver}. Instructions the driver has no notion of, such as
 * chat or teleport, only reach the passthrough transport.
 */
export class InputDriverTransport implements CommandTransport {
  readonly kind = "input" as const;
  private readonly driver: InputDriver;
  private readonly passthrough: CommandTransport | undefined;
  private readonly ready: () => boolean;
  private closed = false;

  constructor(driver: InputDriver, options: InputDriverTransportOptions = {}) {
    this.driver = driver;
    this.passthrough = options.passthrough;
    this.ready = options.ready ?? (() => true);
  }

  isReady(): boolean {
    return !this.closed && this.ready() && (this.passthrough?.isReady() ?? true);
  }

  async send(instruction: Instruction): Promise<SendReceipt> {
    if (!this.isReady()) {
      throw new TransportUnavailableError("input", this.closed ? "transport is closed" : "client window is not ready");
    }

    const receipt: SendReceipt = this.passthrough
      ? await this.passthrough.send(instruction)
      : { line: encodeInstruction(instruction) };

    try {
      const artifact = await this.dispatch(instruction);
      return artifact ? { ...receipt, artifact } : receipt;
    } catch (e) {
      throw new TransportError(`Input driver failed on "${receipt.line}": ${toErrorMessage(e)}`, "TRANSPORT", { cause: e });
    }
  }

  async flush(): Promise<void> {
    await this.passthrough?.flush();
  }

  async clear(): Promise<void> {
    await this.passthrough?.clear?.();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.passthrough?.close();
  }

  private async dispatch(i: Instruction): Promise<string | undefined> {
    switch (i.op) {
      case "focus":
        await this.driver.focus(i.title);
        return undefined;
      case "type":
        await this.driver.typeText(i.text);
        return undefined;
      case "key":
        await this.driver.keyEvent(i.key, i.state);
        return undefined;
      case "mouse_move":
        await this.driver.mouseMove(i.x, i.y, i.mode, i.duration);
        return undefined;
      case "mouse_click":
        await this.driver.mouseClick(i.button, i.state);
        return undefined;
      case "mouse_scroll":
        await this.driver.mouseScroll(i.direction, i.steps, i.interval);
        return undefined;
      case "screenshot":
        return this.driver.screenshot(i.name, i.path);
      case "config":
        this.driver.configure(i.name, i.value);
        return undefined;
      default:
        return undefined;
    }
  }
}
