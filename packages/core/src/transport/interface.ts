import type { Instruction } from "./instruction.js";

export type TransportKind = "file" | "buffered" | "input";

export interface SendReceipt {
  /** Encoded form as seen by the client. */
  line: string;
  /** Artifact produced by the instruction, e.g. a screenshot path. */
  artifact?: string;
}

/**
 * Delivers instructions to exactly one client. Instances are never shared
 * between clients, so implementations need no write locking.
 */
export interface CommandTransport {
  readonly kind: TransportKind;
  isReady(): boolean;
  send(instruction: Instruction): Promise<SendReceipt>;
  /** Resolves once everything sent so far is visible to the client. */
  flush(): Promise<void>;
  close(): Promise<void>;
  /** Drops pending/stale instructions before a run, where the transport supports it. */
  clear?(): Promise<void>;
}

/** Window and input injection capability used by {@link InputDriverTransport}. */
export interface InputDriver {
  focus(title?: string): Promise<void>;
  typeText(text: string): Promise<void>;
  keyEvent(key: string, state: "down" | "up"): Promise<void>;
  mouseMove(x: number, y: number, mode: "absolute" | "relative", durationSeconds: number): Promise<void>;
  mouseClick(button: string, state: "click" | "down" | "up" | "double"): Promise<void>;
  mouseScroll(direction: "up" | "down", steps: number, intervalSeconds: number): Promise<void>;
  /** Captures the client window and returns the written file path. */
  screenshot(name: string, path?: string): Promise<string>;
  configure(name: string, value: string): void;
}
