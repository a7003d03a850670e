export type KeyEdge = "down" | "up";
export type ClickState = "click" | "down" | "up" | "double";

/** One low-level instruction delivered to a client. */
export type Instruction =
  | { op: "command"; text: string }
  | { op: "chat"; text: string }
  | { op: "wait"; seconds: number }
  | { op: "teleport"; x: number; y: number; z: number; interior: number; world: number }
  | { op: "key"; key: string; state: KeyEdge }
  | { op: "option"; name: string; value: string }
  | { op: "wait_for"; pattern: string; timeout: number }
  | { op: "focus"; title?: string }
  | { op: "type"; text: string }
  | { op: "mouse_move"; mode: "absolute" | "relative"; x: number; y: number; duration: number }
  | { op: "mouse_click"; button: string; state: ClickState }
  | { op: "mouse_scroll"; direction: "up" | "down"; steps: number; interval: number }
  | { op: "screenshot"; name: string; path?: string }
  | { op: "config"; name: string; value: string };

export type InstructionOp = Instruction["op"];

/** Line protocol understood by the in-game command file consumer. */
export function encodeInstruction(i: Instruction): string {
  switch (i.op) {
    case "command":
      return i.text;
    case "chat":
      return `CHAT ${i.text}`;
    case "wait":
      return `WAIT:${i.seconds}`;
    case "teleport":
      return `TELEPORT:${i.x},${i.y},${i.z}:${i.interior}:${i.world}`;
    case "key":
      return `KEY:${i.key}:${i.state}`;
    case "option":
      return `OPTION:${i.name}=${i.value}`;
    case "wait_for":
      return `WAITFOR:${i.timeout}:${i.pattern}`;
    case "focus":
      return i.title ? `FOCUS:${i.title}` : "FOCUS";
    case "type":
      return `TYPE:${i.text}`;
    case "mouse_move":
      return `MOUSE:${i.mode}:${i.x}:${i.y}:${i.duration}`;
    case "mouse_click":
      return `MOUSECLICK:${i.button}:${i.state}`;
    case "mouse_scroll":
      return `MOUSESCROLL:${i.direction}:${i.steps}:${i.interval}`;
    case "screenshot":
      return i.path ? `SCREENSHOT:${i.name}:${i.path}` : `SCREENSHOT:${i.name}`;
    case "config":
      return `CONFIG:${i.name}=${i.value}`;
  }
}
