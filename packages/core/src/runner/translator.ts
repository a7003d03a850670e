import { ensureLeadingSlash } from "../scenario/normalize.js";
import type { ActionOf, ScenarioAction } from "../scenario/types.js";
import type { ClickState, Instruction, KeyEdge } from "../transport/instruction.js";

const KEY_EDGES: Record<ActionOf<"keypress">["state"], KeyEdge[]> = {
  press: ["down", "up"],
  down: ["down"],
  hold: ["down"],
  up: ["up"],
  release: ["up"],
};

const CLICK_STATES: Record<ActionOf<"mouse_click">["state"], ClickState> = {
  click: "click",
  double: "double",
  down: "down",
  hold: "down",
  up: "up",
  release: "up",
};

/** Maps scenario actions onto the low-level instructions a client understands. */
export class ActionTranslator {
  translate(action: ScenarioAction): Instruction[] {
    switch (action.type) {
      case "command":
        return [{ op: "command", text: action.command }];
      case "chat":
        return [{ op: "chat", text: action.message }];
      case "wait":
        return [{ op: "wait", seconds: action.seconds }];
      case "wait_for":
        return [{ op: "wait_for", pattern: action.pattern, timeout: action.timeout }];
      case "teleport":
        return [
          { op: "teleport", x: action.x, y: action.y, z: action.z, interior: action.interior, world: action.world },
        ];
      case "keypress": {
        const key = action.key.toUpperCase();
        return KEY_EDGES[action.state].map((state): Instruction => ({ op: "key", key, state }));
      }
      case "key_sequence":
        return this.keySequence(action);
      case "key_combo":
        return this.keyCombo(action);
      case "option":
        return [{ op: "option", name: action.name, value: action.value }];
      case "sequence":
        return action.commands.map((command): Instruction => ({ op: "command", text: ensureLeadingSlash(command) }));
      case "focus_window":
        return [action.title ? { op: "focus", title: action.title } : { op: "focus" }];
      case "type_text":
        return [{ op: "type", text: action.text }];
      case "mouse_move":
        return [{ op: "mouse_move", mode: action.mode, x: action.x, y: action.y, duration: action.duration }];
      case "mouse_click":
        return [{ op: "mouse_click", button: action.button, state: CLICK_STATES[action.state] }];
      case "mouse_scroll":
        return [{ op: "mouse_scroll", direction: action.direction, steps: action.steps, interval: action.interval }];
      case "mouse_drag":
        return this.mouseDrag(action);
      case "screenshot":
        return [action.path ? { op: "screenshot", name: action.name, path: action.path } : { op: "screenshot", name: action.name }];
      case "config":
        return [{ op: "config", name: action.name, value: action.value }];
    }
  }

  private keySequence(action: ActionOf<"key_sequence">): Instruction[] {
    const out: Instruction[] = [];
    action.keys.forEach((raw, i) => {
      const key = raw.toUpperCase();
      if (i > 0 && action.interval > 0) out.push({ op: "wait", seconds: action.interval });
      out.push({ op: "key", key, state: "down" }, { op: "key", key, state: "up" });
    });
    return out;
  }

  private keyCombo(action: ActionOf<"key_combo">): Instruction[] {
    const keys = action.keys.map((k) => k.toUpperCase());
    const out: Instruction[] = keys.map((key): Instruction => ({ op: "key", key, state: "down" }));
    if (action.hold > 0) out.push({ op: "wait", seconds: action.hold });
    for (const key of [...keys].reverse()) out.push({ op: "key", key, state: "up" });
    return out;
  }

  private mouseDrag(action: ActionOf<"mouse_drag">): Instruction[] {
    const out: Instruction[] = [
      { op: "mouse_move", mode: "absolute", x: action.start_x, y: action.start_y, duration: 0 },
      { op: "mouse_click", button: action.button, state: "down" },
    ];
    if (action.hold > 0) out.push({ op: "wait", seconds: action.hold });
    out.push(
      { op: "mouse_move", mode: "absolute", x: action.end_x, y: action.end_y, duration: action.duration },
      { op: "mouse_click", button: action.button, state: "up" }
    );
    return out;
  }
}
