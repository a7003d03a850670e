import { performance } from "node:perf_hooks";
import { AbortedError, TransportError, toErrorMessage } from "../errors.js";
import type { ActionOf, ScenarioAction } from "../scenario/types.js";
import { encodeInstruction } from "../transport/instruction.js";
import type { CommandTransport } from "../transport/interface.js";
import { secondsToMs, sleep as defaultSleep, type Sleep } from "../util/async.js";
import { ActionTranslator } from "./translator.js";
import type { ConditionWaiter, PlaybackEvent, PlaybackLog, PlaybackOutcome, PlaybackPhase } from "./types.js";

export interface ScriptRunnerOptions {
  translator?: ActionTranslator;
  sleep?: Sleep;
  /** Monotonic ms clock. */
  now?: () => number;
}

export interface RunScriptOptions {
  label?: string;
  phase?: PlaybackPhase;
  signal?: AbortSignal;
  waiter?: ConditionWaiter;
}

/** Ends playback without being an error of the action itself. */
class PlaybackStop extends Error {
  readonly outcome: Exclude<PlaybackOutcome, "completed">;

  constructor(outcome: Exclude<PlaybackOutcome, "completed">, message: string) {
    super(message);
    this.name = "PlaybackStop";
    this.outcome = outcome;
  }
}

/**
 * Plays a flat action list against one client's transport, strictly in order.
 * Suspends only its own playback on `wait` / `wait_for`, so several runners
 * can drive different clients at once.
 */
export class ScriptRunner {
  private readonly transport: CommandTransport;
  private readonly translator: ActionTranslator;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(transport: CommandTransport, options: ScriptRunnerOptions = {}) {
    this.transport = transport;
    this.translator = options.translator ?? new ActionTranslator();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => performance.now());
  }

  async run(actions: readonly ScenarioAction[], options: RunScriptOptions = {}): Promise<PlaybackLog> {
    const { signal, waiter } = options;
    const origin = this.now();
    const wallStart = new Date().toISOString();
    const events: PlaybackEvent[] = [];
    const elapsed = (): number => this.now() - origin;

    // Scenario-scoped, changed by `config` actions.
    let actionDelayMs = 0;
    let stop: PlaybackStop | undefined;

    for (const [index, action] of actions.entries()) {
      if (!stop && signal?.aborted) stop = new PlaybackStop("aborted", toErrorMessage(signal.reason ?? "aborted"));
      if (stop) {
        const at = elapsed();
        events.push({ index, type: action.type, action, instructions: [], status: "skipped", startedAt: at, finishedAt: at });
        continue;
      }

      const event: PlaybackEvent = {
        index,
        type: action.type,
        action,
        instructions: [],
        status: "ok",
        startedAt: elapsed(),
        finishedAt: 0,
      };
      events.push(event);

      try {
        const pause = (index > 0 ? actionDelayMs : 0) + secondsToMs(action.delay);
        if (pause > 0) await this.sleep(pause, signal);
        event.startedAt = elapsed();

        if (action.type === "wait_for" && waiter) {
          await this.waitForCondition(action, event, waiter, signal);
        } else if (action.type === "screenshot") {
          await this.capture(action, event);
        } else {
          await this.dispatch(action, event, signal);
          if (action.type === "config" && action.name === "action_delay") {
            const seconds = Number(action.value);
            if (Number.isFinite(seconds) && seconds >= 0) actionDelayMs = secondsToMs(seconds);
          }
        }
      } catch (e) {
        event.status = "failed";
        if (e instanceof PlaybackStop) {
          event.error = e.message;
          stop = e;
        } else if (signal?.aborted) {
          event.error = toErrorMessage(e);
          stop = new PlaybackStop("aborted", event.error);
        } else {
          event.error = toErrorMessage(e);
          stop = new PlaybackStop("failed", e instanceof TransportError ? event.error : `${action.type} failed: ${event.error}`);
        }
      } finally {
        event.finishedAt = elapsed();
      }
    }

    const log: PlaybackLog = {
      label: options.label ?? "playback",
      phase: options.phase ?? "scenario",
      startedAt: wallStart,
      durationMs: elapsed(),
      outcome: stop?.outcome ?? "completed",
      events: Object.freeze(events.map((e) => Object.freeze(e))),
    };
    if (stop) log.error = stop.message;
    return Object.freeze(log);
  }

  private async dispatch(action: ScenarioAction, event: PlaybackEvent, signal?: AbortSignal): Promise<void> {
    for (const instruction of this.translator.translate(action)) {
      if (signal?.aborted) throw new AbortedError("Playback aborted");
      const receipt = await this.transport.send(instruction);
      event.instructions.push(receipt.line);
      if (receipt.artifact) event.artifact = receipt.artifact;
      if (instruction.op === "wait") {
        const started = this.now();
        await this.sleep(secondsToMs(instruction.seconds), signal);
        event.waitedMs = (event.waitedMs ?? 0) + (this.now() - started);
      }
    }
  }

  private async waitForCondition(
    action: ActionOf<"wait_for">,
    event: PlaybackEvent,
    waiter: ConditionWaiter,
    signal?: AbortSignal
  ): Promise<void> {
    event.instructions.push(encodeInstruction({ op: "wait_for", pattern: action.pattern, timeout: action.timeout }));
    const outcome = await waiter.waitFor(
      {
        pattern: action.pattern,
        matchType: action.match_type,
        caseSensitive: action.case_sensitive,
        occurrences: action.occurrences,
        timeoutMs: secondsToMs(action.timeout),
        source: action.source,
      },
      signal
    );
    event.waitedMs = outcome.elapsedMs;
    event.observed = outcome.observed;
    if (outcome.matched) return;

    const message = `"${action.pattern}" not observed ${action.occurrences}x within ${action.timeout}s (saw ${outcome.observed})`;
    if (action.fatal) throw new PlaybackStop("failed", message);
    event.status = "failed";
    event.error = message;
  }

  private async capture(action: ActionOf<"screenshot">, event: PlaybackEvent): Promise<void> {
    try {
      await this.dispatch(action, event);
    } catch (e) {
      if (e instanceof TransportError && !this.transport.isReady()) throw e;
      event.status = "failed";
      event.error = `screenshot failed: ${toErrorMessage(e)}`;
    }
  }
}
