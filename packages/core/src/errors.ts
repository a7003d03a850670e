export type ErrorCode =
  | "CONFIG"
  | "UNRESOLVED_VARIABLE"
  | "UNKNOWN_MACRO"
  | "MACRO_CYCLE"
  | "UNKNOWN_ACTION"
  | "INVALID_PATTERN"
  | "UNKNOWN_REFERENCE"
  | "STARTUP"
  | "STARTUP_TIMEOUT"
  | "PROCESS_EXITED_EARLY"
  | "TRANSPORT"
  | "TRANSPORT_UNAVAILABLE"
  | "ABORTED"
  | "CLEANUP";

export class BotrunError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Problems found before any process is started. Abort the whole invocation. */
export class ConfigError extends BotrunError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], code: ErrorCode = "CONFIG") {
    super(code, issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.issues = issues;
  }
}

export class UnresolvedVariableError extends ConfigError {
  readonly variable: string;

  constructor(variable: string, where: string) {
    super(`Unresolved variable "{{${variable}}}" in ${where}`, [], "UNRESOLVED_VARIABLE");
    this.variable = variable;
  }
}

export class UnknownMacroError extends ConfigError {
  readonly macro: string;

  constructor(macro: string, where: string) {
    super(`Unknown macro "${macro}" referenced in ${where}`, [], "UNKNOWN_MACRO");
    this.macro = macro;
  }
}

export class MacroCycleError extends ConfigError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Macro cycle detected: ${cycle.join(" -> ")}`, [], "MACRO_CYCLE");
    this.cycle = cycle;
  }
}

export class UnknownActionError extends ConfigError {
  readonly actionType: string;

  constructor(actionType: string, where: string) {
    super(`Unknown action type "${actionType}" in ${where}`, [], "UNKNOWN_ACTION");
    this.actionType = actionType;
  }
}

export class InvalidPatternError extends ConfigError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid regex pattern /${pattern}/: ${reason}`, [], "INVALID_PATTERN");
    this.pattern = pattern;
  }
}

export class UnknownReferenceError extends ConfigError {
  constructor(kind: "scenario" | "client" | "log", name: string, where: string) {
    super(`Unknown ${kind} "${name}" referenced in ${where}`, [], "UNKNOWN_REFERENCE");
  }
}

/** A process failed to launch or become ready. Fatal for one attempt, retryable. */
export class StartupError extends BotrunError {
  constructor(message: string, code: ErrorCode = "STARTUP", options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class StartupTimeoutError extends StartupError {
  constructor(name: string, timeoutMs: number) {
    super(`${name} did not become ready within ${timeoutMs}ms`, "STARTUP_TIMEOUT");
  }
}

export class ProcessExitedEarlyError extends StartupError {
  readonly exitCode: number | null;

  constructor(name: string, exitCode: number | null, signal: string | null) {
    super(
      `${name} exited before becoming ready (code ${exitCode ?? "none"}${signal ? `, signal ${signal}` : ""})`,
      "PROCESS_EXITED_EARLY"
    );
    this.exitCode = exitCode;
  }
}

/** A client became unreachable mid-scenario. Fatal for that client's playback only. */
export class TransportError extends BotrunError {
  constructor(message: string, code: ErrorCode = "TRANSPORT", options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class TransportUnavailableError extends TransportError {
  constructor(transport: string, reason: string) {
    super(`${transport} transport unavailable: ${reason}`, "TRANSPORT_UNAVAILABLE");
  }
}

export class AbortedError extends BotrunError {
  constructor(reason = "Operation aborted") {
    super("ABORTED", reason);
  }
}

/** One or more resources could not be released at shutdown. */
export class CleanupError extends BotrunError {
  readonly failures: string[];

  constructor(failures: string[]) {
    super("CLEANUP", `Cleanup failed: ${failures.join("; ")}`);
    this.failures = failures;
  }
}

export function toErrorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isConfigError(e: unknown): e is ConfigError {
  return e instanceof ConfigError;
}
