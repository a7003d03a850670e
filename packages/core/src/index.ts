// Errors
export {
  BotrunError,
  ConfigError,
  UnresolvedVariableError,
  UnknownMacroError,
  MacroCycleError,
  UnknownActionError,
  InvalidPatternError,
  UnknownReferenceError,
  StartupError,
  StartupTimeoutError,
  ProcessExitedEarlyError,
  TransportError,
  TransportUnavailableError,
  AbortedError,
  CleanupError,
  isConfigError,
  toErrorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Scenarios
export { expandScenario, MacroExpander, findMacroCycle } from "./scenario/expander.js";
export type { ExpandOptions } from "./scenario/expander.js";
export { normalizeStep, ensureLeadingSlash } from "./scenario/normalize.js";
export { validateScenario, toMacroTable } from "./scenario/validator.js";
export type { ValidationResult } from "./scenario/validator.js";
export { loadScenarioFiles } from "./scenario/loader.js";
export type { LoadScenariosResult } from "./scenario/loader.js";
export { ACTION_TYPES } from "./scenario/schema.js";
export type {
  ScenarioAction,
  ActionType,
  ActionOf,
  MatchType,
  RawStep,
  MacroDefinition,
  MacroTable,
  Bindings,
  JsonValue,
  ScenarioDefinition,
  ExpandedScenario,
} from "./scenario/types.js";

// Transports
export { encodeInstruction } from "./transport/instruction.js";
export type { Instruction, InstructionOp } from "./transport/instruction.js";
export type { CommandTransport, InputDriver, SendReceipt } from "./transport/interface.js";
export { FileCommandTransport } from "./transport/file.js";
export { BufferedCommandTransport } from "./transport/buffered.js";
export { InputDriverTransport } from "./transport/input-driver.js";
export { XdotoolDriver } from "./transport/xdotool.js";
export type { XdotoolDriverOptions } from "./transport/xdotool.js";

// Playback
export { ActionTranslator } from "./runner/translator.js";
export { ScriptRunner } from "./runner/script-runner.js";
export type { ScriptRunnerOptions, RunScriptOptions } from "./runner/script-runner.js";
export type {
  PlaybackEvent,
  PlaybackLog,
  PlaybackOutcome,
  PlaybackPhase,
  ConditionWaiter,
  WaitRequest,
  WaitOutcome,
} from "./runner/types.js";

// Log monitoring
export { LogTail } from "./monitor/log-tail.js";
export { LogMonitor, ServerLogMonitor, ClientLogMonitor } from "./monitor/log-monitor.js";
export type { LogMonitorOptions, LogLine } from "./monitor/log-monitor.js";
export { ExpectationMatcher, compilePattern } from "./monitor/matcher.js";
export type { LogExpectation, ExpectationResult } from "./monitor/matcher.js";

// Processes and clients
export { ProcessController } from "./process/controller.js";
export type { ControllerOptions, ControllerState } from "./process/controller.js";
export type { ManagedProcess, LaunchSpec, Spawner, ExitInfo } from "./process/interface.js";
export { spawnProcess } from "./process/spawn.js";
export { SampServerController, ExternalServer, parseServerPort, DEFAULT_SERVER_PORT } from "./process/server.js";
export type { GameServer, ServerControllerOptions } from "./process/server.js";
export type { BotClient, ExecuteOptions } from "./process/client.js";
export { DummyBotClient } from "./process/dummy-client.js";
export { WineSampClient } from "./process/wine-client.js";
export { createServer, createClients, createClient } from "./process/factory.js";
export type { FactoryOptions } from "./process/factory.js";

// Configuration and planning
export {
  BotConfigSchema,
  ToolSettingsSchema,
  RunDefinitionSchema,
  ClientDefinitionSchema,
} from "./plan/schema.js";
export type {
  BotConfig,
  BotConfigInput,
  ToolSettings,
  RunDefinition,
  ClientDefinition,
  ServerDefinition,
  AssertionConfig,
} from "./plan/schema.js";
export { buildRunPlan, parseBotConfig, scenarioFromEntry, DEFAULT_CLIENT_NAME } from "./plan/build.js";
export type { RunPlan, PlannedClient, BuildPlanOptions } from "./plan/build.js";
export { selectRuns, runTokens } from "./plan/filter.js";
export { applyRunDefaults } from "./plan/defaults.js";
export type { RunDefaults } from "./plan/defaults.js";
export type { RunFilter } from "./plan/filter.js";

// Orchestration
export { TestOrchestrator, withSuffix } from "./orchestrator/orchestrator.js";
export type { OrchestratorOptions, RunSuiteOptions } from "./orchestrator/orchestrator.js";
export { OrchestratorContext } from "./orchestrator/context.js";
export { evaluateAssertions } from "./orchestrator/assertions.js";
export {
  analyseResults,
  summariseResults,
  summarisePerScenario,
  summarisePerClient,
  summarisePerTag,
} from "./orchestrator/analytics.js";
export type { RunStatistics, SuiteAnalytics } from "./orchestrator/analytics.js";
export { registerScript } from "./orchestrator/register.js";
export type {
  RunContext,
  RunResult,
  RunStatus,
  RunSummary,
  SuiteResult,
  SuiteStatus,
  Failure,
  FailureCategory,
  ClientRunResult,
  OrchestratorEvent,
} from "./orchestrator/types.js";
export type { AssertionResult } from "./assert/types.js";
export { calculatePassRate } from "./assert/scorer.js";

// Reporter
export { printTerminalReport, formatDuration } from "./report/terminal.js";
export { generateJsonReport, buildJsonReport } from "./report/json.js";
export type { JsonReport, ReportMeta } from "./report/json.js";
export { generateHtmlReport } from "./report/html.js";

// Store
export type { HistoryStore, SuiteMeta, StoredSuite, StoredResult } from "./store/history.js";
export { SqliteHistoryStore } from "./store/sqlite.js";

// Diff
export { diffResults, snapshotRuns } from "./diff/engine.js";
export type { DiffReport, RunDiff, RunSnapshot, DiffStatus, DiffSummary, DiffOptions } from "./diff/engine.js";
export { compareVersions, regressionReason, resolveVersion } from "./diff/regression.js";
export type { Regression, VersionComparison } from "./diff/regression.js";

// Utilities
export { slugify } from "./util/slug.js";
export { sleep, linkSignals } from "./util/async.js";
