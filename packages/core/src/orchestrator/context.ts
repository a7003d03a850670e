import { CleanupError, StartupError, toErrorMessage } from "../errors.js";
import type { BotClient } from "../process/client.js";
import type { GameServer } from "../process/server.js";
import type { SuiteResult } from "./types.js";

export interface OrchestratorContextOptions {
  server: GameServer;
  clients: readonly BotClient[];
}

/**
 * The long-lived resources of one invocation. The server is started on first
 * use and kept up across runs; clients connect per attempt.
 */
export class OrchestratorContext {
  readonly server: GameServer;
  private readonly clients: Map<string, BotClient>;
  private address: string | undefined;
  private closed = false;

  constructor(options: OrchestratorContextOptions) {
    this.server = options.server;
    this.clients = new Map(options.clients.map((c) => [c.name, c]));
  }

  /**
   * Runs `fn` and always closes the context afterwards. A cleanup failure
   * after the suite completed is recorded on the result instead of
   * discarding it.
   */
  static async run(
    options: OrchestratorContextOptions,
    fn: (ctx: OrchestratorContext) => Promise<SuiteResult>
  ): Promise<SuiteResult> {
    const ctx = new OrchestratorContext(options);
    let suite: SuiteResult;
    try {
      suite = await fn(ctx);
    } catch (e) {
      await ctx.close();
      throw e;
    }
    try {
      await ctx.close();
    } catch (e) {
      if (!(e instanceof CleanupError)) throw e;
      return { ...suite, cleanupErrors: e.failures };
    }
    return suite;
  }

  client(name: string): BotClient | undefined {
    return this.clients.get(name);
  }

  allClients(): BotClient[] {
    return [...this.clients.values()];
  }

  /** Starts the server if it is not up yet and returns its `host:port`. */
  async ensureServer(signal?: AbortSignal): Promise<string> {
    if (this.closed) throw new StartupError("Orchestrator context is closed");
    await this.server.start(signal);
    this.address ??= await this.server.serverAddress();
    return this.address;
  }

  /** Stops the server and releases every client, even if some of them fail. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const outcomes = await Promise.allSettled([
      ...this.allClients().map((c) => c.close()),
      ...this.allClients().flatMap((c) => c.logMonitors().map((m) => m.close())),
      this.server.logMonitor.close(),
      this.server.stop(),
    ]);
    const errors = outcomes.flatMap((o) => (o.status === "rejected" ? [toErrorMessage(o.reason)] : []));
    if (errors.length > 0) {
      throw new CleanupError(errors);
    }
  }
}
