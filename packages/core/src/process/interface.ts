export interface ExitInfo {
  code: number | null;
  signal: string | null;
  /** Set when the process could not be launched at all. */
  error?: string;
}

/** Handle on a launched external process. */
export interface ManagedProcess {
  readonly pid: number | undefined;
  /** Resolves once the process has exited; never rejects. */
  readonly exited: Promise<ExitInfo>;
  isRunning(): boolean;
  kill(signal: NodeJS.Signals): void;
}

export interface LaunchSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export type Spawner = (spec: LaunchSpec) => ManagedProcess;
