import { spawn } from "node:child_process";
import type { ExitInfo, LaunchSpec, ManagedProcess, Spawner } from "./interface.js";

/** Launches a real child process with inherited environment plus `spec.env`. */
export const spawnProcess: Spawner = (spec: LaunchSpec): ManagedProcess => {
  const child = spawn(spec.command, spec.args, {
    cwd: spec.cwd,
    env: { ...process.env, ...spec.env },
    stdio: "ignore",
  });

  let running = true;
  const exited = new Promise<ExitInfo>((resolve) => {
    child.once("exit", (code, signal) => {
      running = false;
      resolve({ code, signal });
    });
    // ENOENT and friends arrive as "error" without a matching "exit".
    child.once("error", (err) => {
      running = false;
      resolve({ code: null, signal: null, error: err.message });
    });
  });

  return {
    pid: child.pid,
    exited,
    isRunning: () => running,
    kill: (signal) => {
      if (running) child.kill(signal);
    },
  };
};
