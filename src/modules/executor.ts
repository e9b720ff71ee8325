/**
 * Command Executor
 * Runs a command line through the shell and captures its combined output
 */

import { spawnSync, type SpawnSyncReturns } from "node:child_process";

export interface ExecResult {
  // stdout and stderr, interleaved as the process wrote them
  output: string;
  // null when the process was killed by a signal or never started
  status: number | null;
}

/**
 * Runs one fully rendered command line and blocks until it exits
 */
export interface Executor {
  run(command: string): ExecResult;
}

export class ShellExecutor implements Executor {
  constructor(private shell: string = "/bin/sh") {}

  run(command: string): ExecResult {
    // Group so stderr of every command in the line joins stdout
    const result = spawnSync(this.shell, ["-c", `{ ${command}\n} 2>&1`], {
      env: process.env,
      encoding: "utf-8",
      maxBuffer: 64 * 1024 * 1024,
    });

    return toExecResult(result);
  }
}

/**
 * Keep whatever the process wrote, even when spawnSync also reports an
 * error (ENOBUFS past maxBuffer, a kill). Only a shell that never started
 * and printed nothing gets its error message as output
 */
export function toExecResult(
  result: Pick<SpawnSyncReturns<string>, "stdout" | "status" | "error">,
): ExecResult {
  const output = result.stdout ?? "";
  if (result.error && output === "") {
    return { output: result.error.message, status: null };
  }
  return { output, status: result.status };
}
