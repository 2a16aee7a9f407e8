// Command execution layer: every package-manager, service-manager and identity lookup
// passes through this module. LocalExecutor.execute() is the boundary between step code
// and the OS; tests substitute their own Executor.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  /** Waits for the command however long it takes. */
  execute(command: Command): Promise<ExecResult>;
}

/** Local executor using child_process. Never rejects: spawn failures come back as exit code 127. */
export class LocalExecutor implements Executor {
  async execute(command: Command): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      return { stdout: "", stderr: "empty argv", exitCode: 127, durationMs: 0 };
    }

    return new Promise<ExecResult>((resolve) => {
      const child = execFile(
        cmd,
        args,
        {
          encoding: "utf8",
          // A full-distribution upgrade can print a lot; overflowing this kills the child.
          maxBuffer: 64 * 1024 * 1024,
          env: command.env ? { ...process.env, ...command.env } : process.env,
          shell: false,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          resolve({ stdout, stderr: stderr || spawnMessage(error), exitCode: exitCodeOf(error), durationMs });
        },
      );

      // Nothing is ever typed into a child: a tool that stops to ask reads end-of-file instead of waiting forever.
      child.stdin?.end();
    });
  }
}

function exitCodeOf(error: (Error & { code?: unknown }) | null): number {
  if (!error) return 0;
  if (typeof error.code === "number") return error.code;
  // ENOENT and friends: the binary never ran.
  return 127;
}

function spawnMessage(error: Error | null): string {
  return error ? error.message : "";
}
