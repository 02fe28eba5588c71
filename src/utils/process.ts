import { execFile } from "node:child_process";

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly args: string[],
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly stdout: string,
    readonly timedOut: boolean,
    readonly aborted: boolean
  ) {
    const reason = aborted ? "aborted" : timedOut ? "timed out" : `code=${exitCode}`;
    super(`Command failed (${command} ${args.join(" ")}): ${reason}\nSTDERR: ${stderr.trim()}`);
    this.name = "CommandError";
  }
}

// Large enough for ffprobe JSON and whisper console output
const MAX_BUFFER = 64 * 1024 * 1024;

export function runCommand(command: string, args: string[], options?: RunOptions): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options?.cwd,
        env: { ...process.env, ...options?.env },
        timeout: options?.timeoutMs,
        signal: options?.signal,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
        windowsHide: true,
      },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        const aborted = err.name === "AbortError" || options?.signal?.aborted === true;
        // execFile sets killed when it terminated the child because of the timeout
        const timedOut = !aborted && err.killed === true && Boolean(options?.timeoutMs);
        const exitCode = typeof err.code === "number" ? err.code : null;
        reject(
          new CommandError(command, args, exitCode, stderr || err.message, stdout, timedOut, aborted)
        );
      }
    );
  });
}
