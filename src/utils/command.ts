/**
 * External command runner
 */

import { spawn } from "node:child_process";
import type { Writable } from "node:stream";
import { logger } from "./logger";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** null when the process was killed by a signal */
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
}

export interface CommandOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Grace period between SIGTERM and SIGKILL once the timeout fires */
  killGraceMs?: number;
  /** Stream stdout here instead of buffering it */
  stdout?: Writable;
  /** Terminate the process (SIGTERM) once this aborts */
  signal?: AbortSignal;
}

const MAX_CAPTURED_OUTPUT = 64 * 1024;

function appendCapped(buffer: string, chunk: Buffer): string {
  if (buffer.length >= MAX_CAPTURED_OUTPUT) return buffer;
  return (buffer + chunk.toString()).slice(0, MAX_CAPTURED_OUTPUT);
}

/**
 * Run a command without a shell and collect its result.
 * Rejects only when the process cannot be spawned at all.
 */
export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const { cwd, timeoutMs, killGraceMs = 10_000, signal } = options;
  const startTime = Date.now();

  logger.debug(`Running: ${command} ${args.join(" ")}`);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
            killTimer = setTimeout(() => child.kill("SIGKILL"), killGraceMs);
          }, timeoutMs)
        : undefined;

    const terminate = () => child.kill("SIGTERM");
    if (signal?.aborted) {
      terminate();
    } else {
      signal?.addEventListener("abort", terminate, { once: true });
    }

    const clearTimers = () => {
      clearTimeout(timer);
      clearTimeout(killTimer);
      signal?.removeEventListener("abort", terminate);
    };

    if (options.stdout) {
      child.stdout.pipe(options.stdout);
    } else {
      child.stdout.on("data", (chunk: Buffer) => {
        stdout = appendCapped(stdout, chunk);
      });
    }

    child.stderr.on("data", (chunk: Buffer) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on("error", (err) => {
      clearTimers();
      reject(err);
    });

    child.on("close", (code) => {
      clearTimers();
      resolve({
        success: code === 0 && !timedOut,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: code,
        timedOut,
        durationMs: Date.now() - startTime,
      });
    });
  });
}
