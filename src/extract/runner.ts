/**
 * Subprocess runner for the external text tools.
 *
 * Spawns a program, optionally feeds it stdin, and collects stdout/stderr.
 * Any outcome other than exit code 0 rejects with an ExtractionError. The child
 * is killed on every early exit path, and the timer and abort listener are
 * always released.
 */

import { spawn } from "node:child_process";
import { ExtractionError } from "../errors.js";
import { childLogger } from "../logger.js";

const log = childLogger("runner");

export interface RunOptions {
  /** Text written to the program's stdin */
  input?: string;
  /** Kill the program after this many milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
  cwd?: string;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Longest stderr excerpt carried in error messages */
const STDERR_EXCERPT = 500;

/**
 * Run an external program to completion.
 *
 * @throws ExtractionError with reason "missing", "timeout", "aborted" or "exit"
 */
export function runTool(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
  const { input, timeoutMs, signal, cwd } = options;

  if (signal?.aborted) {
    return Promise.reject(
      new ExtractionError(`${command} was aborted before it started`, { tool: command, reason: "aborted" })
    );
  }

  log.debug({ command, args }, "spawning");

  return new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: [input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;
    let timedOut = false;
    let aborted = false;

    const onAbort = (): void => {
      aborted = true;
      child.kill("SIGKILL");
    };

    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : undefined;

    signal?.addEventListener("abort", onAbort, { once: true });

    const finish = (error: ExtractionError | null, result?: RunResult): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
      if (error) {
        log.warn({ command, reason: error.reason, exitCode: error.exitCode }, error.message);
        reject(error);
      } else if (result) {
        resolve(result);
      }
    };

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err: NodeJS.ErrnoException) => {
      const missing = err.code === "ENOENT";
      finish(
        new ExtractionError(
          missing ? `${command} is not installed or not on PATH` : `${command} failed to start: ${err.message}`,
          { tool: command, reason: missing ? "missing" : "exit" },
          { cause: err }
        )
      );
    });

    child.on("close", (code: number | null) => {
      const errText = Buffer.concat(stderr).toString("utf-8");
      if (timedOut) {
        finish(
          new ExtractionError(`${command} timed out after ${timeoutMs}ms`, {
            tool: command,
            reason: "timeout",
          })
        );
        return;
      }
      if (aborted) {
        finish(new ExtractionError(`${command} was aborted`, { tool: command, reason: "aborted" }));
        return;
      }
      if (code !== 0) {
        const exitCode = code ?? -1;
        const excerpt = errText.trim().slice(0, STDERR_EXCERPT);
        finish(
          new ExtractionError(
            `${command} exited with code ${exitCode}${excerpt ? `: ${excerpt}` : ""}`,
            { tool: command, reason: "exit", exitCode, stderr: errText }
          )
        );
        return;
      }
      finish(null, { stdout: Buffer.concat(stdout).toString("utf-8"), stderr: errText, exitCode: 0 });
    });

    if (input !== undefined && child.stdin) {
      // EPIPE when the program exits without reading stdin; the exit code decides the outcome
      child.stdin.on("error", (err: Error) => log.debug({ command, err: err.message }, "stdin closed early"));
      child.stdin.end(input, "utf-8");
    }
  });
}
