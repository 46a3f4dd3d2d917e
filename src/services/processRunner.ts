import { spawn, type ChildProcessByStdio } from "node:child_process";
import { existsSync } from "node:fs";
import { performance } from "node:perf_hooks";
import type { Readable } from "node:stream";
import type { ExecutionResult } from "../types/pipeline.js";

function failedToStart(command: readonly string[], message: string): ExecutionResult {
  return {
    command,
    succeeded: false,
    exitCode: null,
    elapsedSeconds: 0,
    stdout: "",
    stderr: message,
  };
}

function spawnErrorMessage(tool: string, cwd: string, err: NodeJS.ErrnoException): string {
  switch (err.code) {
    case "ENOENT":
      // spawn reports a missing cwd with the same code as a missing tool
      return existsSync(cwd) ? `command not found: ${tool}` : `working directory not found: ${cwd}`;
    case "EACCES":
      return `permission denied: ${tool}`;
    default:
      return `failed to start ${tool}: ${err.message}`;
  }
}

/**
 * Run one command (no shell) in `cwd` and wait for it to exit.
 * Never rejects: a tool that cannot be started comes back as a failed result with elapsedSeconds 0.
 * There is no timeout; a command that hangs blocks the pipeline.
 */
export function runCommand(command: readonly string[], cwd: string): Promise<ExecutionResult> {
  const [tool, ...args] = command;
  if (tool === undefined || tool === "") {
    return Promise.resolve(failedToStart(command, "empty command"));
  }

  return new Promise((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const started = performance.now();
    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(tool, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    } catch (err) {
      // argument validation (e.g. NUL bytes) throws before any process exists
      const message = err instanceof Error ? err.message : String(err);
      resolve(failedToStart(command, `failed to start ${tool}: ${message}`));
      return;
    }

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      resolve(failedToStart(command, spawnErrorMessage(tool, cwd, err)));
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      const elapsedSeconds = (performance.now() - started) / 1000;
      // Buffer#toString substitutes U+FFFD for invalid UTF-8
      let errText = Buffer.concat(stderr).toString("utf8");
      if (signal) {
        errText += `${errText && !errText.endsWith("\n") ? "\n" : ""}[terminated by ${signal}]`;
      }
      resolve({
        command,
        succeeded: code === 0,
        exitCode: code,
        elapsedSeconds,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: errText,
      });
    });
  });
}
