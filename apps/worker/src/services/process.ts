import { spawn } from "node:child_process";

import { logger } from "@shortloop/shared";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Kills the child after this long (default: 30 minutes) */
  timeoutMs?: number;
  cwd?: string;
}

/** Runs an external binary; injected so stages can be tested without one. */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;
const STDERR_TAIL_LINES = 10;

export type CommandFailureReason = "exit_code" | "timeout" | "not_found" | "spawn_error";

export class CommandFailedError extends Error {
  readonly command: string;
  readonly reason: CommandFailureReason;
  readonly exitCode: number | null;
  readonly stderrTail: string;

  constructor(
    command: string,
    reason: CommandFailureReason,
    options: { exitCode?: number | null; stderrTail?: string; cause?: unknown } = {},
  ) {
    const tail = options.stderrTail ?? "";
    super(
      `${command} ${reason === "exit_code" ? `exited with code ${options.exitCode ?? "?"}` : reason}${tail ? `: ${tail}` : ""}`,
      options.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = "CommandFailedError";
    this.command = command;
    this.reason = reason;
    this.exitCode = options.exitCode ?? null;
    this.stderrTail = tail;
  }
}

function tailOf(stderr: string): string {
  return stderr
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(-STDERR_TAIL_LINES)
    .join("\n");
}

function isNotFound(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill("SIGKILL");
      logger.error("command_timeout", { service: "worker", command, timeoutMs });
      reject(new CommandFailedError(command, "timeout", { stderrTail: tailOf(stderr) }));
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.once("error", (error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      logger.error("command_spawn_error", { service: "worker", command, error: error.message });
      reject(new CommandFailedError(command, isNotFound(error) ? "not_found" : "spawn_error", { cause: error }));
    });

    child.once("close", (code) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      const stderrTail = tailOf(stderr);
      logger.error("command_failed", { service: "worker", command, code, stderr: stderrTail });
      reject(new CommandFailedError(command, "exit_code", { exitCode: code, stderrTail }));
    });
  });
