/**
 * External command execution.
 *
 * Every collector and action goes through a CommandRunner so tests can
 * substitute canned output.
 */

import { execFile, spawn } from "child_process";
import { PORT_SCANNER } from "@berth/core";

export interface CommandResult {
  /** Exit code; non-zero is a failure the caller decides how to handle */
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions
) => Promise<CommandResult>;

/** Spawn failed (binary missing) or the command ran out of time */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly reason: "spawn" | "timeout"
  ) {
    super(message);
    this.name = "CommandError";
  }
}

/**
 * Run a command and capture its output. Resolves on any exit code;
 * rejects with CommandError when it cannot be started or times out.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const timeout = options.timeoutMs ?? PORT_SCANNER.COMMAND_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { timeout, maxBuffer: PORT_SCANNER.MAX_BUFFER_BYTES, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ code: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === "number") {
          resolve({ code: error.code, stdout, stderr });
          return;
        }
        if (error.killed) {
          reject(
            new CommandError(
              `${command} timed out after ${timeout}ms`,
              command,
              "timeout"
            )
          );
          return;
        }
        reject(new CommandError(error.message, command, "spawn"));
      }
    );
  });
};

/** Where a command runs: locally, or through `ssh <host> "<command>"` */
export function hostCommand(
  remoteHost: string | undefined,
  command: string,
  args: string[]
): { command: string; args: string[] } {
  if (!remoteHost) return { command, args };
  return {
    command: "ssh",
    args: [remoteHost, [command, ...args.map(shellQuote)].join(" ")]
  };
}

/** Quote an argument for the remote shell when it needs it */
export function shellQuote(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export type DetachedSpawner = (command: string, args: string[]) => Promise<number>;

/**
 * Start a background process that outlives berth and return its PID.
 */
export const spawnDetached: DetachedSpawner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: "ignore" });
    child.once("error", (e) => {
      reject(new CommandError(e.message, command, "spawn"));
    });
    child.once("spawn", () => {
      child.unref();
      if (child.pid === undefined) {
        reject(new CommandError(`${command} has no PID`, command, "spawn"));
        return;
      }
      resolve(child.pid);
    });
  });
