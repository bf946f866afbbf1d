/**
 * Side effects against processes: kill, container stop, SSH forwards.
 */

import { type PortRecord, errorMessage } from "@berth/core";
import { ActionError } from "./errors";
import {
  type CommandRunner,
  type DetachedSpawner,
  hostCommand,
  runCommand,
  spawnDetached
} from "./exec";

export interface ActionOptions {
  remoteHost?: string;
  run?: CommandRunner;
}

async function runAction(
  action: string,
  remoteHost: string | undefined,
  command: string,
  args: string[],
  run: CommandRunner
): Promise<void> {
  const cmd = hostCommand(remoteHost, command, args);
  const result = await run(cmd.command, cmd.args).catch((e: unknown) => {
    throw new ActionError(errorMessage(e), action);
  });
  if (result.code !== 0) {
    const detail = result.stderr.trim();
    const message = `${command} exited with ${result.code}`;
    throw new ActionError(detail ? `${message}: ${detail}` : message, action);
  }
}

export function killByPid(
  pid: number,
  options: ActionOptions = {}
): Promise<void> {
  return runAction(
    "kill",
    options.remoteHost,
    "kill",
    [String(pid)],
    options.run ?? runCommand
  );
}

export function stopContainer(
  containerId: string,
  options: ActionOptions = {}
): Promise<void> {
  return runAction(
    "docker-stop",
    options.remoteHost,
    "docker",
    ["stop", containerId],
    options.run ?? runCommand
  );
}

export function killInContainer(
  container: string,
  pid: number,
  options: ActionOptions = {}
): Promise<void> {
  return runAction(
    "container-kill",
    options.remoteHost,
    "docker",
    ["exec", container, "kill", String(pid)],
    options.run ?? runCommand
  );
}

export interface KillTarget extends ActionOptions {
  /** Records came from inside this container */
  dockerTarget?: string;
}

/**
 * Kill whatever owns a record, choosing the strategy from its source.
 * Resolves to a short description of what was done.
 *
 * SSH tunnels are local processes even when scanning a remote host.
 */
export async function killRecord(
  record: PortRecord,
  target: KillTarget = {}
): Promise<string> {
  const { remoteHost, dockerTarget, run } = target;
  const port = record.localPort;

  if (dockerTarget) {
    if (record.pid === undefined) {
      throw new ActionError("No PID available for this port", "container-kill");
    }
    await killInContainer(dockerTarget, record.pid, { remoteHost, run });
    return `Killed PID ${record.pid} in container`;
  }

  switch (record.source) {
    case "local":
    case "ssh": {
      if (record.pid === undefined) {
        throw new ActionError(`No PID found for port ${port}`, "kill");
      }
      const host = record.source === "ssh" ? undefined : remoteHost;
      await killByPid(record.pid, { remoteHost: host, run });
      return `Killed process on port ${port}`;
    }
    case "docker": {
      if (record.containerId === undefined) {
        throw new ActionError(
          `No container ID found for port ${port}`,
          "docker-stop"
        );
      }
      await stopContainer(record.containerId, { remoteHost, run });
      return `Stopped container ${record.containerName ?? record.containerId}`;
    }
  }
}

/** Kill the first record listening on a port */
export async function killByPort(
  records: PortRecord[],
  port: number,
  target: KillTarget = {}
): Promise<string> {
  const record = records.find((r) => r.localPort === port);
  if (!record) {
    throw new ActionError(`No process found on port ${port}`, "kill");
  }
  return killRecord(record, target);
}

export interface ForwardRequest {
  /** "<local>:<remoteHost>:<remote>" */
  spec: string;
  /** SSH destination */
  host: string;
  /** -R instead of -L */
  reverse?: boolean;
}

export function forwardArgs(request: ForwardRequest): string[] {
  return [
    "-f",
    "-N",
    request.reverse ? "-R" : "-L",
    request.spec,
    request.host
  ];
}

export function forwardSpec(
  localPort: number | string,
  remoteHost: string,
  remotePort: number | string
): string {
  return `${localPort}:${remoteHost}:${remotePort}`;
}

/**
 * Start `ssh -f -N -L|-R <spec> <host>` in the background.
 * Resolves to the PID of the launched ssh process.
 */
export async function createForward(
  request: ForwardRequest,
  spawner: DetachedSpawner = spawnDetached
): Promise<number> {
  if (!request.spec.trim() || !request.host.trim()) {
    throw new ActionError("Forward spec and host are required", "forward");
  }
  try {
    return await spawner("ssh", forwardArgs(request));
  } catch (e) {
    throw new ActionError(errorMessage(e), "forward");
  }
}
