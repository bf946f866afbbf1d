/**
 * Docker collectors.
 *
 * Host level: `docker ps` port mappings, one record per published port.
 * Container interior: `ss -tlnp` run inside a named container.
 */

import {
  DOCKER,
  type PortRecord,
  errorMessage,
  parsePort,
  silentLogger
} from "@berth/core";
import { ActionError } from "../errors";
import { hostCommand, runCommand } from "../exec";
import type { CollectorOptions } from "./types";

// 0.0.0.0:5432->5432/tcp, :::8080->80/tcp, 0.0.0.0:3000-3001->3000-3001/tcp
const PORT_MAPPING = /(?:[\d.:]+:)?(\d+)(?:-(\d+))?->(\d+)(?:-(\d+))?\/tcp/g;

export async function collectDocker(
  options: CollectorOptions = {}
): Promise<PortRecord[]> {
  const { remoteHost, run = runCommand, logger = silentLogger } = options;
  const { command, args } = hostCommand(remoteHost, "docker", [
    "ps",
    "--format",
    DOCKER.PS_FORMAT
  ]);

  try {
    const result = await run(command, args);
    // Non-zero usually means the daemon is not running
    if (result.code !== 0) {
      logger.log("collector.failed", {
        source: "docker",
        code: result.code,
        stderr: result.stderr.trim()
      });
      return [];
    }
    return parseDockerPs(result.stdout, remoteHost !== undefined);
  } catch (e) {
    logger.log("collector.failed", { source: "docker", error: errorMessage(e) });
    return [];
  }
}

export function parseDockerPs(
  output: string,
  remoteMode: boolean
): PortRecord[] {
  const records: PortRecord[] = [];

  for (const line of output.split("\n")) {
    if (!line.trim()) continue;

    const [containerId, containerName, ports] = line.split("\t");
    if (
      containerId === undefined ||
      containerName === undefined ||
      ports === undefined
    ) {
      continue;
    }

    const seen = new Set<number>();
    const push = (localPort: number, remotePort: number | null) => {
      if (seen.has(localPort)) return;
      seen.add(localPort);
      records.push({
        source: "docker",
        localPort,
        remoteHost: containerName,
        remotePort: remotePort ?? undefined,
        processName: containerName,
        containerId,
        containerName,
        isOpen: remoteMode,
        isLoopback: false
      });
    };

    for (const match of ports.matchAll(PORT_MAPPING)) {
      const localStart = parsePort(match[1] ?? "");
      const localEnd = match[2] === undefined ? null : parsePort(match[2]);
      const remoteStart = parsePort(match[3] ?? "");
      const remoteEnd = match[4] === undefined ? null : parsePort(match[4]);

      if (
        localStart !== null &&
        localEnd !== null &&
        remoteStart !== null &&
        remoteEnd !== null &&
        localEnd >= localStart &&
        remoteEnd >= remoteStart
      ) {
        const count = Math.min(
          localEnd - localStart + 1,
          remoteEnd - remoteStart + 1
        );
        for (let i = 0; i < count; i++) {
          push(localStart + i, remoteStart + i);
        }
        continue;
      }

      if (localStart !== null) push(localStart, remoteStart);
    }
  }

  return records;
}

/**
 * Listening sockets inside a container. Resolves to an empty list when
 * the container or ss is unavailable.
 */
export async function collectFromContainer(
  container: string,
  options: CollectorOptions = {}
): Promise<PortRecord[]> {
  const { remoteHost, run = runCommand, logger = silentLogger } = options;
  const { command, args } = hostCommand(remoteHost, "docker", [
    "exec",
    container,
    "ss",
    "-tlnp"
  ]);

  try {
    const result = await run(command, args);
    if (result.code !== 0) {
      logger.log("collector.failed", {
        source: "container",
        container,
        code: result.code,
        stderr: result.stderr.trim()
      });
      return [];
    }
    return parseSsOutput(result.stdout, container);
  } catch (e) {
    logger.log("collector.failed", {
      source: "container",
      container,
      error: errorMessage(e)
    });
    return [];
  }
}

/**
 * Parse `ss -tln` / `ss -tlnp` output.
 *
 * State  Recv-Q Send-Q Local Address:Port Peer Address:Port Process
 * LISTEN 0      128    127.0.0.1:5432     0.0.0.0:*         users:(("postgres",pid=1,fd=5))
 */
export function parseSsOutput(
  output: string,
  containerName: string
): PortRecord[] {
  const records: PortRecord[] = [];
  const seen = new Set<number>();

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("LISTEN")) continue;

    const fields = trimmed.split(/\s+/);
    const localAddress = fields[3];
    if (fields.length < 4 || localAddress === undefined) continue;

    const lastColon = localAddress.lastIndexOf(":");
    const port = parsePort(localAddress.slice(lastColon + 1));
    if (port === null) continue;

    const bindAddress = lastColon === -1 ? "" : localAddress.slice(0, lastColon);
    const isLoopback = bindAddress === "127.0.0.1" || bindAddress === "[::1]";

    // IPv4 and IPv6 rows of the same port
    if (seen.has(port)) continue;
    seen.add(port);

    const processColumn = fields.slice(5).join(" ");
    const processName = /\(\("([^"]+)"/.exec(processColumn)?.[1];
    const pidMatch = /pid=(\d+)/.exec(processColumn)?.[1];

    records.push({
      source: "docker",
      localPort: port,
      remoteHost: containerName,
      remotePort: port,
      processName: processName ?? containerName,
      pid: pidMatch === undefined ? undefined : Number.parseInt(pidMatch, 10),
      containerName,
      isOpen: true,
      isLoopback
    });
  }

  return records;
}

/**
 * Private IP of a container, for forwarding to it from its host.
 * Multiple networks yield the first address.
 */
export async function getContainerIp(
  container: string,
  options: Pick<CollectorOptions, "remoteHost" | "run"> = {}
): Promise<string> {
  const { remoteHost, run = runCommand } = options;
  const { command, args } = hostCommand(remoteHost, "docker", [
    "inspect",
    "-f",
    DOCKER.IP_FORMAT,
    container
  ]);

  const result = await run(command, args).catch((e: unknown) => {
    throw new ActionError(errorMessage(e), "container-ip");
  });
  if (result.code !== 0) {
    throw new ActionError(
      `Failed to get container IP for '${container}': ${result.stderr.trim()}`,
      "container-ip"
    );
  }

  const ip = result.stdout.trim().split(/\s+/)[0] ?? "";
  if (!ip) {
    throw new ActionError(
      `Container '${container}' has no IP address`,
      "container-ip"
    );
  }
  return ip;
}
