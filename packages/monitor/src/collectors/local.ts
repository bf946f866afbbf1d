/**
 * Local collector: processes with listening TCP sockets, via lsof.
 * Command: lsof -i -P -n -sTCP:LISTEN -Fcpn
 */

import {
  type PortRecord,
  errorMessage,
  parsePort,
  silentLogger
} from "@berth/core";
import { hostCommand, runCommand } from "../exec";
import type { CollectorOptions } from "./types";

const LSOF_ARGS = ["-i", "-P", "-n", "-sTCP:LISTEN", "-Fcpn"];

export async function collectLocal(
  options: CollectorOptions = {}
): Promise<PortRecord[]> {
  const { remoteHost, run = runCommand, logger = silentLogger } = options;
  const { command, args } = hostCommand(remoteHost, "lsof", LSOF_ARGS);

  try {
    const result = await run(command, args);
    if (result.code !== 0) {
      logger.log("collector.failed", {
        source: "local",
        code: result.code,
        stderr: result.stderr.trim()
      });
      return [];
    }
    return parseLsofFields(result.stdout, remoteHost !== undefined);
  } catch (e) {
    logger.log("collector.failed", { source: "local", error: errorMessage(e) });
    return [];
  }
}

/**
 * Parse lsof field output (-F). Each line is a one-letter tag followed by
 * its value; p and c set the current process, n names a socket.
 *
 * p12345
 * cnode
 * n*:3000
 */
export function parseLsofFields(
  output: string,
  remoteMode: boolean
): PortRecord[] {
  const records: PortRecord[] = [];
  let pid: number | undefined;
  let command = "";

  for (const line of output.split("\n")) {
    if (!line) continue;
    const value = line.slice(1);

    switch (line[0]) {
      case "p": {
        const parsed = Number.parseInt(value, 10);
        pid = Number.isNaN(parsed) ? undefined : parsed;
        command = "";
        break;
      }
      case "c":
        command = value;
        break;
      case "n": {
        const port = extractPort(value);
        if (port === null) break;
        records.push({
          source: "local",
          localPort: port,
          processName: command,
          pid,
          // A remote LISTEN listing is authoritative; locally we probe
          isOpen: remoteMode,
          isLoopback: false
        });
        break;
      }
      default:
        break;
    }
  }

  // IPv4 and IPv6 sockets on one port collapse to the first seen
  const seen = new Set<number>();
  return records
    .filter((r) => {
      if (seen.has(r.localPort)) return false;
      seen.add(r.localPort);
      return true;
    })
    .sort((a, b) => a.localPort - b.localPort);
}

/**
 * Port from an address such as "*:3000", "127.0.0.1:8080" or "[::1]:80".
 */
export function extractPort(address: string): number | null {
  const lastColon = address.lastIndexOf(":");
  if (lastColon === -1) return null;
  return parsePort(address.slice(lastColon + 1));
}
