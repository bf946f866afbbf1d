/**
 * SSH collector: tunnels opened by running ssh clients.
 *
 * Reads the local `ps aux` and pulls -L / -R specs out of each ssh command
 * line. Tunnels always run on this machine, so a remote host is ignored.
 */

import {
  type PortRecord,
  SSH,
  errorMessage,
  parsePort,
  silentLogger
} from "@berth/core";
import { runCommand } from "../exec";
import type { CollectorOptions } from "./types";

const LOCAL_FORWARD = /-L\s*(\d+):([^:\s]+):(\d+)/g;
const REMOTE_FORWARD = /-R\s*(\d+):([^:\s]+):(\d+)/g;

export async function collectSsh(
  options: CollectorOptions = {}
): Promise<PortRecord[]> {
  const { run = runCommand, logger = silentLogger } = options;

  try {
    const result = await run("ps", ["aux"]);
    if (result.code !== 0) {
      logger.log("collector.failed", {
        source: "ssh",
        code: result.code,
        stderr: result.stderr.trim()
      });
      return [];
    }
    return parseSshForwards(result.stdout);
  } catch (e) {
    logger.log("collector.failed", { source: "ssh", error: errorMessage(e) });
    return [];
  }
}

/**
 * Parse `ps aux` output. Only lines mentioning ssh together with -L or -R
 * are considered; each forward spec on a line becomes one record.
 */
export function parseSshForwards(psOutput: string): PortRecord[] {
  const records: PortRecord[] = [];

  for (const line of psOutput.split("\n")) {
    if (!line.includes("ssh")) continue;
    if (!line.includes("-L") && !line.includes("-R")) continue;

    const fields = line.trim().split(/\s+/);
    const pidField = fields[1];
    const pid =
      pidField !== undefined && /^\d+$/.test(pidField)
        ? Number.parseInt(pidField, 10)
        : undefined;
    const sshHost = extractSshHost(line);

    for (const match of line.matchAll(LOCAL_FORWARD)) {
      const localPort = parsePort(match[1] ?? "");
      const remotePort = parsePort(match[3] ?? "");
      if (localPort === null || remotePort === null) continue;
      records.push({
        source: "ssh",
        localPort,
        remoteHost: match[2],
        remotePort,
        processName: "ssh",
        pid,
        sshHost,
        isOpen: false,
        isLoopback: false
      });
    }

    // -R remote:host:local listens on the far side; the local end is cap 3
    for (const match of line.matchAll(REMOTE_FORWARD)) {
      const remotePort = parsePort(match[1] ?? "");
      const localPort = parsePort(match[3] ?? "");
      if (localPort === null || remotePort === null) continue;
      records.push({
        source: "ssh",
        localPort,
        remoteHost: `${SSH.REVERSE_TAG} ${match[2] ?? ""}:${remotePort}`,
        remotePort,
        processName: "ssh -R",
        pid,
        sshHost,
        isOpen: false,
        isLoopback: false
      });
    }
  }

  return records;
}

/**
 * The SSH destination of a command line: the last token after the ssh
 * binary, when it is neither an option nor a forward spec.
 */
export function extractSshHost(cmdline: string): string | undefined {
  const tokens = cmdline.trim().split(/\s+/);
  const sshIndex = tokens.findIndex(
    (t) => t === "ssh" || t.endsWith("/ssh")
  );
  if (sshIndex === -1) return undefined;

  const last = tokens[tokens.length - 1];
  if (tokens.length - 1 <= sshIndex || last === undefined) return undefined;
  if (last.startsWith("-") || last.includes(":")) return undefined;
  return last;
}
