/**
 * Port record types
 * One observed listening TCP endpoint, whatever source discovered it
 */

import { DOCKER } from "../constants";

/** Where a listening port was discovered */
export type PortSource = "local" | "ssh" | "docker";

/** A listening TCP endpoint produced by a collector */
export interface PortRecord {
  /** Origin of discovery; drives display and kill strategy */
  source: PortSource;
  /** Locally bound port, always 1-65535 */
  localPort: number;
  /** The other end: SSH target, container name or forwarded destination */
  remoteHost?: string;
  remotePort?: number;
  /** Best-effort process name, empty when unknown */
  processName: string;
  /** Absent when the listing does not show it */
  pid?: number;
  containerId?: string;
  containerName?: string;
  /** Remote endpoint of an SSH tunnel */
  sshHost?: string;
  /** Liveness, refined by probing */
  isOpen: boolean;
  /** Container-internal binding restricted to loopback (not forwardable) */
  isLoopback: boolean;
}

/** JSON export shape used by `berth list --json` */
export interface PortRecordJson {
  source: "Local" | "Ssh" | "Docker";
  local_port: number;
  is_open: boolean;
  remote_host: string | null;
  remote_port: number | null;
  process_name: string;
  pid: number | null;
  container_id: string | null;
  container_name: string | null;
  ssh_host: string | null;
  is_loopback: boolean;
}

const SOURCE_LABELS: Record<PortSource, string> = {
  local: "LOCAL",
  ssh: "SSH",
  docker: "DOCKER"
};

const SOURCE_TAGS: Record<PortSource, PortRecordJson["source"]> = {
  local: "Local",
  ssh: "Ssh",
  docker: "Docker"
};

export function sourceLabel(source: PortSource): string {
  return SOURCE_LABELS[source];
}

/** "host:port", "host", or empty */
export function remoteDisplay(record: PortRecord): string {
  if (record.remoteHost !== undefined && record.remotePort !== undefined) {
    return `${record.remoteHost}:${record.remotePort}`;
  }
  return record.remoteHost ?? "";
}

export function processDisplay(record: PortRecord): string {
  if (record.source === "docker") {
    const name = record.containerName ?? "unknown";
    const id = (record.containerId ?? "").slice(0, DOCKER.SHORT_ID_LENGTH);
    return `${name} (${id})`;
  }
  if (record.pid !== undefined) {
    return `${record.processName} (pid:${record.pid})`;
  }
  return record.processName;
}

export function toJsonRecord(record: PortRecord): PortRecordJson {
  return {
    source: SOURCE_TAGS[record.source],
    local_port: record.localPort,
    is_open: record.isOpen,
    remote_host: record.remoteHost ?? null,
    remote_port: record.remotePort ?? null,
    process_name: record.processName,
    pid: record.pid ?? null,
    container_id: record.containerId ?? null,
    container_name: record.containerName ?? null,
    ssh_host: record.sshHost ?? null,
    is_loopback: record.isLoopback
  };
}

/** Validate a port number parsed from tool output */
export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= 65535;
}

/**
 * Parse a port field. Digits only: "80abc", " 80" and "-1" are rejected.
 */
export function parsePort(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const port = Number.parseInt(value, 10);
  return isValidPort(port) ? port : null;
}
