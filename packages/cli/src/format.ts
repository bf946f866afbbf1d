import {
  type PortRecord,
  processDisplay,
  remoteDisplay,
  sourceLabel,
  toJsonRecord
} from "@berth/core";
import pc from "picocolors";

export type SourceFlags = {
  local?: boolean;
  ssh?: boolean;
  docker?: boolean;
};

/** One source flag narrows the list; --local wins over --ssh over --docker */
export function filterBySource(
  records: PortRecord[],
  flags: SourceFlags
): PortRecord[] {
  const source = flags.local
    ? "local"
    : flags.ssh
      ? "ssh"
      : flags.docker
        ? "docker"
        : null;
  return source ? records.filter((r) => r.source === source) : records;
}

export function formatPortTable(records: PortRecord[]): string[] {
  const lines = [
    `${"TYPE".padEnd(8)} ${"OPEN".padEnd(6)} ${"LOCAL".padEnd(8)} ${"REMOTE".padEnd(20)} PROCESS`,
    "-".repeat(66)
  ];
  for (const record of records) {
    const open = record.isOpen ? "●" : "○";
    lines.push(
      `${sourceLabel(record.source).padEnd(8)} ${open.padEnd(6)} :${String(record.localPort).padEnd(7)} ${remoteDisplay(record).padEnd(20)} ${processDisplay(record)}`
    );
  }
  return lines;
}

export function formatPortJson(records: PortRecord[]): string {
  return JSON.stringify(records.map(toJsonRecord), null, 2);
}

export interface PortCheck {
  port: number;
  open: boolean;
}

export function formatCheckTable(checks: PortCheck[]): string[] {
  const lines = [`${"PORT".padEnd(8)} ${"OPEN".padEnd(6)} STATUS`, "-".repeat(30)];
  for (const { port, open } of checks) {
    const row = `:${String(port).padEnd(7)} ${(open ? "●" : "○").padEnd(6)} ${open ? "open" : "closed"}`;
    lines.push(open ? pc.green(row) : pc.gray(row));
  }
  const openCount = checks.filter((c) => c.open).length;
  lines.push("", `${openCount}/${checks.length} ports open`);
  return lines;
}
