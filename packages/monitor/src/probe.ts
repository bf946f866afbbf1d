/**
 * TCP liveness probing.
 */

import { Socket } from "net";
import { PORT_SCANNER, type PortRecord } from "@berth/core";

export type PortProbe = (port: number) => Promise<boolean>;

/**
 * Try a TCP connect to host:port. Refused, unreachable and timed-out
 * attempts all resolve to false.
 */
export function probePort(
  port: number,
  host: string = PORT_SCANNER.PROBE_HOST,
  timeoutMs: number = PORT_SCANNER.PROBE_TIMEOUT_MS
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new Socket();
    let settled = false;

    const finish = (open: boolean) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(open);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(false));
    socket.connect(port, host);
  });
}

/**
 * Probe every distinct port that needs confirmation and write the result
 * back to its records. In remote mode the remote listings are trusted and
 * only SSH tunnels (which listen locally) are probed.
 *
 * All probes run concurrently and are joined once; a probe that rejects
 * marks its own port closed.
 */
export async function probeOpenPorts(
  records: PortRecord[],
  remoteMode: boolean,
  probe: PortProbe = (port) => probePort(port)
): Promise<PortRecord[]> {
  const needsProbe = (r: PortRecord) => !remoteMode || r.source === "ssh";

  const ports = [
    ...new Set(records.filter(needsProbe).map((r) => r.localPort))
  ];
  const results = await Promise.all(
    ports.map(
      async (port) => [port, await probe(port).catch(() => false)] as const
    )
  );
  const openByPort = new Map(results);

  return records.map((r) => {
    if (!needsProbe(r)) return r;
    const open = openByPort.get(r.localPort);
    return open === undefined ? r : { ...r, isOpen: open };
  });
}
