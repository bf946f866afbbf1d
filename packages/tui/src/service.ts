/**
 * Everything the dashboard does to the outside world, behind one
 * interface so the dispatcher can run against a fake.
 */

import {
  type Connection,
  type PortRecord,
  type VerboseLogger,
  saveConnections,
  silentLogger
} from "@berth/core";
import {
  type ForwardRequest,
  type KillTarget,
  PortScanner,
  type ScanTarget,
  createForward,
  getContainerIp,
  killRecord
} from "@berth/monitor";

export interface PortService {
  scan(target: ScanTarget): Promise<PortRecord[]>;
  /** Resolves to a description of what was killed */
  kill(record: PortRecord, target: KillTarget): Promise<string>;
  /** Resolves to the PID of the ssh process */
  forward(request: ForwardRequest): Promise<number>;
  containerIp(container: string, remoteHost?: string): Promise<string>;
  /** Persist user connections (without Local) */
  saveConnections(connections: Connection[]): Promise<void>;
}

export function createPortService(
  logger: VerboseLogger = silentLogger,
  connectionsPath?: string
): PortService {
  const scanner = new PortScanner({ logger });

  return {
    scan: (target) => scanner.scan(target),
    kill: (record, target) => killRecord(record, target),
    forward: (request) => createForward(request),
    containerIp: (container, remoteHost) =>
      getContainerIp(container, { remoteHost }),
    saveConnections: async (connections) => {
      saveConnections(connections, connectionsPath);
    }
  };
}
