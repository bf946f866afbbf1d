/**
 * Port scanner: collects listening ports from every source, removes
 * redundant Local duplicates, probes liveness and sorts.
 */

import {
  type PortRecord,
  type PortSource,
  type VerboseLogger,
  silentLogger
} from "@berth/core";
import {
  type CollectorOptions,
  collectDocker,
  collectFromContainer,
  collectLocal,
  collectSsh
} from "./collectors";
import { type PortProbe, probeOpenPorts, probePort } from "./probe";

export interface ScanTarget {
  /** SSH destination whose ports are listed instead of the local machine's */
  remoteHost?: string;
  /** Container whose interior sockets are listed instead of any source */
  dockerTarget?: string;
}

type Collector = (options: CollectorOptions) => Promise<PortRecord[]>;

export interface PortScannerDeps {
  collectLocal: Collector;
  collectSsh: Collector;
  collectDocker: Collector;
  collectFromContainer: (
    container: string,
    options: CollectorOptions
  ) => Promise<PortRecord[]>;
  probe: PortProbe;
  logger: VerboseLogger;
}

const DEFAULT_DEPS: PortScannerDeps = {
  collectLocal,
  collectSsh,
  collectDocker,
  collectFromContainer,
  probe: (port) => probePort(port),
  logger: silentLogger
};

/**
 * Drop Local records whose port is also claimed by an SSH or Docker
 * record; the richer record wins.
 */
export function dedupeLocal(records: PortRecord[]): PortRecord[] {
  const claimed = new Set(
    records.filter((r) => r.source !== "local").map((r) => r.localPort)
  );
  return records.filter(
    (r) => r.source !== "local" || !claimed.has(r.localPort)
  );
}

/** Open first, then ascending port. Stable for equal keys. */
export function sortRecords(records: PortRecord[]): PortRecord[] {
  return [...records].sort((a, b) => {
    if (a.isOpen !== b.isOpen) return a.isOpen ? -1 : 1;
    return a.localPort - b.localPort;
  });
}

export class PortScanner {
  private deps: PortScannerDeps;

  constructor(deps: Partial<PortScannerDeps> = {}) {
    this.deps = { ...DEFAULT_DEPS, ...deps };
  }

  /**
   * Records from every source, deduplicated but not probed.
   */
  async collect(target: ScanTarget = {}): Promise<PortRecord[]> {
    const { remoteHost, dockerTarget } = target;
    const { logger } = this.deps;

    if (dockerTarget) {
      const records = await this.deps.collectFromContainer(dockerTarget, {
        remoteHost,
        logger
      });
      return sortRecords(records);
    }

    // SSH tunnels are always local processes
    const [local, docker, ssh] = await Promise.all([
      this.deps.collectLocal({ remoteHost, logger }),
      this.deps.collectDocker({ remoteHost, logger }),
      this.deps.collectSsh({ logger })
    ]);
    return dedupeLocal([...local, ...docker, ...ssh]);
  }

  /**
   * Full reconciliation: collect, probe, sort.
   */
  async scan(target: ScanTarget = {}): Promise<PortRecord[]> {
    const started = Date.now();
    const collected = await this.collect(target);

    // Container-interior listings come from LISTEN rows; nothing to probe
    const records = target.dockerTarget
      ? collected
      : sortRecords(
          await probeOpenPorts(
            collected,
            target.remoteHost !== undefined,
            this.deps.probe
          )
        );

    this.deps.logger.log("scan.completed", {
      remoteHost: target.remoteHost ?? null,
      dockerTarget: target.dockerTarget ?? null,
      counts: countBySource(records),
      open: records.filter((r) => r.isOpen).length,
      durationMs: Date.now() - started
    });
    return records;
  }
}

export function countBySource(
  records: PortRecord[]
): Record<PortSource, number> {
  const counts: Record<PortSource, number> = { local: 0, ssh: 0, docker: 0 };
  for (const r of records) counts[r.source] += 1;
  return counts;
}

/** Reconciled records using the real collectors */
export function collectAll(
  target: ScanTarget = {},
  logger: VerboseLogger = silentLogger
): Promise<PortRecord[]> {
  return new PortScanner({ logger }).scan(target);
}
