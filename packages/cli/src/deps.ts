/**
 * Everything the commands touch outside the process, gathered so tests
 * can swap in fakes.
 */

import {
  type BerthConfig,
  type Connection,
  type Preset,
  type VerboseLogger,
  loadConfig,
  loadConnections,
  loadPresets,
  resolveLogger
} from "@berth/core";
import {
  PortScanner,
  createForward,
  killByPid,
  killByPort,
  probePort
} from "@berth/monitor";
import { runTui } from "@berth/tui";

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CliDeps {
  output: CliOutput;
  setExitCode(code: number): void;
  loadConfig(): BerthConfig;
  loadPresets(): Preset[];
  loadConnections(): Connection[];
  logger(service: string, verbose: boolean): VerboseLogger;
  scanner(logger: VerboseLogger): Pick<PortScanner, "scan" | "collect">;
  killByPid: typeof killByPid;
  killByPort: typeof killByPort;
  createForward: typeof createForward;
  probePort: typeof probePort;
  runTui: typeof runTui;
}

export const defaultDeps: CliDeps = {
  output: {
    log: (line) => console.log(line),
    error: (line) => console.error(line)
  },
  setExitCode(code) {
    process.exitCode = code;
  },
  loadConfig: () => loadConfig(),
  loadPresets: () => loadPresets(),
  loadConnections: () => loadConnections(),
  logger: (service, verbose) => resolveLogger(service, verbose),
  scanner: (logger) => new PortScanner({ logger }),
  killByPid,
  killByPort,
  createForward,
  probePort,
  runTui
};
