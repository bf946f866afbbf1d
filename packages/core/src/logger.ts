/**
 * Verbose JSONL logger.
 *
 * The TUI owns the terminal, so diagnostics go to
 * ~/.berth/logs/<service>.jsonl instead of stdout.
 */

import { appendJsonl } from "./storage/jsonl-store";
import { logFilePath } from "./storage/paths";

export const LOG_SCHEMA_VERSION = "v1" as const;

export type VerboseLogEntry = {
  schema_version: typeof LOG_SCHEMA_VERSION;
  id: string;
  timestamp: string;
  source: string;
  kind: string;
  payload: Record<string, unknown>;
};

export type VerboseLogger = {
  log: (kind: string, payload?: Record<string, unknown>) => void;
  /** Resolves once every write issued so far has settled */
  flush: () => Promise<void>;
};

export function createId(prefix = "id"): string {
  const rand = Math.random().toString(36).slice(2, 10);
  return `${prefix}_${Date.now().toString(36)}_${rand}`;
}

export function createVerboseLogger(options: {
  service: string;
  logPath?: string;
}): VerboseLogger {
  const logPath = options.logPath ?? logFilePath(options.service);
  let pending: Promise<void> = Promise.resolve();
  let reported = false;

  return {
    log(kind, payload = {}) {
      const entry: VerboseLogEntry = {
        schema_version: LOG_SCHEMA_VERSION,
        id: createId("log"),
        timestamp: new Date().toISOString(),
        source: options.service,
        kind,
        payload
      };
      // Writes are chained so entries land in call order
      pending = pending
        .then(() => appendJsonl(logPath, entry))
        .catch((e: unknown) => {
          if (process.env.DEBUG && !reported) {
            reported = true;
            console.error("berth: log write failed:", e);
          }
        });
    },
    flush() {
      return pending;
    }
  };
}

/** Logger used when verbose logging is off */
export const silentLogger: VerboseLogger = {
  log() {},
  flush: () => Promise.resolve()
};

/**
 * Verbose logging is on when BERTH_VERBOSE=1 or the config asks for it.
 */
export function resolveLogger(
  service: string,
  verbose: boolean,
  env: NodeJS.ProcessEnv = process.env
): VerboseLogger {
  if (verbose || env["BERTH_VERBOSE"] === "1") {
    return createVerboseLogger({ service });
  }
  return silentLogger;
}

/** Message text of an unknown thrown value */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
