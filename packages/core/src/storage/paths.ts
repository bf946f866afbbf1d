/**
 * Centralized storage paths for berth.
 *
 * All persistent data locations are defined here so users can see
 * where configuration and logs live.
 */

import { homedir } from "os";
import { join } from "path";
import { expandPath } from "./file-utils";

// =============================================================================
// BASE DIRECTORIES
// =============================================================================

/** Runtime data directory (verbose logs) */
export const DATA_DIR = "~/.berth";

/** Verbose JSONL logs, one file per service */
export const LOG_DIR = `${DATA_DIR}/logs`;

/**
 * Configuration directory.
 * BERTH_CONFIG_DIR wins, then $XDG_CONFIG_HOME/berth, then ~/.config/berth.
 */
export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env["BERTH_CONFIG_DIR"];
  if (override) return expandPath(override);
  const xdg = env["XDG_CONFIG_HOME"];
  if (xdg) return join(xdg, "berth");
  return join(homedir(), ".config", "berth");
}

// =============================================================================
// CONFIGURATION FILES
// =============================================================================

export const CONFIG_FILE_NAME = "config.toml";
export const PRESETS_FILE_NAME = "presets.toml";
export const CONNECTIONS_FILE_NAME = "connections.toml";

export function configFilePath(env?: NodeJS.ProcessEnv): string {
  return join(configDir(env), CONFIG_FILE_NAME);
}

export function presetsFilePath(env?: NodeJS.ProcessEnv): string {
  return join(configDir(env), PRESETS_FILE_NAME);
}

export function connectionsFilePath(env?: NodeJS.ProcessEnv): string {
  return join(configDir(env), CONNECTIONS_FILE_NAME);
}

/** Verbose log file for a service, e.g. ~/.berth/logs/tui.jsonl */
export function logFilePath(service: string): string {
  return join(expandPath(LOG_DIR), `${service}.jsonl`);
}
