/**
 * Configuration files: config.toml, presets.toml and connections.toml.
 *
 * Every loader falls back to defaults when the file is missing, is not
 * valid TOML, or fails validation.
 */

import { existsSync, readFileSync } from "fs";
import { parse, stringify } from "smol-toml";
import { z } from "zod";
import { UI } from "./constants";
import { writeFileAtomic } from "./storage/file-utils";
import {
  configFilePath,
  connectionsFilePath,
  presetsFilePath
} from "./storage/paths";
import type { Connection, Preset } from "./types/connections";

export type FilterName = "all" | "local" | "ssh" | "docker";

export const FILTER_NAMES: readonly FilterName[] = [
  "all",
  "local",
  "ssh",
  "docker"
];

export interface BerthConfig {
  general: {
    autoRefresh: boolean;
    /** Seconds between automatic refreshes */
    refreshInterval: number;
    defaultFilter: FilterName;
    remoteHost?: string;
    dockerTarget?: string;
    verbose: boolean;
  };
  ui: {
    mouseEnabled: boolean;
  };
}

const optionalHost = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const ConfigSchema = z.object({
  general: z
    .object({
      auto_refresh: z.boolean().default(false),
      refresh_interval: z.number().int().positive().default(5),
      default_filter: z.string().default("all"),
      remote_host: optionalHost,
      docker_target: optionalHost,
      verbose: z.boolean().default(false)
    })
    .default({}),
  ui: z
    .object({
      mouse_enabled: z.boolean().default(false)
    })
    .default({})
});

const portNumber = z.number().int().min(1).max(65535);

const PresetSchema = z.object({
  name: z.string().min(1),
  key: z.string().optional(),
  local_port: portNumber,
  remote_host: z.string().min(1),
  remote_port: portNumber,
  ssh_host: z.string().min(1)
});

const ConnectionSchema = z.object({
  name: z.string().trim().min(1),
  remote_host: optionalHost,
  docker_target: optionalHost
});

function toFilterName(value: string): FilterName {
  const lowered = value.toLowerCase();
  return FILTER_NAMES.find((f) => f === lowered) ?? "all";
}

export function defaultConfig(): BerthConfig {
  return parseConfig("");
}

/**
 * Parse config.toml content. Invalid TOML or values fall back to defaults.
 */
export function parseConfig(content: string): BerthConfig {
  const result = ConfigSchema.safeParse(parseTomlOrEmpty(content));
  const data = result.success ? result.data : ConfigSchema.parse({});

  return {
    general: {
      autoRefresh: data.general.auto_refresh,
      refreshInterval: data.general.refresh_interval,
      defaultFilter: toFilterName(data.general.default_filter),
      remoteHost: data.general.remote_host,
      dockerTarget: data.general.docker_target,
      verbose: data.general.verbose
    },
    ui: {
      mouseEnabled: data.ui.mouse_enabled
    }
  };
}

export function loadConfig(path: string = configFilePath()): BerthConfig {
  return parseConfig(readIfExists(path));
}

/** Auto-refresh period in ticks; never less than one */
export function refreshTicks(config: BerthConfig): number {
  return Math.max(1, config.general.refreshInterval * UI.TICKS_PER_SECOND);
}

/** Parse presets.toml content; entries that fail validation are dropped. */
export function parsePresets(content: string): Preset[] {
  const table = parseTomlOrEmpty(content);
  const entries = Array.isArray(table["preset"]) ? table["preset"] : [];

  const presets: Preset[] = [];
  for (const entry of entries) {
    const result = PresetSchema.safeParse(entry);
    if (!result.success) continue;
    const p = result.data;
    presets.push({
      name: p.name,
      key: p.key,
      localPort: p.local_port,
      remoteHost: p.remote_host,
      remotePort: p.remote_port,
      sshHost: p.ssh_host
    });
  }
  return presets;
}

export function loadPresets(path: string = presetsFilePath()): Preset[] {
  return parsePresets(readIfExists(path));
}

/** Parse connections.toml content (without the implicit Local entry). */
export function parseConnections(content: string): Connection[] {
  const table = parseTomlOrEmpty(content);
  const entries = Array.isArray(table["connection"])
    ? table["connection"]
    : [];

  const connections: Connection[] = [];
  for (const entry of entries) {
    const result = ConnectionSchema.safeParse(entry);
    if (!result.success) continue;
    connections.push({
      name: result.data.name,
      remoteHost: result.data.remote_host,
      dockerTarget: result.data.docker_target
    });
  }
  return connections;
}

export function loadConnections(
  path: string = connectionsFilePath()
): Connection[] {
  return parseConnections(readIfExists(path));
}

export function serializeConnections(connections: Connection[]): string {
  return stringify({
    connection: connections.map((c) => {
      const row: Record<string, string> = { name: c.name };
      if (c.remoteHost) row["remote_host"] = c.remoteHost;
      if (c.dockerTarget) row["docker_target"] = c.dockerTarget;
      return row;
    })
  });
}

/** Persist user-defined connections. The Local entry must not be passed. */
export function saveConnections(
  connections: Connection[],
  path: string = connectionsFilePath()
): void {
  writeFileAtomic(path, serializeConnections(connections));
}

function readIfExists(path: string): string {
  if (!existsSync(path)) return "";
  try {
    return readFileSync(path, "utf-8");
  } catch {
    return "";
  }
}

function parseTomlOrEmpty(content: string): Record<string, unknown> {
  if (!content.trim()) return {};
  try {
    return parse(content);
  } catch {
    return {};
  }
}
