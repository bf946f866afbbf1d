/**
 * Centralized constants for berth.
 *
 * These values are defaults that can be overridden via configuration.
 * Organized by category for easy discovery and modification.
 */

// =============================================================================
// PORT DISCOVERY
// =============================================================================

export const PORT_SCANNER = {
  /** Per-port TCP connect timeout when probing liveness (ms) */
  PROBE_TIMEOUT_MS: 200,
  /** Host probed for liveness */
  PROBE_HOST: "127.0.0.1",
  /** Timeout for collector commands (lsof, ps, docker, ssh) (ms) */
  COMMAND_TIMEOUT_MS: 5000,
  /** Max bytes captured from a collector command */
  MAX_BUFFER_BYTES: 10 * 1024 * 1024
} as const;

// =============================================================================
// SSH
// =============================================================================

export const SSH = {
  /** Default forward destination when none is known */
  DEFAULT_REMOTE_HOST: "localhost",
  /** Prefix on remote_host for reverse (-R) forwards */
  REVERSE_TAG: "(R)"
} as const;

// =============================================================================
// DOCKER
// =============================================================================

export const DOCKER = {
  /** `docker ps` format: id, name and port mappings separated by tabs */
  PS_FORMAT: "{{.ID}}\t{{.Names}}\t{{.Ports}}",
  /** `docker inspect` format that prints the container's private IPs */
  IP_FORMAT: "{{range .NetworkSettings.Networks}}{{.IPAddress}} {{end}}",
  /** Characters of the container id shown in tables */
  SHORT_ID_LENGTH: 8
} as const;

// =============================================================================
// TUI
// =============================================================================

export const UI = {
  /** Event poll / tick interval (ms) */
  TICK_MS: 250,
  /** Ticks a status message stays visible (~3s) */
  STATUS_TICKS: 12,
  /** Ticks per second of refresh_interval */
  TICKS_PER_SECOND: 4,
  /** Default refresh period (ticks) when no config is present */
  DEFAULT_REFRESH_TICKS: 20,
  /** PID shown for forwards created in mock mode */
  MOCK_PID: 99999
} as const;
