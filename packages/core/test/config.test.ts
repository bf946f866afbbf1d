/**
 * Config Tests
 *
 * Parsing of config.toml, presets.toml and connections.toml, and
 * config directory resolution.
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  defaultConfig,
  loadConfig,
  loadConnections,
  parseConfig,
  parseConnections,
  parsePresets,
  refreshTicks,
  saveConnections
} from "../src/config";
import { configDir, connectionsFilePath } from "../src/storage/paths";
import { withLocalConnection } from "../src/types/connections";

describe("Config Default Values", () => {
  it("has auto-refresh off and a 5 second interval", () => {
    const config = defaultConfig();
    expect(config.general.autoRefresh).toBe(false);
    expect(config.general.refreshInterval).toBe(5);
    expect(config.general.defaultFilter).toBe("all");
    expect(config.general.remoteHost).toBeUndefined();
    expect(config.general.dockerTarget).toBeUndefined();
    expect(config.general.verbose).toBe(false);
    expect(config.ui.mouseEnabled).toBe(false);
  });

  it("converts the interval to ticks", () => {
    expect(refreshTicks(defaultConfig())).toBe(20);
  });
});

describe("Config TOML Parsing", () => {
  it("parses a full config", () => {
    const config = parseConfig(`
[general]
auto_refresh = true
refresh_interval = 10
default_filter = "local"

[ui]
mouse_enabled = true
`);
    expect(config.general.autoRefresh).toBe(true);
    expect(config.general.refreshInterval).toBe(10);
    expect(config.general.defaultFilter).toBe("local");
    expect(config.ui.mouseEnabled).toBe(true);
    expect(refreshTicks(config)).toBe(40);
  });

  it("fills missing fields from defaults", () => {
    const config = parseConfig("[general]\nauto_refresh = true\n");
    expect(config.general.autoRefresh).toBe(true);
    expect(config.general.refreshInterval).toBe(5);
    expect(config.general.remoteHost).toBeUndefined();
    expect(config.ui.mouseEnabled).toBe(false);
  });

  it("reads remote host and docker target", () => {
    const config = parseConfig(`
[general]
remote_host = "ailab"
docker_target = "web-dev"
`);
    expect(config.general.remoteHost).toBe("ailab");
    expect(config.general.dockerTarget).toBe("web-dev");
  });

  it("treats an unknown filter as all", () => {
    const config = parseConfig('[general]\ndefault_filter = "udp"\n');
    expect(config.general.defaultFilter).toBe("all");
  });

  it("falls back to defaults on invalid TOML", () => {
    expect(parseConfig("[general\nauto_refresh = ")).toEqual(defaultConfig());
  });

  it("falls back to defaults on invalid values", () => {
    expect(parseConfig("[general]\nrefresh_interval = -3\n")).toEqual(
      defaultConfig()
    );
  });
});

describe("Presets", () => {
  it("parses preset tables", () => {
    const presets = parsePresets(`
[[preset]]
name = "Production DB"
key = "1"
local_port = 5432
remote_host = "localhost"
remote_port = 5432
ssh_host = "prod-bastion"

[[preset]]
name = "Staging Redis"
local_port = 6379
remote_host = "localhost"
remote_port = 6379
ssh_host = "staging-bastion"
`);
    expect(presets).toHaveLength(2);
    expect(presets[0]).toEqual({
      name: "Production DB",
      key: "1",
      localPort: 5432,
      remoteHost: "localhost",
      remotePort: 5432,
      sshHost: "prod-bastion"
    });
    expect(presets[1]?.key).toBeUndefined();
  });

  it("drops entries with invalid ports", () => {
    const presets = parsePresets(`
[[preset]]
name = "Bad"
local_port = 70000
remote_host = "localhost"
remote_port = 80
ssh_host = "h"
`);
    expect(presets).toEqual([]);
  });

  it("returns nothing for empty content", () => {
    expect(parsePresets("")).toEqual([]);
  });
});

describe("Connections", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "berth-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("parses connection tables", () => {
    const connections = parseConnections(`
[[connection]]
name = "Production"
remote_host = "user@prod-server"

[[connection]]
name = "Lab + Docker"
remote_host = "ailab"
docker_target = "web-dev"
`);
    expect(connections).toEqual([
      { name: "Production", remoteHost: "user@prod-server", dockerTarget: undefined },
      { name: "Lab + Docker", remoteHost: "ailab", dockerTarget: "web-dev" }
    ]);
  });

  it("skips connections without a name", () => {
    expect(parseConnections('[[connection]]\nname = "  "\n')).toEqual([]);
  });

  it("always puts Local first", () => {
    const all = withLocalConnection([{ name: "Production", remoteHost: "prod" }]);
    expect(all.map((c) => c.name)).toEqual(["Local", "Production"]);
    expect(withLocalConnection([])).toEqual([{ name: "Local" }]);
  });

  it("saves and loads connections", () => {
    const path = join(dir, "nested", "connections.toml");
    saveConnections(
      [
        { name: "Test", remoteHost: "host" },
        { name: "Box", remoteHost: "lab", dockerTarget: "api" }
      ],
      path
    );
    expect(loadConnections(path)).toEqual([
      { name: "Test", remoteHost: "host", dockerTarget: undefined },
      { name: "Box", remoteHost: "lab", dockerTarget: "api" }
    ]);
  });

  it("loads defaults when the config file is missing", () => {
    expect(loadConfig(join(dir, "missing.toml"))).toEqual(defaultConfig());
  });

  it("loads a config file from disk", () => {
    const path = join(dir, "config.toml");
    writeFileSync(path, "[general]\nrefresh_interval = 2\n");
    expect(refreshTicks(loadConfig(path))).toBe(8);
  });
});

describe("Config Paths", () => {
  it("prefers BERTH_CONFIG_DIR", () => {
    expect(configDir({ BERTH_CONFIG_DIR: "/tmp/berth-test" })).toBe(
      "/tmp/berth-test"
    );
  });

  it("expands ~ in BERTH_CONFIG_DIR", () => {
    expect(configDir({ BERTH_CONFIG_DIR: "~/berth" })).toBe(
      join(homedir(), "berth")
    );
  });

  it("uses XDG_CONFIG_HOME when set", () => {
    expect(configDir({ XDG_CONFIG_HOME: "/xdg" })).toBe("/xdg/berth");
  });

  it("defaults to ~/.config/berth", () => {
    expect(connectionsFilePath({})).toBe(
      join(homedir(), ".config", "berth", "connections.toml")
    );
  });
});
