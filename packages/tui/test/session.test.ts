import { type PortRecord, parseConfig } from "@berth/core";
import { describe, expect, test } from "vitest";
import {
  activateConnection,
  addConnection,
  closePopup,
  createSession,
  cycleConnection,
  openPopup,
  removeConnection,
  savedConnections,
  selectLast,
  selectNext,
  selectPrevious,
  selectedRecord,
  setFilter,
  setRecords,
  setSearchQuery,
  setStatus,
  shouldRefresh,
  tick,
  toggleAutoRefresh
} from "../src/state/session";

function port(
  source: PortRecord["source"],
  localPort: number,
  processName: string,
  remoteHost?: string
): PortRecord {
  return {
    source,
    localPort,
    processName,
    remoteHost,
    isOpen: true,
    isLoopback: false
  };
}

const RECORDS = [
  port("local", 3000, "node"),
  port("local", 8080, "python"),
  port("ssh", 9000, "ssh", "db.internal"),
  port("docker", 5432, "postgres", "postgres")
];

// =============================================================================
// VIEW
// =============================================================================

describe("view", () => {
  test("filters by source", () => {
    const state = setFilter(setRecords(createSession(), RECORDS), "local");
    expect(state.view.map((r) => r.localPort)).toEqual([3000, 8080]);
  });

  test("searches process, port and remote host case-insensitively", () => {
    const base = setRecords(createSession(), RECORDS);
    expect(setSearchQuery(base, "PYTH").view.map((r) => r.localPort)).toEqual([
      8080
    ]);
    expect(setSearchQuery(base, "543").view.map((r) => r.localPort)).toEqual([
      5432
    ]);
    expect(setSearchQuery(base, "db.int").view.map((r) => r.localPort)).toEqual(
      [9000]
    );
  });

  test("clamps the cursor when the view shrinks", () => {
    const state = selectLast(setRecords(createSession(), RECORDS));
    expect(state.selected).toBe(3);
    const filtered = setFilter(state, "local");
    expect(filtered.selected).toBe(1);
    expect(selectedRecord(filtered)?.localPort).toBe(8080);
  });

  test("an empty view selects nothing", () => {
    const state = setSearchQuery(setRecords(createSession(), RECORDS), "zzz");
    expect(state.selected).toBe(0);
    expect(selectedRecord(state)).toBeUndefined();
  });

  test("navigation wraps around", () => {
    const state = setRecords(createSession(), RECORDS);
    expect(selectPrevious(state).selected).toBe(3);
    expect(selectNext(selectLast(state)).selected).toBe(0);
  });
});

// =============================================================================
// STATUS AND TICKS
// =============================================================================

describe("status and ticks", () => {
  test("a status message expires after twelve ticks", () => {
    let state = setStatus(createSession(), "Refreshed");
    for (let i = 0; i < 11; i++) state = tick(state);
    expect(state.status?.message).toBe("Refreshed");
    state = tick(state);
    expect(state.status).toBeNull();
  });

  test("mock sessions prefix status messages", () => {
    const state = setStatus(createSession({ mock: true }), "Loaded mock data");
    expect(state.status?.message).toBe("[mock] Loaded mock data");
  });

  test("refresh comes due every refresh_interval seconds", () => {
    const config = parseConfig(
      "[general]\nauto_refresh = true\nrefresh_interval = 2\n"
    );
    let state = createSession({ config });
    expect(state.refreshTicks).toBe(8);

    const due: number[] = [];
    for (let i = 0; i < 16; i++) {
      state = tick(state);
      if (shouldRefresh(state)) due.push(state.tickCount);
    }
    expect(due).toEqual([8, 16]);
  });

  test("refresh never comes due in mock mode", () => {
    const config = parseConfig("[general]\nauto_refresh = true\n");
    const state = createSession({ config, mock: true });
    expect(state.autoRefresh).toBe(false);
    expect(shouldRefresh({ ...state, autoRefresh: true, tickCount: 20 })).toBe(
      false
    );
  });

  test("toggling auto-refresh reports the new state", () => {
    const on = toggleAutoRefresh(createSession());
    expect(on.autoRefresh).toBe(true);
    expect(on.status?.message).toBe("Auto-refresh ON");
    expect(toggleAutoRefresh(on).status?.message).toBe("Auto-refresh OFF");
  });
});

// =============================================================================
// POPUPS
// =============================================================================

describe("popups", () => {
  test("the forward popup is pre-filled from the selection", () => {
    const state = openPopup(setRecords(createSession(), RECORDS), "forward");
    expect(state.popup).toBe("forward");
    expect(state.forward.localPort).toBe("3000");
  });

  test("closing resets the drafts", () => {
    const open = openPopup(setRecords(createSession(), RECORDS), "forward");
    const closed = closePopup(open);
    expect(closed.popup).toBe("none");
    expect(closed.forward.localPort).toBe("");
  });
});

// =============================================================================
// CONNECTIONS
// =============================================================================

describe("connections", () => {
  const saved = [
    { name: "prod", remoteHost: "user@prod" },
    { name: "web", remoteHost: "user@prod", dockerTarget: "web" }
  ];

  test("Local is always first", () => {
    const state = createSession({ connections: saved });
    expect(state.connections.map((c) => c.name)).toEqual([
      "Local",
      "prod",
      "web"
    ]);
    expect(savedConnections(state)).toEqual(saved);
  });

  test("activating a connection takes over its target", () => {
    const state = activateConnection(
      { ...createSession({ connections: saved }), containerIp: "172.17.0.9" },
      2
    );
    expect(state.remoteHost).toBe("user@prod");
    expect(state.dockerTarget).toBe("web");
    expect(state.containerIp).toBeUndefined();
  });

  test("cycling wraps back to Local", () => {
    const state = cycleConnection(
      activateConnection(createSession({ connections: saved }), 2),
      1
    );
    expect(state.activeConnection).toBe(0);
    expect(state.remoteHost).toBeUndefined();
  });

  test("adding selects the new connection", () => {
    const state = addConnection(createSession(), { name: "lab" });
    expect(state.connections).toHaveLength(2);
    expect(state.connectionSelected).toBe(1);
  });

  test("Local cannot be removed", () => {
    const state = createSession({ connections: saved });
    expect(removeConnection(state, 0)).toBe(state);
  });

  test("removing the active connection falls back to Local", () => {
    const state = removeConnection(
      activateConnection(createSession({ connections: saved }), 1),
      1
    );
    expect(state.connections.map((c) => c.name)).toEqual(["Local", "web"]);
    expect(state.activeConnection).toBe(0);
    expect(state.remoteHost).toBeUndefined();
  });

  test("removing an earlier connection keeps the active one", () => {
    const state = removeConnection(
      activateConnection(createSession({ connections: saved }), 2),
      1
    );
    expect(state.activeConnection).toBe(1);
    expect(state.connections[state.activeConnection]?.name).toBe("web");
  });
});
