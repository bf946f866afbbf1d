/**
 * Session state: everything the dashboard shows, and the pure transitions
 * the dispatcher applies to it. Every function returns a new state.
 */

import {
  type BerthConfig,
  type Connection,
  type FilterName,
  type PortRecord,
  type Preset,
  UI,
  defaultConfig,
  refreshTicks,
  withLocalConnection
} from "@berth/core";
import {
  type ConnectionDraft,
  emptyConnectionDraft
} from "./connection-draft";
import {
  type ForwardDraft,
  emptyForwardDraft,
  forwardDraftFor
} from "./forward-draft";

export type InputMode = "normal" | "search";

export type Popup =
  | "none"
  | "details"
  | "help"
  | "forward"
  | "presets"
  | "connections";

export interface StatusMessage {
  message: string;
  ticksLeft: number;
}

export interface SessionState {
  /** Every record from the last reconciliation */
  records: PortRecord[];
  /** Records passing the filter and search, in display order */
  view: PortRecord[];
  /** Cursor into `view` */
  selected: number;
  filter: FilterName;
  searchQuery: string;
  inputMode: InputMode;
  popup: Popup;
  forward: ForwardDraft;

  /** Index 0 is always Local */
  connections: Connection[];
  activeConnection: number;
  connectionSelected: number;
  connectionDraft: ConnectionDraft;
  connectionPopupMode: "list" | "add";

  presets: Preset[];
  presetSelected: number;

  remoteHost?: string;
  dockerTarget?: string;
  containerIp?: string;

  status: StatusMessage | null;
  tickCount: number;
  autoRefresh: boolean;
  refreshTicks: number;
  mock: boolean;
  shouldQuit: boolean;
}

export interface SessionOptions {
  config?: BerthConfig;
  presets?: Preset[];
  /** Saved connections, without Local */
  connections?: Connection[];
  remoteHost?: string;
  dockerTarget?: string;
  mock?: boolean;
}

export function createSession(options: SessionOptions = {}): SessionState {
  const config = options.config ?? defaultConfig();
  const mock = options.mock ?? false;

  return {
    records: [],
    view: [],
    selected: 0,
    filter: config.general.defaultFilter,
    searchQuery: "",
    inputMode: "normal",
    popup: "none",
    forward: emptyForwardDraft(),
    connections: withLocalConnection(options.connections ?? []),
    activeConnection: 0,
    connectionSelected: 0,
    connectionDraft: emptyConnectionDraft(),
    connectionPopupMode: "list",
    presets: options.presets ?? [],
    presetSelected: 0,
    remoteHost: options.remoteHost,
    dockerTarget: options.dockerTarget,
    containerIp: undefined,
    status: null,
    tickCount: 0,
    autoRefresh: mock ? false : config.general.autoRefresh,
    refreshTicks: options.config ? refreshTicks(config) : UI.DEFAULT_REFRESH_TICKS,
    mock,
    shouldQuit: false
  };
}

// =============================================================================
// VIEW
// =============================================================================

function matchesFilter(record: PortRecord, filter: FilterName): boolean {
  return filter === "all" || record.source === filter;
}

function matchesSearch(record: PortRecord, query: string): boolean {
  if (!query) return true;
  const q = query.toLowerCase();
  return (
    record.processName.toLowerCase().includes(q) ||
    String(record.localPort).includes(q) ||
    (record.remoteHost?.toLowerCase().includes(q) ?? false)
  );
}

/** Recompute the view and clamp the cursor into it */
export function applyView(state: SessionState): SessionState {
  const view = state.records.filter(
    (r) => matchesFilter(r, state.filter) && matchesSearch(r, state.searchQuery)
  );
  const selected = Math.min(state.selected, Math.max(0, view.length - 1));
  return { ...state, view, selected };
}

export function setRecords(
  state: SessionState,
  records: PortRecord[]
): SessionState {
  return applyView({ ...state, records });
}

export function setFilter(state: SessionState, filter: FilterName): SessionState {
  return applyView({ ...state, filter });
}

export function setSearchQuery(
  state: SessionState,
  searchQuery: string
): SessionState {
  return applyView({ ...state, searchQuery });
}

export function selectedRecord(state: SessionState): PortRecord | undefined {
  return state.view[state.selected];
}

// =============================================================================
// NAVIGATION
// =============================================================================

function wrap(index: number, length: number): number {
  return length === 0 ? 0 : (index + length) % length;
}

export function selectNext(state: SessionState): SessionState {
  return { ...state, selected: wrap(state.selected + 1, state.view.length) };
}

export function selectPrevious(state: SessionState): SessionState {
  return { ...state, selected: wrap(state.selected - 1, state.view.length) };
}

export function selectFirst(state: SessionState): SessionState {
  return { ...state, selected: 0 };
}

export function selectLast(state: SessionState): SessionState {
  return { ...state, selected: Math.max(0, state.view.length - 1) };
}

export function presetNext(state: SessionState): SessionState {
  return {
    ...state,
    presetSelected: wrap(state.presetSelected + 1, state.presets.length)
  };
}

export function presetPrevious(state: SessionState): SessionState {
  return {
    ...state,
    presetSelected: wrap(state.presetSelected - 1, state.presets.length)
  };
}

export function connectionNext(state: SessionState): SessionState {
  return {
    ...state,
    connectionSelected: wrap(
      state.connectionSelected + 1,
      state.connections.length
    )
  };
}

export function connectionPrevious(state: SessionState): SessionState {
  return {
    ...state,
    connectionSelected: wrap(
      state.connectionSelected - 1,
      state.connections.length
    )
  };
}

// =============================================================================
// STATUS AND TICKS
// =============================================================================

export function setStatus(state: SessionState, message: string): SessionState {
  const text = state.mock ? `[mock] ${message}` : message;
  return { ...state, status: { message: text, ticksLeft: UI.STATUS_TICKS } };
}

export function tick(state: SessionState): SessionState {
  let status = state.status;
  if (status) {
    const ticksLeft = status.ticksLeft - 1;
    status = ticksLeft > 0 ? { ...status, ticksLeft } : null;
  }
  return { ...state, tickCount: state.tickCount + 1, status };
}

export function shouldRefresh(state: SessionState): boolean {
  return (
    state.autoRefresh &&
    !state.mock &&
    state.tickCount > 0 &&
    state.tickCount % state.refreshTicks === 0
  );
}

export function toggleAutoRefresh(state: SessionState): SessionState {
  const autoRefresh = !state.autoRefresh;
  return setStatus(
    { ...state, autoRefresh },
    autoRefresh ? "Auto-refresh ON" : "Auto-refresh OFF"
  );
}

// =============================================================================
// POPUPS
// =============================================================================

export function openPopup(state: SessionState, popup: Popup): SessionState {
  switch (popup) {
    case "forward":
      return {
        ...state,
        popup,
        forward: forwardDraftFor(selectedRecord(state), {
          remoteHost: state.remoteHost,
          dockerTarget: state.dockerTarget,
          containerIp: state.containerIp
        })
      };
    case "presets":
      return { ...state, popup, presetSelected: 0 };
    case "connections":
      return {
        ...state,
        popup,
        connectionSelected: state.activeConnection,
        connectionPopupMode: "list",
        connectionDraft: emptyConnectionDraft()
      };
    default:
      return { ...state, popup };
  }
}

/** Close any popup; drafts reset with it */
export function closePopup(state: SessionState): SessionState {
  return {
    ...state,
    popup: "none",
    forward: emptyForwardDraft(),
    connectionDraft: emptyConnectionDraft(),
    connectionPopupMode: "list"
  };
}

// =============================================================================
// CONNECTIONS
// =============================================================================

export function activeConnection(state: SessionState): Connection | undefined {
  return state.connections[state.activeConnection];
}

/**
 * Make a connection active and take over its scan target. The container
 * IP belongs to the previous target and is cleared.
 */
export function activateConnection(
  state: SessionState,
  index: number
): SessionState {
  const connection = state.connections[index];
  if (!connection) return state;
  return {
    ...state,
    activeConnection: index,
    remoteHost: connection.remoteHost,
    dockerTarget: connection.dockerTarget,
    containerIp: undefined
  };
}

export function cycleConnection(
  state: SessionState,
  direction: 1 | -1
): SessionState {
  return activateConnection(
    state,
    wrap(state.activeConnection + direction, state.connections.length)
  );
}

export function addConnection(
  state: SessionState,
  connection: Connection
): SessionState {
  const connections = [...state.connections, connection];
  return {
    ...state,
    connections,
    connectionSelected: connections.length - 1,
    connectionPopupMode: "list",
    connectionDraft: emptyConnectionDraft()
  };
}

/**
 * Remove a saved connection. Local (index 0) stays. Removing the active
 * connection falls back to Local.
 */
export function removeConnection(
  state: SessionState,
  index: number
): SessionState {
  if (index <= 0 || index >= state.connections.length) return state;

  const connections = state.connections.filter((_, i) => i !== index);
  let next: SessionState = {
    ...state,
    connections,
    connectionSelected: Math.min(state.connectionSelected, connections.length - 1)
  };

  if (state.activeConnection === index) {
    next = activateConnection(next, 0);
  } else if (state.activeConnection > index) {
    next = { ...next, activeConnection: state.activeConnection - 1 };
  }
  return next;
}

/** Connections as stored on disk: everything but Local */
export function savedConnections(state: SessionState): Connection[] {
  return state.connections.slice(1);
}
