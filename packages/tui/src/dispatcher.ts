/**
 * Action dispatcher: applies key actions and ticks to the session,
 * running kills, forwards and re-collection along the way.
 *
 * Actions run one at a time in arrival order. A tick that comes due for
 * auto-refresh while something is still running skips the refresh.
 */

import {
  type PortRecord,
  SSH,
  UI,
  type VerboseLogger,
  errorMessage,
  parsePort,
  silentLogger
} from "@berth/core";
import { type ForwardRequest, forwardSpec, sortRecords } from "@berth/monitor";
import type { Action } from "./actions";
import { type KeyPress, keyToAction } from "./keys";
import type { PortService } from "./service";
import {
  backspaceConnection,
  cycleConnectionField,
  toConnection,
  typeIntoConnection
} from "./state/connection-draft";
import {
  backspace,
  invalidFieldNames,
  moveField,
  toSpec,
  typeInto
} from "./state/forward-draft";
import {
  type SessionState,
  activateConnection,
  activeConnection,
  addConnection,
  closePopup,
  connectionNext,
  connectionPrevious,
  cycleConnection,
  openPopup,
  presetNext,
  presetPrevious,
  removeConnection,
  savedConnections,
  selectFirst,
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
} from "./state/session";
import type { SessionStore } from "./store";

type Transition = (state: SessionState) => SessionState;

/** Actions that only change session state */
export function transitionFor(action: Action): Transition | null {
  switch (action.type) {
    case "quit":
      return (s) => ({ ...s, shouldQuit: true });
    case "next":
      return selectNext;
    case "previous":
      return selectPrevious;
    case "first":
      return selectFirst;
    case "last":
      return selectLast;
    case "enterSearch":
      return (s) => ({ ...s, inputMode: "search" });
    case "exitSearch":
      return (s) => ({ ...s, inputMode: "normal" });
    case "searchInput": {
      const { text } = action;
      return (s) => setSearchQuery(s, s.searchQuery + text);
    }
    case "searchBackspace":
      return (s) => setSearchQuery(s, s.searchQuery.slice(0, -1));
    case "filter": {
      const { filter } = action;
      return (s) => setFilter(s, filter);
    }
    case "toggleAutoRefresh":
      return (s) => (s.mock ? s : toggleAutoRefresh(s));
    case "details":
      return (s) => openPopup(s, "details");
    case "help":
      return (s) => openPopup(s, "help");
    case "closePopup":
      return closePopup;
    case "startForward":
      return (s) => openPopup(s, "forward");
    case "forwardField": {
      const { direction } = action;
      return (s) => ({ ...s, forward: moveField(s.forward, direction) });
    }
    case "forwardInput": {
      const { text } = action;
      return (s) => ({ ...s, forward: typeInto(s.forward, text) });
    }
    case "forwardBackspace":
      return (s) => ({ ...s, forward: backspace(s.forward) });
    case "showPresets":
      return (s) => openPopup(s, "presets");
    case "presetNext":
      return presetNext;
    case "presetPrevious":
      return presetPrevious;
    case "showConnections":
      return (s) => openPopup(s, "connections");
    case "connectionNext":
      return connectionNext;
    case "connectionPrevious":
      return connectionPrevious;
    case "startAddConnection":
      return (s) => ({ ...s, connectionPopupMode: "add" });
    case "cancelAddConnection":
      return (s) => ({
        ...closePopup(s),
        popup: "connections"
      });
    case "connectionField": {
      const { direction } = action;
      return (s) => ({
        ...s,
        connectionDraft: cycleConnectionField(s.connectionDraft, direction)
      });
    }
    case "connectionInput": {
      const { text } = action;
      return (s) => ({
        ...s,
        connectionDraft: typeIntoConnection(s.connectionDraft, text)
      });
    }
    case "connectionBackspace":
      return (s) => ({
        ...s,
        connectionDraft: backspaceConnection(s.connectionDraft)
      });
    default:
      return null;
  }
}

/** Synthetic tunnel shown after a forward in mock mode */
function mockForwardRecord(
  localPort: number,
  remoteHost: string,
  remotePort: number | undefined,
  sshHost: string
): PortRecord {
  return {
    source: "ssh",
    localPort,
    remoteHost,
    remotePort,
    processName: "ssh",
    pid: UI.MOCK_PID,
    sshHost,
    isOpen: true,
    isLoopback: false
  };
}

export class Dispatcher {
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(
    private store: SessionStore,
    private service: PortService,
    private logger: VerboseLogger = silentLogger
  ) {}

  get busy(): boolean {
    return this.pending > 0;
  }

  /** Queue an action; resolves once it (and everything before it) is done */
  dispatch(action: Action): Promise<void> {
    return this.enqueue(action.type, () => this.handle(action));
  }

  /**
   * Queue a raw key press. The binding is looked up when the press reaches
   * the front of the queue, so keys typed during a slow action see the
   * mode that action left behind.
   */
  press(input: string, key: KeyPress): Promise<void> {
    return this.enqueue("key", async () => {
      const action = keyToAction(this.store.get(), input, key);
      if (action) await this.handle(action);
    });
  }

  /** One 250ms tick: status timer, tick count and auto-refresh */
  tick(): Promise<void> {
    this.store.update(tick);
    if (!shouldRefresh(this.store.get()) || this.busy) {
      return Promise.resolve();
    }
    return this.enqueue("autoRefresh", async () => {
      try {
        await this.reload();
      } catch (e) {
        this.status(`Auto-refresh failed: ${errorMessage(e)}`);
      }
    });
  }

  /**
   * First load. Mock sessions take the given records instead of
   * collecting.
   */
  initialize(mockRecords: PortRecord[] = []): Promise<void> {
    return this.enqueue("initialize", async () => {
      if (this.store.get().mock) {
        this.store.update((s) => setRecords(s, sortRecords(mockRecords)));
        this.status("Loaded mock data");
        return;
      }

      const ipError = await this.resolveContainerIp();
      try {
        const records = await this.reload();
        if (ipError) this.status(ipError);
        else if (records.length === 0) this.status("No listening ports found");
      } catch (e) {
        this.status(`Load failed: ${errorMessage(e)}`);
      }
    });
  }

  private enqueue(name: string, job: () => Promise<void>): Promise<void> {
    this.pending += 1;
    const run = this.queue.then(job).finally(() => {
      this.pending -= 1;
    });
    this.queue = run.catch((e: unknown) => {
      this.logger.log("dispatch.failed", {
        action: name,
        error: errorMessage(e)
      });
    });
    return this.queue;
  }

  private status(message: string): void {
    this.store.update((s) => setStatus(s, message));
  }

  private async handle(action: Action): Promise<void> {
    const transition = transitionFor(action);
    if (transition) {
      this.store.update(transition);
      return;
    }

    switch (action.type) {
      case "refresh":
        return this.refresh();
      case "kill":
        return this.kill();
      case "submitForward":
        return this.submitForward();
      case "quickForward":
        return this.quickForward();
      case "launchPreset":
        return this.launchPreset(action.index);
      case "switchConnection":
        return this.switchConnection(action.direction);
      case "activateConnection":
        return this.activateSelectedConnection();
      case "saveConnection":
        return this.saveConnection();
      case "deleteConnection":
        return this.deleteConnection();
      default:
        return;
    }
  }

  // ===========================================================================
  // COLLECTION
  // ===========================================================================

  private async reload(): Promise<PortRecord[]> {
    const { remoteHost, dockerTarget } = this.store.get();
    const records = await this.service.scan({ remoteHost, dockerTarget });
    this.store.update((s) => setRecords(s, records));
    return records;
  }

  /** Re-collect after a side effect; a failure here only gets logged */
  private async reloadAfterAction(): Promise<void> {
    try {
      await this.reload();
    } catch (e) {
      this.logger.log("scan.failed", { error: errorMessage(e) });
    }
  }

  private async refresh(): Promise<void> {
    if (this.store.get().mock) return;
    try {
      const records = await this.reload();
      this.status(records.length > 0 ? "Refreshed" : "No listening ports found");
    } catch (e) {
      this.status(`Refresh failed: ${errorMessage(e)}`);
    }
  }

  /** Resolve the Docker target's IP; returns an error message on failure */
  private async resolveContainerIp(): Promise<string | null> {
    const { dockerTarget, remoteHost } = this.store.get();
    if (!dockerTarget) return null;
    try {
      const containerIp = await this.service.containerIp(
        dockerTarget,
        remoteHost
      );
      this.store.update((s) => ({ ...s, containerIp }));
      return null;
    } catch (e) {
      return `Container IP lookup failed: ${errorMessage(e)}`;
    }
  }

  // ===========================================================================
  // KILL
  // ===========================================================================

  private async kill(): Promise<void> {
    const state = this.store.get();
    const record = selectedRecord(state);
    if (!record) return;
    const port = record.localPort;

    if (state.mock) {
      this.store.update((s) =>
        setRecords(s, s.records.filter((r) => r.localPort !== port))
      );
      this.status(`Removed port ${port}`);
      return;
    }

    if (state.dockerTarget && record.pid === undefined) {
      this.status("No PID available for this port");
      return;
    }

    try {
      const message = await this.service.kill(record, {
        remoteHost: state.remoteHost,
        dockerTarget: state.dockerTarget
      });
      this.logger.log("kill.succeeded", {
        port,
        source: record.source,
        pid: record.pid ?? null
      });
      this.status(message);
      await this.reloadAfterAction();
    } catch (e) {
      this.logger.log("kill.failed", { port, error: errorMessage(e) });
      this.status(`Kill failed: ${errorMessage(e)}`);
    }
  }

  // ===========================================================================
  // FORWARDS
  // ===========================================================================

  private async startForward(
    request: ForwardRequest,
    success: (pid: number) => string
  ): Promise<void> {
    try {
      const pid = await this.service.forward(request);
      this.logger.log("forward.created", { ...request, pid });
      this.status(success(pid));
      await this.reloadAfterAction();
    } catch (e) {
      this.logger.log("forward.failed", { ...request, error: errorMessage(e) });
      this.status(`Forward failed: ${errorMessage(e)}`);
    }
  }

  private insertMockRecord(record: PortRecord): void {
    this.store.update((s) => setRecords(s, sortRecords([...s.records, record])));
  }

  private async submitForward(): Promise<void> {
    const draft = this.store.get().forward;
    const request = toSpec(draft);
    if (!request) {
      this.status(`Invalid fields: ${invalidFieldNames(draft).join(", ")}`);
      return;
    }

    this.store.update(closePopup);

    if (this.store.get().mock) {
      const localPort = parsePort(draft.localPort) ?? 0;
      this.insertMockRecord(
        mockForwardRecord(
          localPort,
          draft.remoteHost,
          parsePort(draft.remotePort) ?? undefined,
          draft.sshHost
        )
      );
      this.status("Forward created");
      return;
    }

    await this.startForward(request, (pid) => `Forward created (PID: ${pid})`);
  }

  private async quickForward(): Promise<void> {
    const state = this.store.get();
    const record = selectedRecord(state);
    if (!record) return;

    const host = state.remoteHost;
    if (!host) {
      this.status("Quick Forward requires a remote connection");
      return;
    }

    let target: string = SSH.DEFAULT_REMOTE_HOST;
    if (state.dockerTarget) {
      if (!state.containerIp) {
        this.status("Container IP not available");
        return;
      }
      target = state.containerIp;
    }

    const port = record.localPort;
    const label = `Forward :${port} -> ${host}:${port}`;

    if (state.mock) {
      this.insertMockRecord(mockForwardRecord(port, target, port, host));
      this.status(label);
      return;
    }

    await this.startForward(
      { spec: forwardSpec(port, target, port), host },
      (pid) => `${label} (PID: ${pid})`
    );
  }

  private async launchPreset(index: number | undefined): Promise<void> {
    const state = this.store.get();
    const preset = state.presets[index ?? state.presetSelected];
    this.store.update(closePopup);
    if (!preset) return;

    if (state.mock) {
      this.insertMockRecord(
        mockForwardRecord(
          preset.localPort,
          preset.remoteHost,
          preset.remotePort,
          preset.sshHost
        )
      );
      this.status("Forward created");
      return;
    }

    await this.startForward(
      {
        spec: forwardSpec(preset.localPort, preset.remoteHost, preset.remotePort),
        host: preset.sshHost
      },
      (pid) => `Forward created (PID: ${pid})`
    );
  }

  // ===========================================================================
  // CONNECTIONS
  // ===========================================================================

  private async applyConnection(transition: Transition): Promise<void> {
    this.store.update(transition);
    const state = this.store.get();
    const name = activeConnection(state)?.name ?? "";
    this.logger.log("connection.switched", {
      name,
      remoteHost: state.remoteHost ?? null,
      dockerTarget: state.dockerTarget ?? null
    });

    if (state.mock) {
      this.status(`Connection: ${name}`);
      return;
    }

    const ipError = await this.resolveContainerIp();
    try {
      await this.reload();
      this.status(ipError ?? `Connection: ${name}`);
    } catch (e) {
      this.status(`Refresh failed: ${errorMessage(e)}`);
    }
  }

  private async switchConnection(direction: 1 | -1): Promise<void> {
    if (this.store.get().connections.length <= 1) return;
    await this.applyConnection((s) => cycleConnection(s, direction));
  }

  private async activateSelectedConnection(): Promise<void> {
    const index = this.store.get().connectionSelected;
    this.store.update(closePopup);
    await this.applyConnection((s) => activateConnection(s, index));
  }

  /** Write the connection list `next` would hold; the store is left alone */
  private async persistConnections(next: SessionState): Promise<boolean> {
    if (next.mock) return true;
    try {
      await this.service.saveConnections(savedConnections(next));
      return true;
    } catch (e) {
      this.logger.log("connections.save_failed", { error: errorMessage(e) });
      this.status(`Save failed: ${errorMessage(e)}`);
      return false;
    }
  }

  private async saveConnection(): Promise<void> {
    const connection = toConnection(this.store.get().connectionDraft);
    if (!connection) {
      this.status("Connection name is required");
      return;
    }
    const next = addConnection(this.store.get(), connection);
    if (!(await this.persistConnections(next))) return;
    this.store.update((s) => addConnection(s, connection));
    this.status(`Connection added: ${connection.name}`);
  }

  private async deleteConnection(): Promise<void> {
    const state = this.store.get();
    const index = state.connectionSelected;
    const connection = state.connections[index];
    if (index === 0 || !connection) {
      this.status("Cannot delete the Local connection");
      return;
    }

    const wasActive = index === state.activeConnection;
    if (!(await this.persistConnections(removeConnection(state, index)))) {
      return;
    }
    this.store.update((s) => removeConnection(s, index));
    this.status(`Connection deleted: ${connection.name}`);

    // The session fell back to Local; collect for it
    if (wasActive) await this.applyConnection((s) => s);
  }
}
