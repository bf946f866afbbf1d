import { Box, useApp, useInput, useStdout } from "ink";
import React, { useEffect, useMemo, useState } from "react";
import { UI } from "@berth/core";
import { ConnectionsPopup } from "./components/ConnectionsPopup";
import { DetailsPopup } from "./components/DetailsPopup";
import { FilterBar } from "./components/FilterBar";
import { ForwardPopup } from "./components/ForwardPopup";
import { Header } from "./components/Header";
import { HelpOverlay } from "./components/HelpOverlay";
import { PortsTable } from "./components/PortsTable";
import { PresetsPopup } from "./components/PresetsPopup";
import { StatusBar } from "./components/StatusBar";
import type { Dispatcher } from "./dispatcher";
import {
  type SessionState,
  activeConnection,
  selectedRecord
} from "./state/session";
import type { SessionStore } from "./store";

interface AppProps {
  store: SessionStore;
  dispatcher: Dispatcher;
}

function useTerminalSize(): { columns: number; rows: number } {
  const { stdout } = useStdout();
  const [size, setSize] = useState({
    columns: stdout.columns || 80,
    rows: stdout.rows || 24
  });

  useEffect(() => {
    const onResize = () =>
      setSize({ columns: stdout.columns || 80, rows: stdout.rows || 24 });
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  return size;
}

export function App({ store, dispatcher }: AppProps) {
  const { exit } = useApp();
  const { columns, rows } = useTerminalSize();
  const [state, setState] = useState<SessionState>(store.get());

  useEffect(() => store.subscribe(setState), [store]);

  useEffect(() => {
    const timer = setInterval(() => {
      void dispatcher.tick();
    }, UI.TICK_MS);
    return () => clearInterval(timer);
  }, [dispatcher]);

  useEffect(() => {
    if (state.shouldQuit) exit();
  }, [state.shouldQuit, exit]);

  useInput((input, key) => {
    void dispatcher.press(input, key);
  });

  const openCount = useMemo(
    () => state.records.filter((r) => r.isOpen).length,
    [state.records]
  );

  // Header (3) + filter bar (1) + status bar (2)
  const tableHeight = Math.max(3, rows - 6);

  return (
    <Box flexDirection="column" width={columns} height={rows}>
      <Header
        connectionName={activeConnection(state)?.name ?? "Local"}
        remoteHost={state.remoteHost}
        dockerTarget={state.dockerTarget}
        containerIp={state.containerIp}
        openCount={openCount}
        totalCount={state.records.length}
        autoRefresh={state.autoRefresh}
        refreshSeconds={state.refreshTicks / UI.TICKS_PER_SECOND}
        mock={state.mock}
      />
      <FilterBar
        filter={state.filter}
        records={state.records}
        searchQuery={state.searchQuery}
        inputMode={state.inputMode}
      />
      <PortsTable
        records={state.view}
        selection={state.selected}
        height={tableHeight}
      />
      <StatusBar
        message={state.status?.message ?? null}
        inputMode={state.inputMode}
        hasConnections={state.connections.length > 1}
      />

      {state.popup === "help" && <HelpOverlay columns={columns} rows={rows} />}
      {state.popup === "details" && (
        <DetailsPopup
          record={selectedRecord(state)}
          columns={columns}
          rows={rows}
        />
      )}
      {state.popup === "forward" && (
        <ForwardPopup draft={state.forward} columns={columns} rows={rows} />
      )}
      {state.popup === "presets" && (
        <PresetsPopup
          presets={state.presets}
          selected={state.presetSelected}
          columns={columns}
          rows={rows}
        />
      )}
      {state.popup === "connections" && (
        <ConnectionsPopup
          connections={state.connections}
          active={state.activeConnection}
          selected={state.connectionSelected}
          mode={state.connectionPopupMode}
          draft={state.connectionDraft}
          columns={columns}
          rows={rows}
        />
      )}
    </Box>
  );
}
