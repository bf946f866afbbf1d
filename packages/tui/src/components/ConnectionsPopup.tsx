import type { Connection } from "@berth/core";
import { Box, Text } from "ink";
import React from "react";
import {
  CONNECTION_FIELDS,
  CONNECTION_FIELD_LABELS,
  type ConnectionDraft
} from "../state/connection-draft";
import { Popup } from "./Popup";

interface ConnectionsPopupProps {
  connections: Connection[];
  active: number;
  selected: number;
  mode: "list" | "add";
  draft: ConnectionDraft;
  columns: number;
  rows: number;
}

function describe(connection: Connection): string {
  const parts = [
    connection.remoteHost && `ssh:${connection.remoteHost}`,
    connection.dockerTarget && `docker:${connection.dockerTarget}`
  ].filter(Boolean);
  return parts.length > 0 ? parts.join(" ") : "this machine";
}

export function ConnectionsPopup({
  connections,
  active,
  selected,
  mode,
  draft,
  columns,
  rows
}: ConnectionsPopupProps) {
  if (mode === "add") {
    return (
      <Popup
        title="Add Connection"
        footer="Tab:Next  Enter:Save  Esc:Back"
        width={50}
        height={CONNECTION_FIELDS.length + 6}
        columns={columns}
        rows={rows}
      >
        {CONNECTION_FIELDS.map((field) => {
          const isActive = draft.activeField === field;
          return (
            <Box key={field}>
              <Text color={isActive ? "cyan" : "gray"}>
                {isActive ? "▸ " : "  "}
                {CONNECTION_FIELD_LABELS[field].padEnd(15)}
              </Text>
              <Text>{draft[field]}</Text>
              {isActive && <Text inverse> </Text>}
            </Box>
          );
        })}
      </Popup>
    );
  }

  return (
    <Popup
      title="Connections"
      footer="Enter:Use  a:Add  d:Delete  Esc:Close"
      width={56}
      height={connections.length + 6}
      columns={columns}
      rows={rows}
    >
      {connections.map((connection, idx) => (
        <Box key={`${connection.name}:${idx}`}>
          <Text inverse={idx === selected}>
            <Text color="green">{idx === active ? "● " : "  "}</Text>
            <Text>{connection.name.padEnd(18)}</Text>
            <Text color="gray">{describe(connection)}</Text>
          </Text>
        </Box>
      ))}
    </Popup>
  );
}
