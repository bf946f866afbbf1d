import {
  type PortRecord,
  processDisplay,
  remoteDisplay,
  sourceLabel
} from "@berth/core";
import { Box, Text } from "ink";
import React from "react";
import { Popup } from "./Popup";

interface DetailsPopupProps {
  record: PortRecord | undefined;
  columns: number;
  rows: number;
}

function detailRows(record: PortRecord): Array<[string, string]> {
  const rows: Array<[string, string]> = [
    ["Type", sourceLabel(record.source)],
    ["Local", `:${record.localPort}`],
    ["Status", record.isOpen ? "open" : "closed"],
    ["Remote", remoteDisplay(record) || "-"],
    ["Process", processDisplay(record) || "-"]
  ];
  if (record.pid !== undefined) rows.push(["PID", String(record.pid)]);
  if (record.containerId) rows.push(["Container", record.containerId]);
  if (record.sshHost) rows.push(["SSH Host", record.sshHost]);
  if (record.isLoopback) rows.push(["Binding", "loopback only"]);
  return rows;
}

export function DetailsPopup({ record, columns, rows }: DetailsPopupProps) {
  const lines = record ? detailRows(record) : [];

  return (
    <Popup
      title="Port Details"
      footer="Esc/Enter/q to close"
      width={50}
      height={lines.length + 6}
      columns={columns}
      rows={rows}
    >
      {!record && <Text color="gray">No port selected</Text>}
      {lines.map(([label, value]) => (
        <Box key={label}>
          <Text color="yellow">{label.padEnd(11)}</Text>
          <Text>{value}</Text>
        </Box>
      ))}
    </Popup>
  );
}
