import {
  type PortRecord,
  processDisplay,
  remoteDisplay,
  sourceLabel
} from "@berth/core";
import { Box, Text } from "ink";
import React from "react";

interface PortsTableProps {
  records: PortRecord[];
  selection: number;
  height: number;
}

const SOURCE_COLORS: Record<PortRecord["source"], string> = {
  local: "white",
  ssh: "blue",
  docker: "magenta"
};

function truncate(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 1)}…` : value;
}

export function PortsTable({ records, selection, height }: PortsTableProps) {
  // Keep the cursor roughly centred in the visible window
  const visibleRows = Math.max(1, height - 2);
  const scrollOffset = Math.max(
    0,
    Math.min(
      selection - Math.floor(visibleRows / 2),
      records.length - visibleRows
    )
  );
  const visibleSlice = records.slice(scrollOffset, scrollOffset + visibleRows);

  return (
    <Box flexDirection="column" height={height}>
      <Box paddingX={1}>
        <Text color="cyan" bold>
          {"TYPE".padEnd(8)}
          {"OPEN".padEnd(6)}
          {"LOCAL".padEnd(8)}
          {"REMOTE".padEnd(26)}
          PROCESS
        </Text>
      </Box>

      <Box flexDirection="column" flexGrow={1}>
        {records.length === 0 && (
          <Box paddingX={1}>
            <Text color="gray">No listening ports</Text>
          </Box>
        )}

        {visibleSlice.map((record, idx) => {
          const actualIndex = scrollOffset + idx;
          const isSelected = actualIndex === selection;

          return (
            <Box
              key={`${record.source}:${record.localPort}:${actualIndex}`}
              paddingX={1}
            >
              <Text inverse={isSelected}>
                <Text color={SOURCE_COLORS[record.source]}>
                  {sourceLabel(record.source).padEnd(8)}
                </Text>
                <Text color={record.isOpen ? "green" : "gray"}>
                  {(record.isOpen ? "●" : "○").padEnd(6)}
                </Text>
                <Text>{`:${record.localPort}`.padEnd(8)}</Text>
                <Text color="gray">
                  {truncate(remoteDisplay(record), 25).padEnd(26)}
                </Text>
                <Text>{processDisplay(record)}</Text>
                {record.isLoopback && <Text color="yellow"> [loopback]</Text>}
              </Text>
            </Box>
          );
        })}
      </Box>

      <Box paddingX={1} justifyContent="space-between">
        <Text color="gray">
          Listening: <Text color="cyan">{records.length}</Text>
          {" | "}
          Open: <Text color="green">{records.filter((r) => r.isOpen).length}</Text>
        </Text>
        {records.length > visibleRows && (
          <Text color="gray">
            {Math.floor((selection / Math.max(1, records.length - 1)) * 100)}%
          </Text>
        )}
      </Box>
    </Box>
  );
}
