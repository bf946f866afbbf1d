import type { FilterName, PortRecord } from "@berth/core";
import { Box, Text } from "ink";
import React from "react";
import type { InputMode } from "../state/session";

interface FilterBarProps {
  filter: FilterName;
  records: PortRecord[];
  searchQuery: string;
  inputMode: InputMode;
}

const TABS: Array<{ key: string; filter: FilterName; label: string }> = [
  { key: "0", filter: "all", label: "All" },
  { key: "1", filter: "local", label: "Local" },
  { key: "2", filter: "ssh", label: "SSH" },
  { key: "3", filter: "docker", label: "Docker" }
];

function countFor(records: PortRecord[], filter: FilterName): number {
  if (filter === "all") return records.length;
  return records.filter((r) => r.source === filter).length;
}

export function FilterBar({
  filter,
  records,
  searchQuery,
  inputMode
}: FilterBarProps) {
  const searching = inputMode === "search";

  return (
    <Box paddingX={1} justifyContent="space-between">
      <Box>
        {TABS.map((tab) => {
          const active = tab.filter === filter;
          return (
            <Box key={tab.key} marginRight={2}>
              <Text color={active ? "cyan" : "gray"} bold={active}>
                [{tab.key}] {tab.label} ({countFor(records, tab.filter)})
              </Text>
            </Box>
          );
        })}
      </Box>
      {(searching || searchQuery.length > 0) && (
        <Text color={searching ? "yellow" : "gray"}>
          /{searchQuery}
          {searching && <Text inverse> </Text>}
        </Text>
      )}
    </Box>
  );
}
