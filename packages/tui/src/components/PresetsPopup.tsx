import type { Preset } from "@berth/core";
import { Box, Text } from "ink";
import React from "react";
import { Popup } from "./Popup";

interface PresetsPopupProps {
  presets: Preset[];
  selected: number;
  columns: number;
  rows: number;
}

export function PresetsPopup({
  presets,
  selected,
  columns,
  rows
}: PresetsPopupProps) {
  return (
    <Popup
      title="Forward Presets"
      footer="j/k:Move  Enter:Launch  Esc:Close"
      width={60}
      height={Math.max(1, presets.length) + 6}
      columns={columns}
      rows={rows}
    >
      {presets.length === 0 && (
        <Text color="gray">No presets in presets.toml</Text>
      )}
      {presets.map((preset, idx) => (
        <Box key={`${preset.name}:${idx}`}>
          <Text inverse={idx === selected}>
            <Text color="yellow">{`[${preset.key ?? " "}] `}</Text>
            <Text>{preset.name.padEnd(18)}</Text>
            <Text color="gray">
              {`:${preset.localPort} -> ${preset.remoteHost}:${preset.remotePort} via ${preset.sshHost}`}
            </Text>
          </Text>
        </Box>
      ))}
    </Popup>
  );
}
