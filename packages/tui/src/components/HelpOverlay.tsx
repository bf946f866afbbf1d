import { Box, Text } from "ink";
import React from "react";

interface HelpOverlayProps {
  columns: number;
  rows: number;
}

const HELP_CONTENT = [
  ["Navigation", ""],
  ["j/↓", "Move down"],
  ["k/↑", "Move up"],
  ["g", "Jump to top"],
  ["G", "Jump to bottom"],
  ["Enter", "Port details"],
  ["", ""],
  ["Filters", ""],
  ["0-3", "All/Local/SSH/Docker"],
  ["/", "Search"],
  ["", ""],
  ["Actions", ""],
  ["f", "New SSH forward"],
  ["F", "Quick forward (remote)"],
  ["K", "Kill selected"],
  ["p", "Presets"],
  ["r", "Refresh"],
  ["a", "Toggle auto-refresh"],
  ["", ""],
  ["Connections", ""],
  ["c", "Manage connections"],
  ["h/l", "Previous/next"],
  ["", ""],
  ["?", "Toggle help"],
  ["q", "Quit"]
];

export function HelpOverlay({ columns, rows }: HelpOverlayProps) {
  const boxWidth = 40;
  const boxHeight = HELP_CONTENT.length + 4;
  const startCol = Math.max(0, Math.floor((columns - boxWidth) / 2));
  const startRow = Math.max(0, Math.floor((rows - boxHeight) / 2));

  return (
    <Box
      position="absolute"
      marginTop={startRow}
      marginLeft={startCol}
      flexDirection="column"
      width={boxWidth}
      borderStyle="round"
      borderColor="cyan"
    >
      <Box justifyContent="center" paddingY={1}>
        <Text bold color="cyan">
          Keyboard Shortcuts
        </Text>
      </Box>

      {HELP_CONTENT.map((item, idx) => {
        const key = item[0] ?? "";
        const desc = item[1] ?? "";

        if (key === "" && desc === "") {
          return <Box key={idx} height={1} />;
        }

        if (desc === "") {
          return (
            <Box key={idx} paddingX={2}>
              <Text bold color="white">
                {key}
              </Text>
            </Box>
          );
        }

        return (
          <Box key={idx} paddingX={2}>
            <Text color="yellow">{key.padEnd(8)}</Text>
            <Text color="gray">{desc}</Text>
          </Box>
        );
      })}

      <Box justifyContent="center" paddingY={1}>
        <Text color="gray">Press ? or q to close</Text>
      </Box>
    </Box>
  );
}
