import { Box, Text } from "ink";
import React from "react";
import type { InputMode } from "../state/session";

interface StatusBarProps {
  message: string | null;
  inputMode: InputMode;
  hasConnections: boolean;
}

export function StatusBar({
  message,
  inputMode,
  hasConnections
}: StatusBarProps) {
  return (
    <Box
      paddingX={1}
      borderStyle="single"
      borderColor="gray"
      borderTop
      borderBottom={false}
      borderLeft={false}
      borderRight={false}
    >
      <Box flexGrow={1}>
        {message ? (
          <Text color="yellow">{message}</Text>
        ) : inputMode === "search" ? (
          <Text color="gray">Type to search · Enter/Esc: done</Text>
        ) : (
          <Text color="gray">
            j/k:Move /:Search f:Forward F:Quick K:Kill p:Presets c:Connections
            {hasConnections ? " h/l:Switch" : ""} r:Refresh a:Auto ?:Help
            q:Quit
          </Text>
        )}
      </Box>
    </Box>
  );
}
