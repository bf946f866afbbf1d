import { Box, Text } from "ink";
import React from "react";

interface PopupProps {
  title: string;
  footer: string;
  width: number;
  columns: number;
  rows: number;
  height: number;
  children: React.ReactNode;
}

/** Centred bordered frame shared by every popup */
export function Popup({
  title,
  footer,
  width,
  columns,
  rows,
  height,
  children
}: PopupProps) {
  const startCol = Math.max(0, Math.floor((columns - width) / 2));
  const startRow = Math.max(0, Math.floor((rows - height) / 2));

  return (
    <Box
      position="absolute"
      marginTop={startRow}
      marginLeft={startCol}
      flexDirection="column"
      width={width}
      borderStyle="round"
      borderColor="cyan"
      paddingX={1}
    >
      <Box justifyContent="center" marginBottom={1}>
        <Text bold color="cyan">
          {title}
        </Text>
      </Box>
      {children}
      <Box justifyContent="center" marginTop={1}>
        <Text color="gray">{footer}</Text>
      </Box>
    </Box>
  );
}
