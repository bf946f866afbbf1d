import { Box, Text } from "ink";
import React from "react";

interface HeaderProps {
  connectionName: string;
  remoteHost?: string;
  dockerTarget?: string;
  containerIp?: string;
  openCount: number;
  totalCount: number;
  autoRefresh: boolean;
  refreshSeconds: number;
  mock: boolean;
}

export function Header({
  connectionName,
  remoteHost,
  dockerTarget,
  containerIp,
  openCount,
  totalCount,
  autoRefresh,
  refreshSeconds,
  mock
}: HeaderProps) {
  const target = [remoteHost, dockerTarget && `docker:${dockerTarget}`]
    .filter(Boolean)
    .join(" ");

  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1}>
      <Box flexGrow={1}>
        <Text bold color="cyan">
          berth
        </Text>
        <Text color="gray"> │ </Text>
        <Text color="magenta">{connectionName}</Text>
        {target.length > 0 && <Text color="gray"> ({target})</Text>}
        {Boolean(containerIp) && <Text color="gray"> {containerIp}</Text>}
        <Text color="gray"> │ </Text>
        <Text>
          <Text color="green">{openCount}</Text>
          <Text color="gray">/{totalCount} open</Text>
        </Text>
        {autoRefresh && (
          <>
            <Text color="gray"> │ </Text>
            <Text color="yellow">auto {refreshSeconds}s</Text>
          </>
        )}
        {mock && (
          <>
            <Text color="gray"> │ </Text>
            <Text color="yellow" bold>
              MOCK
            </Text>
          </>
        )}
      </Box>
      <Text color="gray">?=help q=quit</Text>
    </Box>
  );
}
