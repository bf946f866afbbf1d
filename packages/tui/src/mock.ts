/**
 * Sample records for `berth dev mock`: every source, open and closed.
 */

import type { PortRecord } from "@berth/core";

export function mockRecords(): PortRecord[] {
  return [
    local(3000, "node", 1234, true),
    local(8080, "python", 2345, true),
    local(4200, "ng", 3456, false),
    {
      source: "ssh",
      localPort: 9000,
      remoteHost: "db.internal",
      remotePort: 5432,
      processName: "ssh",
      pid: 4567,
      sshHost: "bastion",
      isOpen: true,
      isLoopback: false
    },
    {
      source: "ssh",
      localPort: 9090,
      remoteHost: "(R) localhost:9090",
      remotePort: 9090,
      processName: "ssh -R",
      pid: 5678,
      sshHost: "bastion",
      isOpen: false,
      isLoopback: false
    },
    docker(5432, "postgres", "abc123def456", true),
    docker(6379, "redis", "def456abc789", true),
    docker(27017, "mongo", "789abc123def", false)
  ];
}

function local(
  localPort: number,
  processName: string,
  pid: number,
  isOpen: boolean
): PortRecord {
  return {
    source: "local",
    localPort,
    processName,
    pid,
    isOpen,
    isLoopback: false
  };
}

function docker(
  localPort: number,
  containerName: string,
  containerId: string,
  isOpen: boolean
): PortRecord {
  return {
    source: "docker",
    localPort,
    remoteHost: containerName,
    remotePort: localPort,
    processName: containerName,
    containerId,
    containerName,
    isOpen,
    isLoopback: false
  };
}
