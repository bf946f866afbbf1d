import { DOCKER, type VerboseLogger } from "@berth/core";
import { describe, expect, test, vi } from "vitest";
import {
  collectDocker,
  collectFromContainer,
  collectLocal,
  collectSsh,
  extractPort,
  extractSshHost,
  getContainerIp,
  parseDockerPs,
  parseLsofFields,
  parseSshForwards,
  parseSsOutput
} from "../src/collectors";
import { ActionError } from "../src/errors";
import { CommandError, type CommandRunner } from "../src/exec";

function fakeLogger() {
  const log = vi.fn<VerboseLogger["log"]>();
  const logger: VerboseLogger = { log, flush: async () => {} };
  return { log, logger };
}

// =============================================================================
// LOCAL (lsof)
// =============================================================================

describe("parseLsofFields", () => {
  const output = [
    "p123",
    "cnode",
    "f21",
    "n*:3000",
    "n[::1]:3000",
    "p456",
    "cpostgres",
    "n127.0.0.1:5432",
    "p789",
    "cpython3",
    "n*:8000",
    ""
  ].join("\n");

  test("emits one record per port, sorted, first occurrence wins", () => {
    const records = parseLsofFields(output, false);
    expect(records.map((r) => [r.localPort, r.processName, r.pid])).toEqual([
      [3000, "node", 123],
      [5432, "postgres", 456],
      [8000, "python3", 789]
    ]);
    expect(records.every((r) => r.source === "local")).toBe(true);
    expect(records.every((r) => !r.isOpen && !r.isLoopback)).toBe(true);
  });

  test("remote listings are marked open", () => {
    const records = parseLsofFields(output, true);
    expect(records.every((r) => r.isOpen)).toBe(true);
  });

  test("skips addresses without a usable port", () => {
    const records = parseLsofFields("p1\ncfoo\nn*:0\nnlocalhost\nn*:http\n", false);
    expect(records).toEqual([]);
  });

  test("n lines before any p line have no pid", () => {
    const [record] = parseLsofFields("n*:4000\n", false);
    expect(record?.pid).toBeUndefined();
    expect(record?.processName).toBe("");
  });
});

describe("extractPort", () => {
  test("takes the segment after the last colon", () => {
    expect(extractPort("*:3000")).toBe(3000);
    expect(extractPort("127.0.0.1:8080")).toBe(8080);
    expect(extractPort("[::1]:8080")).toBe(8080);
  });

  test("rejects missing, zero and non-numeric ports", () => {
    expect(extractPort("localhost")).toBeNull();
    expect(extractPort("*:0")).toBeNull();
    expect(extractPort("*:http")).toBeNull();
  });
});

describe("collectLocal", () => {
  test("runs lsof through ssh for a remote host", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      code: 0,
      stdout: "p10\ncsshd\nn*:22\n",
      stderr: ""
    });

    const records = await collectLocal({ remoteHost: "box", run });

    expect(run).toHaveBeenCalledWith("ssh", [
      "box",
      "lsof -i -P -n -sTCP:LISTEN -Fcpn"
    ]);
    expect(records).toHaveLength(1);
    expect(records[0]?.isOpen).toBe(true);
  });

  test("a non-zero exit yields no records and is logged", async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockResolvedValue({ code: 1, stdout: "", stderr: "lsof: denied\n" });
    const { log, logger } = fakeLogger();

    expect(await collectLocal({ run, logger })).toEqual([]);
    expect(log).toHaveBeenCalledWith("collector.failed", {
      source: "local",
      code: 1,
      stderr: "lsof: denied"
    });
  });

  test("a missing binary yields no records", async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockRejectedValue(new CommandError("spawn lsof ENOENT", "lsof", "spawn"));
    const { log, logger } = fakeLogger();

    expect(await collectLocal({ run, logger })).toEqual([]);
    expect(log).toHaveBeenCalledWith("collector.failed", {
      source: "local",
      error: "spawn lsof ENOENT"
    });
  });
});

// =============================================================================
// SSH (ps aux)
// =============================================================================

const PS_PREFIX = "dev       4242  0.0  0.1  12345  6789 ?  Ss  10:00  0:00";

describe("parseSshForwards", () => {
  test("parses a local forward with its destination host", () => {
    const records = parseSshForwards(
      `${PS_PREFIX} ssh -N -L 9000:localhost:80 bastion\n`
    );
    expect(records).toEqual([
      {
        source: "ssh",
        localPort: 9000,
        remoteHost: "localhost",
        remotePort: 80,
        processName: "ssh",
        pid: 4242,
        sshHost: "bastion",
        isOpen: false,
        isLoopback: false
      }
    ]);
  });

  test("every forward on one line shares the host", () => {
    const records = parseSshForwards(
      `${PS_PREFIX} ssh -L 3000:db:5432 -L3001:cache:6379 jump`
    );
    expect(
      records.map((r) => [r.localPort, r.remoteHost, r.remotePort, r.sshHost])
    ).toEqual([
      [3000, "db", 5432, "jump"],
      [3001, "cache", 6379, "jump"]
    ]);
  });

  test("reverse forwards listen on the local end of the spec", () => {
    const [record] = parseSshForwards(
      `${PS_PREFIX} /usr/bin/ssh -f -N -R 8080:localhost:3000 edge`
    );
    expect(record).toMatchObject({
      localPort: 3000,
      remotePort: 8080,
      remoteHost: "(R) localhost:8080",
      processName: "ssh -R",
      sshHost: "edge"
    });
  });

  test("ignores lines without forwards or without ssh", () => {
    const output = [
      `${PS_PREFIX} ssh bastion`,
      `${PS_PREFIX} nginx -L 80:x:80`,
      `${PS_PREFIX} ssh -L 0:localhost:80 bastion`
    ].join("\n");
    expect(parseSshForwards(output)).toEqual([]);
  });
});

describe("extractSshHost", () => {
  test("returns the last plain token after ssh", () => {
    expect(extractSshHost("ssh -N -L 9000:localhost:80 bastion")).toBe(
      "bastion"
    );
    expect(extractSshHost("/usr/bin/ssh -f user@example.test")).toBe(
      "user@example.test"
    );
  });

  test("no host when the last token is a flag or a forward spec", () => {
    expect(extractSshHost("ssh -L 9000:localhost:80")).toBeUndefined();
    expect(extractSshHost("ssh bastion -N")).toBeUndefined();
    expect(extractSshHost("ssh")).toBeUndefined();
    expect(extractSshHost("autossh -M 0 bastion")).toBeUndefined();
  });
});

describe("collectSsh", () => {
  test("always reads the local process table", async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockResolvedValue({ code: 0, stdout: "", stderr: "" });

    await collectSsh({ remoteHost: "box", run });

    expect(run).toHaveBeenCalledWith("ps", ["aux"]);
  });
});

// =============================================================================
// DOCKER
// =============================================================================

describe("parseDockerPs", () => {
  test("parses published ports", () => {
    const records = parseDockerPs(
      "abc123def456\tpostgres\t0.0.0.0:5432->5432/tcp\n",
      false
    );
    expect(records).toEqual([
      {
        source: "docker",
        localPort: 5432,
        remoteHost: "postgres",
        remotePort: 5432,
        processName: "postgres",
        containerId: "abc123def456",
        containerName: "postgres",
        isOpen: false,
        isLoopback: false
      }
    ]);
  });

  test("expands port ranges", () => {
    const records = parseDockerPs(
      "abc\tweb\t0.0.0.0:3000-3001->3000-3001/tcp",
      false
    );
    expect(records.map((r) => [r.localPort, r.remotePort])).toEqual([
      [3000, 3000],
      [3001, 3001]
    ]);
  });

  test("uneven ranges expand to the shorter span", () => {
    const records = parseDockerPs(
      "abc\tweb\t0.0.0.0:3000-3002->4000-4001/tcp",
      true
    );
    expect(records.map((r) => [r.localPort, r.remotePort])).toEqual([
      [3000, 4000],
      [3001, 4001]
    ]);
    expect(records.every((r) => r.isOpen)).toBe(true);
  });

  test("IPv6 bindings and duplicates within a line", () => {
    expect(
      parseDockerPs("abc\tnginx\t:::8080->80/tcp", false).map((r) => [
        r.localPort,
        r.remotePort
      ])
    ).toEqual([[8080, 80]]);

    const dual = parseDockerPs(
      "abc\tdb\t0.0.0.0:5432->5432/tcp, :::5432->5432/tcp",
      false
    );
    expect(dual).toHaveLength(1);
  });

  test("skips short lines and unpublished ports", () => {
    const output = "abc\tonly-two\nabc\tredis\t6379/tcp\n";
    expect(parseDockerPs(output, false)).toEqual([]);
  });
});

describe("parseSsOutput", () => {
  const output = [
    "State  Recv-Q Send-Q Local Address:Port Peer Address:Port Process",
    "LISTEN 0      128    127.0.0.1:5432     0.0.0.0:*",
    'LISTEN 0      511    0.0.0.0:3000       0.0.0.0:*    users:(("node",pid=17,fd=20))',
    "LISTEN 0      511    [::]:3000          [::]:*",
    "LISTEN 0      128    [::1]:6379         [::]:*",
    "ESTAB  0      0      10.0.0.2:3000      10.0.0.9:51234"
  ].join("\n");

  test("keeps LISTEN rows, one per port", () => {
    const records = parseSsOutput(output, "app");
    expect(
      records.map((r) => [r.localPort, r.isLoopback, r.processName, r.pid])
    ).toEqual([
      [5432, true, "app", undefined],
      [3000, false, "node", 17],
      [6379, true, "app", undefined]
    ]);
  });

  test("records point back at the container and are open", () => {
    const [record] = parseSsOutput(output, "app");
    expect(record).toMatchObject({
      source: "docker",
      remoteHost: "app",
      remotePort: 5432,
      containerName: "app",
      isOpen: true
    });
    expect(record?.containerId).toBeUndefined();
  });
});

describe("docker commands", () => {
  test("docker ps runs through ssh with the format quoted", async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockResolvedValue({ code: 0, stdout: "", stderr: "" });

    await collectDocker({ remoteHost: "box", run });

    expect(run).toHaveBeenCalledWith("ssh", [
      "box",
      `docker ps --format '${DOCKER.PS_FORMAT}'`
    ]);
  });

  test("container listing failures resolve to an empty list", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      code: 1,
      stdout: "",
      stderr: "Error: No such container: app"
    });

    expect(await collectFromContainer("app", { run })).toEqual([]);
    expect(run).toHaveBeenCalledWith("docker", ["exec", "app", "ss", "-tlnp"]);
  });
});

describe("getContainerIp", () => {
  test("returns the first address", async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockResolvedValue({ code: 0, stdout: "172.18.0.5 172.19.0.3 \n", stderr: "" });

    expect(await getContainerIp("app", { run })).toBe("172.18.0.5");
    expect(run).toHaveBeenCalledWith("docker", [
      "inspect",
      "-f",
      DOCKER.IP_FORMAT,
      "app"
    ]);
  });

  test("rejects when the container has no address", async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockResolvedValue({ code: 0, stdout: " \n", stderr: "" });

    await expect(getContainerIp("app", { run })).rejects.toThrow(
      "Container 'app' has no IP address"
    );
  });

  test("rejects with the docker error on failure", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      code: 1,
      stdout: "",
      stderr: "Error: No such object: app\n"
    });

    const error = await getContainerIp("app", { run }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ActionError);
    expect(error).toHaveProperty(
      "message",
      "Failed to get container IP for 'app': Error: No such object: app"
    );
  });
});
