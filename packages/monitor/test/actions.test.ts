import type { PortRecord } from "@berth/core";
import { describe, expect, test, vi } from "vitest";
import {
  createForward,
  forwardSpec,
  killByPort,
  killRecord
} from "../src/actions";
import { ActionError } from "../src/errors";
import type { CommandRunner, DetachedSpawner } from "../src/exec";

function record(overrides: Partial<PortRecord>): PortRecord {
  return {
    source: "local",
    localPort: 3000,
    processName: "node",
    isOpen: true,
    isLoopback: false,
    ...overrides
  };
}

function okRunner() {
  return vi
    .fn<CommandRunner>()
    .mockResolvedValue({ code: 0, stdout: "", stderr: "" });
}

describe("killRecord", () => {
  test("kills a local process by pid", async () => {
    const run = okRunner();
    const message = await killRecord(record({ pid: 42 }), { run });
    expect(run).toHaveBeenCalledWith("kill", ["42"]);
    expect(message).toBe("Killed process on port 3000");
  });

  test("kills a remote local process through ssh", async () => {
    const run = okRunner();
    await killRecord(record({ pid: 42 }), { remoteHost: "box", run });
    expect(run).toHaveBeenCalledWith("ssh", ["box", "kill 42"]);
  });

  test("SSH tunnels are killed locally even in remote mode", async () => {
    const run = okRunner();
    await killRecord(record({ source: "ssh", localPort: 9000, pid: 77 }), {
      remoteHost: "box",
      run
    });
    expect(run).toHaveBeenCalledWith("kill", ["77"]);
  });

  test("stops the container behind a Docker record", async () => {
    const run = okRunner();
    const message = await killRecord(
      record({
        source: "docker",
        localPort: 5432,
        containerId: "abc123def456",
        containerName: "postgres"
      }),
      { run }
    );
    expect(run).toHaveBeenCalledWith("docker", ["stop", "abc123def456"]);
    expect(message).toBe("Stopped container postgres");
  });

  test("kills inside the target container", async () => {
    const run = okRunner();
    const message = await killRecord(record({ source: "docker", pid: 17 }), {
      dockerTarget: "app",
      remoteHost: "box",
      run
    });
    expect(run).toHaveBeenCalledWith("ssh", ["box", "docker exec app kill 17"]);
    expect(message).toBe("Killed PID 17 in container");
  });

  test("container records without a pid cannot be killed", async () => {
    const run = okRunner();
    await expect(
      killRecord(record({ source: "docker" }), { dockerTarget: "app", run })
    ).rejects.toThrow("No PID available for this port");
    expect(run).not.toHaveBeenCalled();
  });

  test("missing pid and container id are errors", async () => {
    const run = okRunner();
    await expect(killRecord(record({}), { run })).rejects.toThrow(
      "No PID found for port 3000"
    );
    await expect(
      killRecord(record({ source: "docker", localPort: 8080 }), { run })
    ).rejects.toThrow("No container ID found for port 8080");
  });

  test("a failing kill rejects with the command's error output", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      code: 1,
      stdout: "",
      stderr: "kill: (42) - No such process\n"
    });
    const error = await killRecord(record({ pid: 42 }), { run }).catch(
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(ActionError);
    expect(error).toHaveProperty(
      "message",
      "kill exited with 1: kill: (42) - No such process"
    );
  });
});

describe("killByPort", () => {
  test("uses the first record on the port", async () => {
    const run = okRunner();
    await killByPort(
      [record({ localPort: 22, pid: 1 }), record({ pid: 5 }), record({ pid: 6 })],
      3000,
      { run }
    );
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith("kill", ["5"]);
  });

  test("rejects when nothing listens on the port", async () => {
    await expect(killByPort([], 1234, { run: okRunner() })).rejects.toThrow(
      "No process found on port 1234"
    );
  });
});

describe("createForward", () => {
  test("starts a detached ssh -L and returns its pid", async () => {
    const spawner = vi.fn<DetachedSpawner>().mockResolvedValue(4321);
    const pid = await createForward(
      { spec: forwardSpec(8080, "localhost", 80), host: "bastion" },
      spawner
    );
    expect(pid).toBe(4321);
    expect(spawner).toHaveBeenCalledWith("ssh", [
      "-f",
      "-N",
      "-L",
      "8080:localhost:80",
      "bastion"
    ]);
  });

  test("reverse forwards use -R", async () => {
    const spawner = vi.fn<DetachedSpawner>().mockResolvedValue(1);
    await createForward(
      { spec: "9000:localhost:3000", host: "edge", reverse: true },
      spawner
    );
    expect(spawner.mock.calls[0]?.[1][2]).toBe("-R");
  });

  test("spawn failures become ActionErrors", async () => {
    const spawner = vi
      .fn<DetachedSpawner>()
      .mockRejectedValue(new Error("spawn ssh ENOENT"));
    await expect(
      createForward({ spec: "1:a:1", host: "h" }, spawner)
    ).rejects.toThrow(new ActionError("spawn ssh ENOENT", "forward"));
  });

  test("a blank host is rejected before spawning", async () => {
    const spawner = vi.fn<DetachedSpawner>();
    await expect(
      createForward({ spec: "1:a:1", host: "  " }, spawner)
    ).rejects.toThrow("Forward spec and host are required");
    expect(spawner).not.toHaveBeenCalled();
  });
});
