import { parsePort } from "@berth/core";
import { Command } from "commander";
import pc from "picocolors";
import type { CommandContext } from "../context";
import { type PortCheck, formatCheckTable } from "../format";
import { launchTui } from "./tui";

const CHECK_USAGE =
  "No ports specified. Usage: berth dev check <port1> <port2> ...";

export function createDevCommand(context: CommandContext): Command {
  const dev = new Command("dev").description(
    "Developer tools for testing and debugging"
  );

  dev
    .command("check")
    .description("Check whether ports accept connections")
    .argument("[ports...]", "Ports to check")
    .action(async (values: string[]) => {
      const { deps } = context;
      if (values.length === 0) {
        deps.output.error(pc.red(CHECK_USAGE));
        deps.setExitCode(1);
        return;
      }

      const ports: number[] = [];
      for (const value of values) {
        const port = parsePort(value);
        if (port === null) {
          deps.output.error(pc.red(`Not a valid port: ${value}`));
          deps.setExitCode(1);
          return;
        }
        ports.push(port);
      }

      const checks: PortCheck[] = await Promise.all(
        ports.map(async (port) => ({ port, open: await deps.probePort(port) }))
      );
      for (const line of formatCheckTable(checks)) deps.output.log(line);
    });

  dev
    .command("mock")
    .description("Open the dashboard on sample data (no real scanning)")
    .action(() => launchTui(context, true));

  return dev;
}
