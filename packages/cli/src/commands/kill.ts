import { parsePort } from "@berth/core";
import { Command, InvalidArgumentError } from "commander";
import pc from "picocolors";
import { type CommandContext, fail, resolveTarget } from "../context";

export function parsePortArgument(value: string): number {
  const port = parsePort(value);
  if (port === null) throw new InvalidArgumentError("Not a valid port.");
  return port;
}

export function parsePidArgument(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new InvalidArgumentError("Not a valid PID.");
  }
  return Number(value);
}

export function createKillCommand(context: CommandContext): Command {
  return new Command("kill")
    .description("Kill the process listening on a port")
    .argument("<port>", "Port number", parsePortArgument)
    .option(
      "--pid <pid>",
      "Kill this PID instead of looking up the port",
      parsePidArgument
    )
    .action(async (port: number, options: { pid?: number }) => {
      const { deps } = context;
      const { config, remoteHost } = resolveTarget(context);
      const logger = deps.logger("cli", config.general.verbose);

      try {
        if (options.pid !== undefined) {
          deps.output.log(`Killing process with PID: ${options.pid}...`);
          await deps.killByPid(options.pid, { remoteHost });
        } else {
          // Unprobed: liveness plays no part in a kill
          deps.output.log(`Killing process on port: ${port}...`);
          const records = await deps.scanner(logger).collect({ remoteHost });
          await deps.killByPort(records, port, { remoteHost });
        }
        deps.output.log(pc.green("Done."));
      } catch (e) {
        fail(context, "Error", e);
      } finally {
        await logger.flush();
      }
    });
}
