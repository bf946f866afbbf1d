import { forwardArgs } from "@berth/monitor";
import { Command } from "commander";
import pc from "picocolors";
import { type CommandContext, fail } from "../context";

export function createForwardCommand(context: CommandContext): Command {
  return new Command("forward")
    .description("Create an SSH port forward")
    .argument("<spec>", "Port specification, e.g. 8080:localhost:80")
    .argument("<host>", "SSH destination, e.g. user@server")
    .option("-R, --reverse", "Remote forward (-R instead of -L)")
    .action(
      async (spec: string, host: string, options: { reverse?: boolean }) => {
        const { deps } = context;
        const request = { spec, host, reverse: options.reverse ?? false };

        deps.output.log(
          `Creating SSH forward: ssh ${forwardArgs(request).join(" ")}`
        );
        try {
          const pid = await deps.createForward(request);
          deps.output.log(pc.green(`Started with PID: ${pid}`));
        } catch (e) {
          fail(context, "Failed to create forward", e);
        }
      }
    );
}
