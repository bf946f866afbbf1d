import { Command } from "commander";
import { type CommandContext, fail, resolveTarget } from "../context";
import {
  type SourceFlags,
  filterBySource,
  formatPortJson,
  formatPortTable
} from "../format";

type ListOptions = SourceFlags & { json?: boolean };

export function createListCommand(context: CommandContext): Command {
  return new Command("list")
    .description("List listening ports (non-interactive)")
    .option("--json", "Output as JSON")
    .option("--local", "Show only local ports")
    .option("--ssh", "Show only SSH forwards")
    .option("--docker", "Show only Docker ports")
    .action(async (options: ListOptions) => {
      const { deps } = context;
      const { config, remoteHost, dockerTarget } = resolveTarget(context);
      const logger = deps.logger("cli", config.general.verbose);

      try {
        const records = filterBySource(
          await deps.scanner(logger).scan({ remoteHost, dockerTarget }),
          options
        );
        if (options.json) {
          deps.output.log(formatPortJson(records));
        } else {
          for (const line of formatPortTable(records)) deps.output.log(line);
        }
      } catch (e) {
        fail(context, "Error", e);
      } finally {
        await logger.flush();
      }
    });
}
