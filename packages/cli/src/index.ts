/**
 * @berth/cli
 *
 * `berth` with no command opens the dashboard; the subcommands are
 * one-shot versions of its actions.
 */

import { Command } from "commander";
import { createDevCommand } from "./commands/dev";
import { createForwardCommand } from "./commands/forward";
import { createKillCommand } from "./commands/kill";
import { createListCommand } from "./commands/list";
import { launchTui } from "./commands/tui";
import type { CommandContext, GlobalOptions } from "./context";
import { type CliDeps, defaultDeps } from "./deps";

export { type CliDeps, type CliOutput, defaultDeps } from "./deps";
export * from "./format";

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command("berth");
  const context: CommandContext = {
    deps,
    globals: () => program.opts<GlobalOptions>()
  };

  program
    .description(
      "A TUI port manager for local processes, SSH forwards, and Docker containers"
    )
    .version("0.1.0")
    // Root options go before the command, so `list --docker` stays a filter
    .enablePositionalOptions()
    .option("-r, --remote <host>", "Remote host (e.g. user@server) to scan via SSH")
    .option("-d, --docker <container>", "Docker container to scan inside")
    .action(() => launchTui(context));

  program.addCommand(createListCommand(context));
  program.addCommand(createForwardCommand(context));
  program.addCommand(createKillCommand(context));
  program.addCommand(createDevCommand(context));

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  deps: CliDeps = defaultDeps
): Promise<void> {
  await createProgram(deps).parseAsync(argv);
}
