import type { Connection } from "@berth/core";
import { type CommandContext, fail, resolveTarget } from "../context";

/**
 * Open the dashboard. Mock sessions ignore the configured target and
 * saved connections.
 */
export async function launchTui(
  context: CommandContext,
  mock = false
): Promise<void> {
  const { deps } = context;
  const { config, remoteHost, dockerTarget } = resolveTarget(context);
  const logger = deps.logger("tui", config.general.verbose);

  const connections: Connection[] = mock ? [] : deps.loadConnections();

  try {
    await deps.runTui({
      remoteHost: mock ? undefined : remoteHost,
      dockerTarget: mock ? undefined : dockerTarget,
      mock,
      config,
      presets: deps.loadPresets(),
      connections,
      logger
    });
  } catch (e) {
    fail(context, "Error", e);
  }
}
