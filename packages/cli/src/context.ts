import { type BerthConfig, errorMessage } from "@berth/core";
import pc from "picocolors";
import type { CliDeps } from "./deps";

/** Options declared on the root program */
export type GlobalOptions = {
  remote?: string;
  docker?: string;
};

export interface CommandContext {
  deps: CliDeps;
  globals(): GlobalOptions;
}

export interface ResolvedTarget {
  config: BerthConfig;
  remoteHost?: string;
  dockerTarget?: string;
}

/** Command-line flags take precedence over config.toml */
export function resolveTarget(context: CommandContext): ResolvedTarget {
  const config = context.deps.loadConfig();
  const { remote, docker } = context.globals();
  return {
    config,
    remoteHost: remote ?? config.general.remoteHost,
    dockerTarget: docker ?? config.general.dockerTarget
  };
}

export function fail(context: CommandContext, prefix: string, e: unknown): void {
  context.deps.output.error(pc.red(`${prefix}: ${errorMessage(e)}`));
  context.deps.setExitCode(1);
}
