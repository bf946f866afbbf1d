import type { VerboseLogger } from "@berth/core";
import type { CommandRunner } from "../exec";

export interface CollectorOptions {
  /** Scan this SSH destination instead of the local machine */
  remoteHost?: string;
  run?: CommandRunner;
  logger?: VerboseLogger;
}
