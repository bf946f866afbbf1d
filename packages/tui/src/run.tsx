import {
  type BerthConfig,
  type Connection,
  type Preset,
  type VerboseLogger,
  silentLogger
} from "@berth/core";
import { render } from "ink";
import React from "react";
import { App } from "./App";
import { Dispatcher } from "./dispatcher";
import { mockRecords } from "./mock";
import { type PortService, createPortService } from "./service";
import { createSession } from "./state/session";
import { createStore } from "./store";

export interface TuiOptions {
  remoteHost?: string;
  dockerTarget?: string;
  mock?: boolean;
  config?: BerthConfig;
  presets?: Preset[];
  /** Saved connections, without Local */
  connections?: Connection[];
  logger?: VerboseLogger;
  /** Defaults to the real collectors and actions */
  service?: PortService;
}

/**
 * Run the dashboard until the user quits. The first load starts before
 * the first frame so the table fills in as soon as collection finishes.
 */
export async function runTui(options: TuiOptions = {}): Promise<void> {
  const logger = options.logger ?? silentLogger;
  const store = createStore(
    createSession({
      config: options.config,
      presets: options.presets,
      connections: options.connections,
      remoteHost: options.remoteHost,
      dockerTarget: options.dockerTarget,
      mock: options.mock
    })
  );
  const dispatcher = new Dispatcher(
    store,
    options.service ?? createPortService(logger),
    logger
  );

  logger.log("tui.started", {
    remoteHost: options.remoteHost,
    dockerTarget: options.dockerTarget,
    mock: options.mock ?? false
  });

  const initialLoad = dispatcher.initialize(options.mock ? mockRecords() : []);
  const instance = render(<App store={store} dispatcher={dispatcher} />, {
    exitOnCtrlC: false
  });

  await instance.waitUntilExit();
  await initialLoad;
  logger.log("tui.stopped");
  await logger.flush();
}
