/**
 * @berth/core
 *
 * Shared pieces for the berth port dashboard:
 * - PortRecord model and display helpers
 * - Connection and preset types
 * - Constants, storage paths and config file loaders
 * - Verbose JSONL logger
 */

export * from "./types";

export * from "./constants";

export * from "./storage";

export * from "./config";

export * from "./logger";
