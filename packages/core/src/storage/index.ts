/**
 * Storage module for berth.
 *
 * Provides:
 * - Config and log locations
 * - File system utilities (expandPath, ensureDir, writeFileAtomic)
 * - JSONL append/read for verbose logs
 */

export * from "./paths";

export { expandPath, ensureDir, writeFileAtomic } from "./file-utils";

export { appendJsonl, readJsonl } from "./jsonl-store";
