/**
 * File system helpers shared by the config loaders and the logger.
 */

import { existsSync, mkdirSync, renameSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";

/**
 * Expand a leading ~ to the home directory.
 *
 * @example
 * expandPath("~/.berth/logs") // => "/home/jo/.berth/logs"
 */
export function expandPath(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/** Create the parent directory of a file path when missing. */
export function ensureDir(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Write through a temp file and rename, so readers never see half a file.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const expanded = expandPath(filePath);
  ensureDir(expanded);

  const tempPath = `${expanded}.tmp.${process.pid}`;
  writeFileSync(tempPath, content);
  renameSync(tempPath, expanded);
}
