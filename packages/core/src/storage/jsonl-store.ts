/**
 * Append-only JSON Lines files, used for verbose logs.
 */

import { existsSync, readFileSync } from "fs";
import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { expandPath } from "./file-utils";

export async function appendJsonl(
  filePath: string,
  value: unknown
): Promise<void> {
  const expanded = expandPath(filePath);
  await mkdir(dirname(expanded), { recursive: true });
  await appendFile(expanded, `${JSON.stringify(value)}\n`, "utf8");
}

/**
 * Read every record of a JSONL file. Lines that are not valid JSON are
 * skipped; a missing file reads as empty.
 */
export function readJsonl<T>(filePath: string): T[] {
  const expanded = expandPath(filePath);
  if (!existsSync(expanded)) return [];

  const records: T[] = [];
  for (const line of readFileSync(expanded, "utf-8").split("\n")) {
    if (!line.trim()) continue;
    try {
      records.push(JSON.parse(line) as T);
    } catch {
      continue;
    }
  }
  return records;
}
