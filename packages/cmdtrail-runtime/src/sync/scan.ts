import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { ReplicationRootUnavailableError } from "../errors.js";
import { errnoCode, isTempFileName } from "../utils/fs.js";

const SKIPPED_DIRECTORIES = new Set([".git", "node_modules"]);

/** Every `*.json` under `dir`, recursively, skipping temp files and dot-directories. */
export async function listMachineFiles(dir: string): Promise<string[]> {
  const found: string[] = [];
  const pending = [dir];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    let entries: Dirent[];
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (error) {
      if (current !== dir && errnoCode(error) === "ENOENT") {
        continue;
      }
      throw error;
    }
    for (const entry of entries) {
      if (isTempFileName(entry.name)) continue;
      const path = join(current, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          pending.push(path);
        }
        continue;
      }
      if (entry.isFile() && entry.name.endsWith(".json")) {
        found.push(path);
      }
    }
  }
  return found.sort();
}

/** Throws `ReplicationRootUnavailableError` unless `root` is a readable directory. */
export async function assertReplicationRoot(root: string): Promise<void> {
  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new ReplicationRootUnavailableError(root, "not a directory");
    }
  } catch (error) {
    if (error instanceof ReplicationRootUnavailableError) {
      throw error;
    }
    throw new ReplicationRootUnavailableError(root, error);
  }
}
