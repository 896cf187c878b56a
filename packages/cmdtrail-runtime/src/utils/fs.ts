import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

export function ensureDirForFile(filePath: string): void {
  const parent = dirname(resolve(filePath));
  if (!existsSync(parent)) {
    mkdirSync(parent, { recursive: true });
  }
}

export function ensureDir(path: string): void {
  const resolved = resolve(path);
  if (!existsSync(resolved)) {
    mkdirSync(resolved, { recursive: true });
  }
}

function tempPathFor(filePath: string): string {
  const parent = dirname(resolve(filePath));
  return join(parent, `.${Math.random().toString(36).slice(2, 10)}.${Date.now().toString(36)}.tmp`);
}

export function isTempFileName(name: string): boolean {
  return name.startsWith(".") || name.endsWith(".tmp");
}

export function writeFileAtomic(filePath: string, content: string): void {
  ensureDirForFile(filePath);
  const tempPath = tempPathFor(filePath);
  try {
    writeFileSync(tempPath, content, "utf8");
    renameSync(tempPath, resolve(filePath));
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

export async function writeFileAtomicAsync(filePath: string, content: string): Promise<void> {
  ensureDirForFile(filePath);
  const tempPath = tempPathFor(filePath);
  try {
    await writeFile(tempPath, content, "utf8");
    await rename(tempPath, resolve(filePath));
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/** `(mtime, size)` of a file, or `undefined` when it is gone. */
export async function readFileSignature(filePath: string): Promise<string | undefined> {
  try {
    const stats = await stat(filePath);
    return `${stats.mtimeMs}:${stats.size}`;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}
