import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";

export const CMDTRAIL_HOME_ENV = "CMDTRAIL_HOME";
export const CMDTRAIL_TESTING_ENV = "CMDTRAIL_TESTING";
export const CMDTRAIL_SYNC_ROOT_ENV = "CMDTRAIL_SYNC_ROOT";
export const CMDTRAIL_MACHINE_ENV = "CMDTRAIL_MACHINE";
export const CMDTRAIL_HOME_DIR_RELATIVE = ".cmdtrail";

export interface CmdtrailPaths {
  home: string;
  configPath: string;
  journalPath: string;
  archiveDir: string;
  eventFiltersPath: string;
  daemonDir: string;
  socketPath: string;
  pidFilePath: string;
  logFilePath: string;
  warnedDir: string;
}

export function normalizePathInput(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed === "~") return homedir();
  if (trimmed.startsWith("~/")) return join(homedir(), trimmed.slice(2));
  return trimmed;
}

export function resolveMaybeAbsolute(baseDir: string, pathText: string): string {
  const normalized = normalizePathInput(pathText);
  if (isAbsolute(normalized)) {
    return resolve(normalized);
  }
  return resolve(baseDir, normalized);
}

function isTruthyFlag(value: string | undefined): boolean {
  if (typeof value !== "string") return false;
  const normalized = value.trim().toLowerCase();
  return normalized.length > 0 && normalized !== "0" && normalized !== "false";
}

/** `$CMDTRAIL_HOME` or `~/.cmdtrail`; `CMDTRAIL_TESTING` moves it aside to `<home>-testing`. */
export function resolveCmdtrailHome(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[CMDTRAIL_HOME_ENV] ?? "";
  const home =
    configured.trim().length > 0
      ? resolveMaybeAbsolute(process.cwd(), configured)
      : resolve(homedir(), CMDTRAIL_HOME_DIR_RELATIVE);
  return isTruthyFlag(env[CMDTRAIL_TESTING_ENV]) ? `${home}-testing` : home;
}

export function resolveCmdtrailPaths(home: string = resolveCmdtrailHome()): CmdtrailPaths {
  const root = resolve(home);
  const daemonDir = join(root, "daemon");
  return {
    home: root,
    configPath: join(root, "config.json"),
    journalPath: join(root, "journal.jsonl"),
    archiveDir: join(root, "archive"),
    eventFiltersPath: join(root, "event-filters.yaml"),
    daemonDir,
    socketPath: join(daemonDir, "daemon.sock"),
    pidFilePath: join(daemonDir, "daemon.pid.json"),
    logFilePath: join(daemonDir, "daemon.log"),
    warnedDir: join(daemonDir, "warned"),
  };
}
