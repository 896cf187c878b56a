import { spawn } from "node:child_process";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import process from "node:process";
import { parseArgs as parseNodeArgs } from "node:util";
import {
  DuplicateInstanceError,
  isCmdtrailError,
  resolveCmdtrailHome,
  resolveCmdtrailPaths,
  resolveMaybeAbsolute,
  toErrorMessage,
  type CmdtrailPaths,
} from "@cmdtrail/runtime";
import { connectDaemonClient } from "./client.js";
import { HistoryDaemon } from "./daemon/history-daemon.js";
import { isProcessAlive, readPidRecord, removePidRecord, type DaemonPidRecord } from "./daemon/pid.js";
import { checkSocket } from "./daemon/socket.js";

const LIFECYCLE_SCHEMA = "cmdtrail.daemon.lifecycle.v1";
const STATUS_SCHEMA = "cmdtrail.daemon.status.v1";
const STOP_SCHEMA = "cmdtrail.daemon.stop.v1";
const LOGS_SCHEMA = "cmdtrail.daemon.logs.v1";
const SYNC_SCHEMA = "cmdtrail.daemon.sync.v1";

interface DaemonStatusReport {
  running: boolean;
  reachable: boolean;
  stalePid: boolean;
  pidRecord?: DaemonPidRecord;
  health?: unknown;
  deep?: unknown;
  error?: string;
}

export interface RunDaemonCliOptions {
  allowUnknownCommandFallback?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface RunDaemonCliResult {
  handled: boolean;
  exitCode: number;
}

const START_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  detach: { type: "boolean" },
  foreground: { type: "boolean" },
  "wait-ms": { type: "string" },
  home: { type: "string" },
  json: { type: "boolean" },
  "log-level": { type: "string" },
  "max-payload-bytes": { type: "string" },
} as const;

const STATUS_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  json: { type: "boolean" },
  deep: { type: "boolean" },
  home: { type: "string" },
  "timeout-ms": { type: "string" },
} as const;

const STOP_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  json: { type: "boolean" },
  force: { type: "boolean" },
  reason: { type: "string" },
  home: { type: "string" },
  "timeout-ms": { type: "string" },
} as const;

const SYNC_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  json: { type: "boolean" },
  home: { type: "string" },
  "timeout-ms": { type: "string" },
} as const;

const LOGS_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  json: { type: "boolean" },
  home: { type: "string" },
  tail: { type: "string" },
} as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolveSleep) => {
    setTimeout(resolveSleep, ms);
  });
}

function parseOptionalIntegerFlag(
  flag: string,
  raw: unknown,
  options: {
    minimum?: number;
    maximum?: number;
  } = {},
): { value?: number; error?: string } {
  if (typeof raw !== "string") {
    return {};
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    return { error: `Error: --${flag} must be an integer.` };
  }

  const value = Number(trimmed);
  if (!Number.isInteger(value)) {
    return { error: `Error: --${flag} must be an integer.` };
  }
  if (options.minimum !== undefined && value < options.minimum) {
    return { error: `Error: --${flag} must be >= ${options.minimum}.` };
  }
  if (options.maximum !== undefined && value > options.maximum) {
    return { error: `Error: --${flag} must be <= ${options.maximum}.` };
  }
  return { value };
}

function parseLogLevel(raw: unknown): { value?: "debug" | "info" | "warn" | "error"; error?: string } {
  if (raw === undefined) {
    return {};
  }
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return { value: raw };
  }
  return { error: "Error: --log-level must be one of debug, info, warn, error." };
}

function resolveDetachedBootstrapPrefix(): string[] {
  const entryArg = process.argv[1];
  if (typeof entryArg !== "string" || !entryArg.trim()) {
    return [];
  }
  const resolved = resolve(entryArg);
  if (!existsSync(resolved)) {
    return [];
  }
  return [resolved];
}

function buildDetachedRunArgs(home: string, values: Readonly<Record<string, unknown>>): string[] {
  const args = ["daemon", "run", "--foreground", "--home", home];
  for (const flag of ["log-level", "max-payload-bytes"] as const) {
    const value = values[flag];
    if (typeof value === "string" && value.trim()) {
      args.push(`--${flag}`, value.trim());
    }
  }
  return args;
}

function resolveHome(raw: unknown, env: NodeJS.ProcessEnv): string {
  return typeof raw === "string" && raw.trim()
    ? resolveMaybeAbsolute(process.cwd(), raw)
    : resolveCmdtrailHome(env);
}

function readTailLines(filePath: string, tail: number): string[] {
  if (!existsSync(filePath)) {
    return [];
  }
  const content = readFileSync(filePath, "utf8");
  const lines = content.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  if (tail <= 0) {
    return lines;
  }
  return lines.slice(-tail);
}

function printDaemonHelp(): void {
  console.log(`cmdtrail daemon - per-user history server

Usage:
  cmdtrail daemon <command> [options]

Commands:
  run                 Run the daemon in the foreground (add --detach for background)
  start               Start the daemon in the background
  status              Check daemon health (--deep for store and sync detail)
  is-alive            Exit 0 when a daemon answers on the socket
  stop                Ask the daemon to stop and wait for exit (--force sends SIGTERM)
  sync-now            Run a sync pass immediately
  logs                Print the daemon log (tail)
  help                Show this help

Examples:
  cmdtrail daemon start
  cmdtrail daemon status --deep --json
  cmdtrail daemon sync-now
  cmdtrail daemon logs --tail 200
  cmdtrail daemon stop`);
}

async function waitForProcessExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + Math.max(100, timeoutMs);
  while (Date.now() < deadline) {
    if (!isProcessAlive(pid)) {
      return true;
    }
    await sleep(100);
  }
  return !isProcessAlive(pid);
}

export async function queryDaemonStatus(input: {
  paths: CmdtrailPaths;
  deep: boolean;
  timeoutMs: number;
}): Promise<DaemonStatusReport> {
  const pidRecord = readPidRecord(input.paths.pidFilePath);
  if (pidRecord && !isProcessAlive(pidRecord.pid)) {
    return {
      running: false,
      reachable: false,
      stalePid: true,
      pidRecord,
    };
  }

  const socketState = await checkSocket(input.paths.socketPath, input.timeoutMs);
  if (socketState !== "live") {
    return {
      running: pidRecord !== undefined,
      reachable: false,
      stalePid: false,
      pidRecord,
      error: pidRecord ? `socket ${socketState}: ${input.paths.socketPath}` : undefined,
    };
  }

  try {
    const client = await connectDaemonClient({
      socketPath: input.paths.socketPath,
      connectTimeoutMs: input.timeoutMs,
      requestTimeoutMs: input.timeoutMs,
    });
    try {
      const payload = await client.request(input.deep ? "daemon.status" : "daemon.health", {});
      return {
        running: true,
        reachable: true,
        stalePid: false,
        pidRecord,
        health: input.deep ? undefined : payload,
        deep: input.deep ? payload : undefined,
      };
    } finally {
      await client.close();
    }
  } catch (error) {
    return {
      running: true,
      reachable: false,
      stalePid: false,
      pidRecord,
      error: toErrorMessage(error),
    };
  }
}

async function waitForDaemonReady(paths: CmdtrailPaths, waitMs: number): Promise<DaemonStatusReport> {
  const timeoutMs = Math.max(200, waitMs);
  const deadline = Date.now() + timeoutMs;
  let lastError = "";
  while (Date.now() < deadline) {
    const status = await queryDaemonStatus({
      paths,
      deep: false,
      timeoutMs: Math.min(1_000, timeoutMs),
    });
    if (status.running && status.reachable) {
      return status;
    }
    if (status.error) {
      lastError = status.error;
    }
    await sleep(120);
  }

  if (lastError) {
    throw new Error(`daemon did not become ready: ${lastError}`);
  }
  throw new Error(`daemon did not become ready within ${timeoutMs}ms`);
}

function printStatusText(status: DaemonStatusReport, deep: boolean, paths: CmdtrailPaths): void {
  if (!status.running) {
    if (status.stalePid && status.pidRecord) {
      console.log(
        `daemon: stale pid file (${paths.pidFilePath}); pid=${status.pidRecord.pid} is not alive.`,
      );
      return;
    }
    console.log(`daemon: not running (socket: ${paths.socketPath})`);
    return;
  }

  if (!status.reachable) {
    console.log(
      `daemon: process is alive (pid=${status.pidRecord?.pid}) but socketState failed: ${status.error ?? "unknown error"}`,
    );
    return;
  }

  console.log(
    `daemon: running pid=${status.pidRecord?.pid} machine=${status.pidRecord?.machine} socket=${paths.socketPath}`,
  );
  if (deep && status.deep !== undefined) {
    console.log(JSON.stringify(status.deep, null, 2));
  }
}

async function handleStart(
  argv: string[],
  env: NodeJS.ProcessEnv,
  defaultDetach: boolean,
): Promise<number> {
  let parsed;
  try {
    parsed = parseNodeArgs({
      args: argv,
      options: START_PARSE_OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    console.error(`Error: ${toErrorMessage(error)}`);
    return 1;
  }

  if (parsed.values.help === true) {
    printDaemonHelp();
    return 0;
  }
  if (parsed.positionals.length > 0) {
    console.error(`Error: unexpected positional args for daemon run: ${parsed.positionals.join(" ")}`);
    return 1;
  }
  if (parsed.values.detach === true && parsed.values.foreground === true) {
    console.error("Error: --detach and --foreground cannot be used together.");
    return 1;
  }

  const maxPayloadParsed = parseOptionalIntegerFlag(
    "max-payload-bytes",
    parsed.values["max-payload-bytes"],
    { minimum: 16 * 1024 },
  );
  if (maxPayloadParsed.error) {
    console.error(maxPayloadParsed.error);
    return 1;
  }
  const waitParsed = parseOptionalIntegerFlag("wait-ms", parsed.values["wait-ms"], {
    minimum: 200,
  });
  if (waitParsed.error) {
    console.error(waitParsed.error);
    return 1;
  }
  const logLevel = parseLogLevel(parsed.values["log-level"]);
  if (logLevel.error) {
    console.error(logLevel.error);
    return 1;
  }

  const home = resolveHome(parsed.values.home, env);
  const paths = resolveCmdtrailPaths(home);
  const jsonMode = parsed.values.json === true;
  const detachMode =
    parsed.values.foreground !== true && (parsed.values.detach === true || defaultDetach);

  if (detachMode) {
    const existing = await queryDaemonStatus({ paths, deep: false, timeoutMs: 1_000 });
    if (existing.running && existing.reachable) {
      if (jsonMode) {
        console.log(
          JSON.stringify({
            schema: LIFECYCLE_SCHEMA,
            event: "already_running",
            pid: existing.pidRecord?.pid ?? null,
            socketPath: paths.socketPath,
          }),
        );
      } else {
        console.log(`daemon: already running pid=${existing.pidRecord?.pid} socket=${paths.socketPath}`);
      }
      return 0;
    }
    if (existing.stalePid) {
      removePidRecord(paths.pidFilePath);
    }

    const childArgs = [
      ...process.execArgv,
      ...resolveDetachedBootstrapPrefix(),
      ...buildDetachedRunArgs(home, parsed.values),
    ];
    const child = spawn(process.execPath, childArgs, {
      detached: true,
      stdio: "ignore",
      env: { ...env },
    });
    child.unref();

    try {
      const status = await waitForDaemonReady(paths, waitParsed.value ?? 8_000);
      if (jsonMode) {
        console.log(
          JSON.stringify({
            schema: LIFECYCLE_SCHEMA,
            event: "started_detached",
            launcherPid: process.pid,
            childPid: child.pid ?? null,
            pid: status.pidRecord?.pid ?? null,
            socketPath: paths.socketPath,
            logFilePath: paths.logFilePath,
          }),
        );
      } else {
        console.log(`daemon: detached pid=${status.pidRecord?.pid} socket=${paths.socketPath}`);
      }
      return 0;
    } catch (error) {
      if (jsonMode) {
        console.log(
          JSON.stringify({
            schema: LIFECYCLE_SCHEMA,
            event: "detach_failed",
            childPid: child.pid ?? null,
            error: toErrorMessage(error),
            logFilePath: paths.logFilePath,
          }),
        );
      } else {
        console.error(`daemon: detached start failed (${toErrorMessage(error)})`);
      }
      return 2;
    }
  }

  const daemon = new HistoryDaemon({
    home,
    env,
    jsonStdout: jsonMode,
    logLevel: logLevel.value,
    maxPayloadBytes: maxPayloadParsed.value,
  });

  try {
    await daemon.start();
  } catch (error) {
    if (error instanceof DuplicateInstanceError) {
      console.error(`daemon: [${error.code}] ${error.message}`);
      return 1;
    }
    console.error(`daemon: failed to start (${toErrorMessage(error)})`);
    return isCmdtrailError(error, "local_storage_failure") ? 3 : 1;
  }

  const runtime = daemon.getRuntimeInfo();
  if (jsonMode) {
    console.log(JSON.stringify({ schema: LIFECYCLE_SCHEMA, event: "started", ...runtime }));
  } else {
    console.log(`daemon: started pid=${runtime.pid} machine=${runtime.machine} socket=${runtime.socketPath}`);
  }

  await daemon.waitForStop();
  if (jsonMode) {
    console.log(
      JSON.stringify({
        schema: LIFECYCLE_SCHEMA,
        event: "stopped",
        pid: runtime.pid,
        exitCode: daemon.exitCode,
      }),
    );
  } else {
    console.log("daemon: stopped");
  }
  return daemon.exitCode;
}

async function handleStatus(argv: string[], env: NodeJS.ProcessEnv, aliveOnly: boolean): Promise<number> {
  let parsed;
  try {
    parsed = parseNodeArgs({
      args: argv,
      options: STATUS_PARSE_OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    console.error(`Error: ${toErrorMessage(error)}`);
    return 1;
  }

  if (parsed.values.help === true) {
    printDaemonHelp();
    return 0;
  }
  if (parsed.positionals.length > 0) {
    console.error(`Error: unexpected positional args for daemon status: ${parsed.positionals.join(" ")}`);
    return 1;
  }

  const timeoutParsed = parseOptionalIntegerFlag("timeout-ms", parsed.values["timeout-ms"], {
    minimum: 100,
  });
  if (timeoutParsed.error) {
    console.error(timeoutParsed.error);
    return 1;
  }

  const paths = resolveCmdtrailPaths(resolveHome(parsed.values.home, env));
  const deep = parsed.values.deep === true && !aliveOnly;
  const status = await queryDaemonStatus({
    paths,
    deep,
    timeoutMs: timeoutParsed.value ?? (aliveOnly ? 1_000 : 3_000),
  });

  if (aliveOnly) {
    if (parsed.values.json === true) {
      console.log(JSON.stringify({ schema: STATUS_SCHEMA, alive: status.reachable }));
    }
    return status.reachable ? 0 : 1;
  }

  if (parsed.values.json === true) {
    console.log(
      JSON.stringify({
        schema: STATUS_SCHEMA,
        ...status,
        pidFilePath: paths.pidFilePath,
        socketPath: paths.socketPath,
      }),
    );
  } else {
    printStatusText(status, deep, paths);
  }

  if (!status.running) {
    return 1;
  }
  if (!status.reachable) {
    return 2;
  }
  return 0;
}

async function handleStop(argv: string[], env: NodeJS.ProcessEnv): Promise<number> {
  let parsed;
  try {
    parsed = parseNodeArgs({
      args: argv,
      options: STOP_PARSE_OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    console.error(`Error: ${toErrorMessage(error)}`);
    return 1;
  }

  if (parsed.values.help === true) {
    printDaemonHelp();
    return 0;
  }
  if (parsed.positionals.length > 0) {
    console.error(`Error: unexpected positional args for daemon stop: ${parsed.positionals.join(" ")}`);
    return 1;
  }

  const timeoutParsed = parseOptionalIntegerFlag("timeout-ms", parsed.values["timeout-ms"], {
    minimum: 100,
  });
  if (timeoutParsed.error) {
    console.error(timeoutParsed.error);
    return 1;
  }

  const jsonMode = parsed.values.json === true;
  const timeoutMs = timeoutParsed.value ?? 8_000;
  const reason = typeof parsed.values.reason === "string" ? parsed.values.reason : "cli_stop";
  const paths = resolveCmdtrailPaths(resolveHome(parsed.values.home, env));

  const pidRecord = readPidRecord(paths.pidFilePath);
  if (!pidRecord) {
    if (jsonMode) {
      console.log(JSON.stringify({ schema: STOP_SCHEMA, stopped: false, reason: "not_running" }));
    } else {
      console.log("daemon: not running");
    }
    return 0;
  }

  if (!isProcessAlive(pidRecord.pid)) {
    removePidRecord(paths.pidFilePath);
    if (jsonMode) {
      console.log(
        JSON.stringify({
          schema: STOP_SCHEMA,
          stopped: true,
          reason: "stale_pid_removed",
          pid: pidRecord.pid,
        }),
      );
    } else {
      console.log(`daemon: removed stale pid file for pid=${pidRecord.pid}`);
    }
    return 0;
  }

  let stopRequestError: string | undefined;
  try {
    const client = await connectDaemonClient({
      socketPath: paths.socketPath,
      connectTimeoutMs: timeoutMs,
      requestTimeoutMs: timeoutMs,
    });
    await client.request("daemon.stop", { reason });
    await client.close();
  } catch (error) {
    stopRequestError = toErrorMessage(error);
  }

  let exited = await waitForProcessExit(pidRecord.pid, timeoutMs);
  if (!exited && parsed.values.force === true) {
    try {
      process.kill(pidRecord.pid, "SIGTERM");
    } catch (error) {
      stopRequestError = stopRequestError ?? toErrorMessage(error);
    }
    exited = await waitForProcessExit(pidRecord.pid, 3_000);
  }

  if (exited) {
    removePidRecord(paths.pidFilePath);
    if (jsonMode) {
      console.log(
        JSON.stringify({
          schema: STOP_SCHEMA,
          stopped: true,
          pid: pidRecord.pid,
          reason,
          stopRequestError: stopRequestError ?? null,
        }),
      );
    } else {
      console.log(`daemon: stopped pid=${pidRecord.pid}`);
    }
    return 0;
  }

  const errorText = stopRequestError
    ? `stop request failed and process still alive: ${stopRequestError}`
    : parsed.values.force === true
      ? "process is still alive after force timeout"
      : "process is still alive after timeout (use --force to send SIGTERM)";
  if (jsonMode) {
    console.log(
      JSON.stringify({
        schema: STOP_SCHEMA,
        stopped: false,
        pid: pidRecord.pid,
        reason: errorText,
      }),
    );
  } else {
    console.error(`daemon: ${errorText}`);
  }
  return 2;
}

async function handleSyncNow(argv: string[], env: NodeJS.ProcessEnv): Promise<number> {
  let parsed;
  try {
    parsed = parseNodeArgs({
      args: argv,
      options: SYNC_PARSE_OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    console.error(`Error: ${toErrorMessage(error)}`);
    return 1;
  }

  if (parsed.values.help === true) {
    printDaemonHelp();
    return 0;
  }
  const timeoutParsed = parseOptionalIntegerFlag("timeout-ms", parsed.values["timeout-ms"], {
    minimum: 100,
  });
  if (timeoutParsed.error) {
    console.error(timeoutParsed.error);
    return 1;
  }

  const paths = resolveCmdtrailPaths(resolveHome(parsed.values.home, env));
  const timeoutMs = timeoutParsed.value ?? 60_000;
  try {
    const client = await connectDaemonClient({
      socketPath: paths.socketPath,
      requestTimeoutMs: timeoutMs,
    });
    try {
      const report = await client.request("sync.now", {});
      if (parsed.values.json === true) {
        console.log(JSON.stringify({ schema: SYNC_SCHEMA, ok: true, report }));
      } else {
        console.log(JSON.stringify(report, null, 2));
      }
      return 0;
    } finally {
      await client.close();
    }
  } catch (error) {
    if (parsed.values.json === true) {
      console.log(JSON.stringify({ schema: SYNC_SCHEMA, ok: false, error: toErrorMessage(error) }));
    } else {
      console.error(`daemon: sync failed (${toErrorMessage(error)})`);
    }
    return isCmdtrailError(error, "daemon_unreachable") ? 2 : 1;
  }
}

function handleLogs(argv: string[], env: NodeJS.ProcessEnv): number {
  let parsed;
  try {
    parsed = parseNodeArgs({
      args: argv,
      options: LOGS_PARSE_OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    console.error(`Error: ${toErrorMessage(error)}`);
    return 1;
  }

  if (parsed.values.help === true) {
    printDaemonHelp();
    return 0;
  }
  if (parsed.positionals.length > 0) {
    console.error(`Error: unexpected positional args for daemon logs: ${parsed.positionals.join(" ")}`);
    return 1;
  }

  const tailParsed = parseOptionalIntegerFlag("tail", parsed.values.tail, {
    minimum: 1,
  });
  if (tailParsed.error) {
    console.error(tailParsed.error);
    return 1;
  }

  const paths = resolveCmdtrailPaths(resolveHome(parsed.values.home, env));
  const tail = tailParsed.value ?? 200;
  const lines = readTailLines(paths.logFilePath, tail);

  if (parsed.values.json === true) {
    console.log(
      JSON.stringify({
        schema: LOGS_SCHEMA,
        logFilePath: paths.logFilePath,
        tail,
        exists: existsSync(paths.logFilePath),
        lines,
      }),
    );
    return 0;
  }

  if (!existsSync(paths.logFilePath)) {
    console.log(`daemon: log file not found (${paths.logFilePath})`);
    return 0;
  }
  if (lines.length === 0) {
    console.log(`daemon: log file is empty (${paths.logFilePath})`);
    return 0;
  }

  for (const line of lines) {
    console.log(line);
  }
  return 0;
}

export async function runDaemonCli(
  argv: string[],
  options: RunDaemonCliOptions = {},
): Promise<RunDaemonCliResult> {
  const env = options.env ?? process.env;
  const command = argv[0];
  const rest = argv.slice(1);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printDaemonHelp();
    return { handled: true, exitCode: 0 };
  }

  switch (command) {
    case "run":
      return { handled: true, exitCode: await handleStart(rest, env, false) };
    case "start":
      return { handled: true, exitCode: await handleStart(rest, env, true) };
    case "status":
      return { handled: true, exitCode: await handleStatus(rest, env, false) };
    case "is-alive":
      return { handled: true, exitCode: await handleStatus(rest, env, true) };
    case "stop":
      return { handled: true, exitCode: await handleStop(rest, env) };
    case "sync-now":
      return { handled: true, exitCode: await handleSyncNow(rest, env) };
    case "logs":
      return { handled: true, exitCode: handleLogs(rest, env) };
    default:
      break;
  }

  if (options.allowUnknownCommandFallback) {
    return { handled: false, exitCode: 0 };
  }

  console.error(`Error: unknown daemon command "${command}".`);
  printDaemonHelp();
  return { handled: true, exitCode: 1 };
}
