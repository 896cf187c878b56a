#!/usr/bin/env tsx
import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { parseArgs as parseNodeArgs } from "node:util";
import { runDaemonCli, tryConnectDaemonClient, type DaemonClient } from "@cmdtrail/daemon";
import {
  CmdtrailError,
  EventFilters,
  createScorer,
  errnoCode,
  importZshHistory,
  isCmdtrailError,
  loadCmdtrailConfigWithDiagnostics,
  resolveCmdtrailHome,
  resolveCmdtrailPaths,
  resolveMaybeAbsolute,
  resolveNavigation,
  runSearch,
  toErrorMessage,
  type AppendEventInput,
  type CmdtrailConfig,
  type CmdtrailConfigDiagnostic,
  type CmdtrailPaths,
  type NavigationDirection,
  type NavigationRequest,
  type NavigationResult,
  type SearchMode,
  type SearchQuery,
  type SearchResultItem,
  type ZshImportResult,
} from "@cmdtrail/runtime";
import { loadDirectHistory, type DirectHistory } from "./direct-read.js";
import {
  formatEventTime,
  formatSearchItem,
  isSearchOutputFormat,
  type FormatContext,
  type SearchOutputFormat,
} from "./format.js";
import { JsonLineWriter, writeJsonLine, writeLine, type JsonLineWritable } from "./json-lines.js";
import { claimSessionWarning } from "./warn-once.js";

const CLI_VERSION = "0.1.0";
const CLIENT_ID = "cmdtrail-cli";
const DEFAULT_CONNECT_TIMEOUT_MS = 1_000;

const DAEMON_COMMANDS = new Set(["run", "start", "stop", "status", "is-alive", "sync-now", "logs"]);
const SEARCH_MODES: readonly SearchMode[] = ["all", "session", "folder", "aggregated-unique"];

export interface RunCliOptions {
  env?: NodeJS.ProcessEnv;
  stdout?: JsonLineWritable;
  stderr?: JsonLineWritable;
  now?: () => Date;
  /** Folders under it are shown as `~` in previews; also where `.zsh_history` is looked up. */
  userHome?: string;
  connectTimeoutMs?: number;
}

interface CliIo {
  env: NodeJS.ProcessEnv;
  stdout: JsonLineWritable;
  stderr: JsonLineWritable;
  now: () => Date;
  userHome: string;
  connectTimeoutMs: number;
}

const APPEND_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  home: { type: "string" },
  command: { type: "string" },
  "start-time": { type: "string" },
  "end-time": { type: "string" },
  "exit-code": { type: "string" },
  folder: { type: "string" },
  session: { type: "string" },
  machine: { type: "string" },
} as const;

const SEARCH_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  home: { type: "string" },
  mode: { type: "string" },
  query: { type: "string", short: "q" },
  session: { type: "string" },
  folder: { type: "string" },
  limit: { type: "string" },
  "filter-ignored": { type: "boolean" },
  "filter-failed": { type: "boolean" },
  format: { type: "string" },
  direct: { type: "boolean" },
} as const;

const NAVIGATE_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  home: { type: "string" },
  prefix: { type: "string" },
  session: { type: "string" },
  "session-start": { type: "string" },
  time: { type: "string" },
  machine: { type: "string" },
  sequence: { type: "string" },
  ignore: { type: "string" },
  "captured-at": { type: "string" },
  json: { type: "boolean" },
  direct: { type: "boolean" },
} as const;

const IMPORT_PARSE_OPTIONS = {
  help: { type: "boolean", short: "h" },
  home: { type: "string" },
  file: { type: "string" },
} as const;

const HELP_TEXT = `cmdtrail - command history shared across your machines

Usage:
  cmdtrail <command> [options]

Commands:
  append-event        Record a finished command (no-op when the daemon is down)
  search              Search history (--mode all|session|folder|aggregated-unique)
  previous-event      Older command matching --prefix before --time
  next-event          Newer command matching --prefix after --time
  import-zsh          Import a zsh history file (default ~/.zsh_history)
  run                 Run the daemon in the foreground
  start               Start the daemon in the background
  stop                Stop the daemon
  status              Show daemon status (--deep for store and sync detail)
  is-alive            Exit 0 when the daemon answers
  sync-now            Run a sync pass immediately
  logs                Print the daemon log
  daemon <command>    Same lifecycle commands under one group

Search options:
  --query, -q <text>  Every whitespace-separated term must occur (smart case)
  --session <id>      Session for --mode session
  --folder <path>     Folder for --mode folder
  --limit <n>         Maximum number of results
  --filter-ignored    Drop commands matched by event-filters.yaml
  --filter-failed     Drop failed commands
  --format <f>        plain (default), json or fzf
  --direct            Read the history files without asking the daemon

Common options:
  --home <path>       Data home (default: $CMDTRAIL_HOME or ~/.cmdtrail)
  -h, --help          Show help

Examples:
  cmdtrail start
  cmdtrail search --mode aggregated-unique --query "git st" --format fzf
  cmdtrail previous-event --prefix "make" --session "$ID" --time "$(date +%s.%N)"
  cmdtrail import-zsh ~/.zsh_history`;

async function printHelp(output: JsonLineWritable): Promise<void> {
  await writeLine(HELP_TEXT, output);
}

async function reportError(io: CliIo, message: string): Promise<void> {
  await writeLine(message, io.stderr);
}

async function parseOrReport<T>(io: CliIo, parse: () => T): Promise<T | null> {
  try {
    return parse();
  } catch (error) {
    await reportError(io, `Error: ${toErrorMessage(error)}`);
    return null;
  }
}

function describeError(error: unknown): string {
  if (error instanceof CmdtrailError) {
    return `[${error.code}] ${error.message}`;
  }
  return toErrorMessage(error);
}

function isClosedOutput(error: unknown): boolean {
  const code = errnoCode(error);
  return code === "EPIPE" || code === "ERR_STREAM_DESTROYED";
}

function parseSecondsFlag(flag: string, raw: unknown): { value?: number; error?: string } {
  if (typeof raw !== "string") {
    return {};
  }
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!trimmed || !Number.isFinite(value) || value < 0) {
    return { error: `Error: --${flag} must be a non-negative number of seconds.` };
  }
  return { value };
}

function parseIntegerFlag(
  flag: string,
  raw: unknown,
  minimum?: number,
): { value?: number; error?: string } {
  if (typeof raw !== "string") {
    return {};
  }
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!trimmed || !Number.isInteger(value)) {
    return { error: `Error: --${flag} must be an integer.` };
  }
  if (minimum !== undefined && value < minimum) {
    return { error: `Error: --${flag} must be >= ${minimum}.` };
  }
  return { value };
}

function isSearchMode(value: string): value is SearchMode {
  return SEARCH_MODES.some((mode) => mode === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function resolvePaths(homeFlag: unknown, env: NodeJS.ProcessEnv): CmdtrailPaths {
  const home =
    typeof homeFlag === "string" && homeFlag.trim()
      ? resolveMaybeAbsolute(process.cwd(), homeFlag)
      : resolveCmdtrailHome(env);
  return resolveCmdtrailPaths(home);
}

async function connectClient(paths: CmdtrailPaths, io: CliIo): Promise<DaemonClient | null> {
  return await tryConnectDaemonClient({
    socketPath: paths.socketPath,
    clientId: CLIENT_ID,
    clientVersion: CLI_VERSION,
    connectTimeoutMs: io.connectTimeoutMs,
  });
}

async function printConfigDiagnostics(
  io: CliIo,
  diagnostics: readonly CmdtrailConfigDiagnostic[],
): Promise<void> {
  for (const diagnostic of diagnostics) {
    await reportError(io, `[config:${diagnostic.level}] ${diagnostic.configPath}: ${diagnostic.message}`);
  }
}

async function loadDirect(
  paths: CmdtrailPaths,
  io: CliIo,
): Promise<{ direct: DirectHistory; config: CmdtrailConfig }> {
  const { config, diagnostics } = loadCmdtrailConfigWithDiagnostics({ home: paths.home, env: io.env });
  await printConfigDiagnostics(io, diagnostics);
  const direct = await loadDirectHistory({ paths, config });
  const notes = [`read ${direct.files} file(s) directly`];
  if (direct.corruptFiles > 0) notes.push(`${direct.corruptFiles} corrupt file(s) skipped`);
  if (direct.corruptRecords > 0) notes.push(`${direct.corruptRecords} corrupt record(s) skipped`);
  if (direct.rootError) notes.push(direct.rootError);
  await reportError(io, `cmdtrail: degraded: daemon not reachable at ${paths.socketPath}; ${notes.join("; ")}`);
  for (const entry of direct.unreadable) {
    await reportError(io, `cmdtrail: cannot read ${entry.path}: ${entry.error}`);
  }
  return { direct, config };
}

async function handleAppendEvent(argv: string[], io: CliIo): Promise<number> {
  const parsed = await parseOrReport(io, () =>
    parseNodeArgs({ args: argv, options: APPEND_PARSE_OPTIONS, allowPositionals: false, strict: true }),
  );
  if (!parsed) return 1;
  if (parsed.values.help === true) {
    await printHelp(io.stdout);
    return 0;
  }

  const command = parsed.values.command;
  if (typeof command !== "string" || command.length === 0) {
    await reportError(io, "Error: --command is required.");
    return 1;
  }
  const start = parseSecondsFlag("start-time", parsed.values["start-time"]);
  const end = parseSecondsFlag("end-time", parsed.values["end-time"]);
  const exit = parseIntegerFlag("exit-code", parsed.values["exit-code"]);
  const flagError = start.error ?? end.error ?? exit.error;
  if (flagError) {
    await reportError(io, flagError);
    return 1;
  }
  if (start.value === undefined) {
    await reportError(io, "Error: --start-time is required.");
    return 1;
  }

  const input: AppendEventInput = {
    command,
    startTime: start.value,
    endTime: end.value ?? start.value,
    exitCode: exit.value ?? null,
    folder: optionalString(parsed.values.folder) ?? null,
    sessionId: optionalString(parsed.values.session) ?? null,
    machine: optionalString(parsed.values.machine),
  };

  const paths = resolvePaths(parsed.values.home, io.env);
  const client = await connectClient(paths, io);
  if (!client) {
    if (claimSessionWarning(paths, "append", input.sessionId, io.now())) {
      await reportError(
        io,
        `cmdtrail: daemon not reachable at ${paths.socketPath}; commands are not being recorded (run "cmdtrail start").`,
      );
    }
    return 0;
  }

  try {
    await client.append(input);
    return 0;
  } catch (error) {
    await reportError(io, `cmdtrail: append failed: ${describeError(error)}`);
    return 1;
  } finally {
    await client.close();
  }
}

async function streamDaemonSearch(
  client: DaemonClient,
  query: SearchQuery,
  format: SearchOutputFormat,
  context: FormatContext,
  io: CliIo,
): Promise<number> {
  const writer = new JsonLineWriter(io.stdout);
  const output: { failed: boolean; error?: unknown } = { failed: false };
  const handle = client.search(query, {
    onBatch: (items) => {
      if (output.failed) return;
      for (const item of items) {
        writer.write(formatSearchItem(item, format, context));
      }
      writer.flush().catch((error: unknown) => {
        if (output.failed) return;
        output.failed = true;
        output.error = error;
        void handle.cancel().catch(() => undefined);
      });
    },
  });

  try {
    const result = await handle.done;
    await writer.flush();
    if (result.truncated && format !== "fzf") {
      await reportError(io, `cmdtrail: showing the first ${result.count} results.`);
    }
    return 0;
  } catch (error) {
    if (isClosedOutput(error) || isClosedOutput(output.error)) {
      return 0;
    }
    await reportError(io, `cmdtrail: search failed: ${describeError(error)}`);
    return 1;
  } finally {
    await client.close();
  }
}

async function runDirectSearch(
  paths: CmdtrailPaths,
  query: SearchQuery,
  format: SearchOutputFormat,
  context: FormatContext,
  io: CliIo,
): Promise<number> {
  const { direct, config } = await loadDirect(paths, io);
  const filters = new EventFilters(paths.eventFiltersPath);
  filters.refresh();

  let items: SearchResultItem[];
  try {
    ({ items } = runSearch(direct.store.snapshot(), query, {
      scorer: createScorer(config.search.scorer, { halfLifeDays: config.search.halfLifeDays }),
      filters,
      nowSeconds: io.now().getTime() / 1000,
      maxResults: config.search.maxResults,
    }));
  } catch (error) {
    if (isCmdtrailError(error, "invalid_request")) {
      await reportError(io, `Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const writer = new JsonLineWriter(io.stdout);
  for (const item of items) {
    writer.write(formatSearchItem(item, format, context));
  }
  try {
    await writer.flush();
  } catch (error) {
    if (isClosedOutput(error)) {
      return 0;
    }
    throw error;
  }
  return 0;
}

async function handleSearch(argv: string[], io: CliIo): Promise<number> {
  const parsed = await parseOrReport(io, () =>
    parseNodeArgs({ args: argv, options: SEARCH_PARSE_OPTIONS, allowPositionals: false, strict: true }),
  );
  if (!parsed) return 1;
  if (parsed.values.help === true) {
    await printHelp(io.stdout);
    return 0;
  }

  const mode = parsed.values.mode ?? "all";
  if (!isSearchMode(mode)) {
    await reportError(io, `Error: --mode must be one of ${SEARCH_MODES.join(", ")}.`);
    return 1;
  }
  const format = parsed.values.format ?? "plain";
  if (!isSearchOutputFormat(format)) {
    await reportError(io, "Error: --format must be one of plain, json, fzf.");
    return 1;
  }
  const limit = parseIntegerFlag("limit", parsed.values.limit, 1);
  if (limit.error) {
    await reportError(io, limit.error);
    return 1;
  }
  const query: SearchQuery = {
    mode,
    text: optionalString(parsed.values.query),
    sessionId: optionalString(parsed.values.session),
    folder: optionalString(parsed.values.folder),
    limit: limit.value,
    filterIgnored: parsed.values["filter-ignored"] === true,
    filterFailed: parsed.values["filter-failed"] === true,
  };
  if (mode === "session" && query.sessionId === undefined) {
    await reportError(io, "Error: --mode session needs --session.");
    return 1;
  }
  if (mode === "folder" && query.folder === undefined) {
    await reportError(io, "Error: --mode folder needs --folder.");
    return 1;
  }

  const paths = resolvePaths(parsed.values.home, io.env);
  const context: FormatContext = { now: io.now(), home: io.userHome };
  const client = parsed.values.direct === true ? null : await connectClient(paths, io);
  if (client) {
    return await streamDaemonSearch(client, query, format, context, io);
  }
  return await runDirectSearch(paths, query, format, context, io);
}

async function printNavigationResult(
  result: NavigationResult,
  json: boolean,
  io: CliIo,
): Promise<number> {
  if (json) {
    await writeJsonLine(result, io.stdout);
    return result.found ? 0 : 1;
  }
  if (!result.found) {
    return 1;
  }
  if ("event" in result) {
    const { event } = result;
    await writeLine(`${formatEventTime(event.startTime)} ${event.machine} ${event.sequence}`, io.stdout);
    await writeLine(event.command, io.stdout);
    return 0;
  }
  await writeLine(formatEventTime(result.restored.startTime), io.stdout);
  await writeLine(result.restored.prefix, io.stdout);
  return 0;
}

async function handleNavigation(
  direction: NavigationDirection,
  argv: string[],
  io: CliIo,
): Promise<number> {
  const parsed = await parseOrReport(io, () =>
    parseNodeArgs({ args: argv, options: NAVIGATE_PARSE_OPTIONS, allowPositionals: false, strict: true }),
  );
  if (!parsed) return 1;
  if (parsed.values.help === true) {
    await printHelp(io.stdout);
    return 0;
  }

  const time = parseSecondsFlag("time", parsed.values.time);
  const sessionStart = parseSecondsFlag("session-start", parsed.values["session-start"]);
  const capturedAt = parseSecondsFlag("captured-at", parsed.values["captured-at"]);
  const sequence = parseIntegerFlag("sequence", parsed.values.sequence, 1);
  const flagError = time.error ?? sessionStart.error ?? capturedAt.error ?? sequence.error;
  if (flagError) {
    await reportError(io, flagError);
    return 1;
  }
  if (time.value === undefined) {
    await reportError(io, "Error: --time is required.");
    return 1;
  }

  const request: NavigationRequest = {
    direction,
    sessionId: optionalString(parsed.values.session) ?? null,
    sessionStart: sessionStart.value,
    prefix: parsed.values.prefix ?? "",
    reference: {
      startTime: time.value,
      machine: optionalString(parsed.values.machine),
      sequence: sequence.value,
    },
    ignore: parsed.values.ignore,
    capturedAt: capturedAt.value,
  };

  const paths = resolvePaths(parsed.values.home, io.env);
  const json = parsed.values.json === true;
  const client = parsed.values.direct === true ? null : await connectClient(paths, io);
  if (!client) {
    const { direct } = await loadDirect(paths, io);
    return await printNavigationResult(resolveNavigation(direct.store.snapshot(), request), json, io);
  }

  let result: NavigationResult;
  try {
    result = await client.navigate(request);
  } catch (error) {
    await reportError(io, `cmdtrail: ${direction}-event failed: ${describeError(error)}`);
    return 1;
  } finally {
    await client.close();
  }
  return await printNavigationResult(result, json, io);
}

async function handleImportZsh(argv: string[], io: CliIo): Promise<number> {
  const parsed = await parseOrReport(io, () =>
    parseNodeArgs({ args: argv, options: IMPORT_PARSE_OPTIONS, allowPositionals: true, strict: true }),
  );
  if (!parsed) return 1;
  if (parsed.values.help === true) {
    await printHelp(io.stdout);
    return 0;
  }
  if (parsed.positionals.length > 1) {
    await reportError(io, "Error: import-zsh takes at most one history file.");
    return 1;
  }

  const source = parsed.positionals[0] ?? parsed.values.file ?? join(io.userHome, ".zsh_history");
  const historyPath = resolveMaybeAbsolute(process.cwd(), source);
  const paths = resolvePaths(parsed.values.home, io.env);

  let imported: ZshImportResult;
  try {
    imported = await importZshHistory(historyPath, paths.archiveDir, io.now());
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      await reportError(io, `Error: history file not found: ${historyPath}`);
      return 1;
    }
    throw error;
  }
  await writeLine(
    `imported ${imported.added} new event(s) from ${historyPath} into ${imported.filePath}, ${imported.events} in total (${imported.skippedLines} unreadable line(s) skipped)`,
    io.stdout,
  );

  const client = await connectClient(paths, io);
  if (!client) {
    await writeLine("daemon not running; the import is merged when it next starts.", io.stdout);
    return 0;
  }
  try {
    await client.request("sync.now", {});
    await writeLine("daemon merged the import.", io.stdout);
    return 0;
  } catch (error) {
    await reportError(io, `cmdtrail: sync after import failed: ${describeError(error)}`);
    return 1;
  } finally {
    await client.close();
  }
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const io: CliIo = {
    env: options.env ?? process.env,
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
    now: options.now ?? (() => new Date()),
    userHome: options.userHome ?? homedir(),
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
  };
  const command = argv[0];
  const rest = argv.slice(1);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    await printHelp(io.stdout);
    return 0;
  }
  if (command === "--version") {
    await writeLine(CLI_VERSION, io.stdout);
    return 0;
  }
  if (command === "daemon") {
    return (await runDaemonCli(rest, { env: io.env })).exitCode;
  }
  if (DAEMON_COMMANDS.has(command)) {
    return (await runDaemonCli(argv, { env: io.env })).exitCode;
  }

  switch (command) {
    case "append-event":
      return await handleAppendEvent(rest, io);
    case "search":
      return await handleSearch(rest, io);
    case "previous-event":
      return await handleNavigation("previous", rest, io);
    case "next-event":
      return await handleNavigation("next", rest, io);
    case "import-zsh":
      return await handleImportZsh(rest, io);
    default:
      break;
  }

  await reportError(io, `Error: unknown command "${command}".`);
  await printHelp(io.stderr);
  return 1;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(resolve(entry)) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMainModule()) {
  process.title = "cmdtrail";
  void runCli(process.argv.slice(2)).then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      process.stderr.write(`cmdtrail: ${describeError(error)}\n`);
      process.exitCode = 1;
    },
  );
}

export { loadDirectHistory, type DirectHistory } from "./direct-read.js";
export * from "./format.js";
export { JsonLineWriter, writeJsonLine, writeLine, type JsonLineWritable } from "./json-lines.js";
export { claimSessionWarning, warnedMarkerPath } from "./warn-once.js";
