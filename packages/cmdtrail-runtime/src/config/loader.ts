import { existsSync, readFileSync } from "node:fs";
import { hostname } from "node:os";
import { dirname, resolve } from "node:path";
import type { CmdtrailConfig } from "../types.js";
import { isRecord } from "../utils/json.js";
import { DEFAULT_CMDTRAIL_CONFIG } from "./defaults.js";
import { deepMerge } from "./merge.js";
import { normalizeCmdtrailConfig } from "./normalize.js";
import {
  CMDTRAIL_MACHINE_ENV,
  CMDTRAIL_SYNC_ROOT_ENV,
  resolveCmdtrailHome,
  resolveCmdtrailPaths,
  resolveMaybeAbsolute,
} from "./paths.js";
import { validateCmdtrailConfigFile } from "./validate.js";

export type CmdtrailConfigDiagnosticLevel = "warn" | "error";

export interface CmdtrailConfigDiagnostic {
  level: CmdtrailConfigDiagnosticLevel;
  code: "config_parse_error" | "config_not_object" | "config_schema_invalid";
  message: string;
  configPath: string;
}

export interface LoadConfigOptions {
  home?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function stripMetaFields(value: Record<string, unknown>): Record<string, unknown> {
  const output = { ...value };
  // editor completion only
  delete output["$schema"];
  return output;
}

/** A relative `sync.root` is taken relative to the config file. */
function resolveConfigRelativeRoot(
  config: Record<string, unknown>,
  configPath: string,
): Record<string, unknown> {
  const sync = config.sync;
  if (!isRecord(sync) || typeof sync.root !== "string" || !sync.root.trim()) {
    return config;
  }
  return {
    ...config,
    sync: { ...sync, root: resolveMaybeAbsolute(dirname(configPath), sync.root) },
  };
}

function readConfigFile(
  configPath: string,
  diagnostics: CmdtrailConfigDiagnostic[],
): Record<string, unknown> | undefined {
  if (!existsSync(configPath)) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    diagnostics.push({
      level: "error",
      code: "config_parse_error",
      message: `Failed to parse config JSON: ${message}`,
      configPath,
    });
    return undefined;
  }

  if (!isRecord(parsed)) {
    diagnostics.push({
      level: "error",
      code: "config_not_object",
      message: "Config must be a JSON object at the top-level.",
      configPath,
    });
    return undefined;
  }

  const validation = validateCmdtrailConfigFile(parsed);
  for (const error of validation.errors) {
    diagnostics.push({
      level: "warn",
      code: "config_schema_invalid",
      message: `Config does not match schema: ${error}`,
      configPath,
    });
  }

  return resolveConfigRelativeRoot(stripMetaFields(parsed), configPath);
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const root = env[CMDTRAIL_SYNC_ROOT_ENV]?.trim();
  if (root) {
    overrides.sync = { root: resolveMaybeAbsolute(process.cwd(), root) };
  }
  const machine = env[CMDTRAIL_MACHINE_ENV]?.trim();
  if (machine) {
    overrides.machine = machine;
  }
  return overrides;
}

export function loadCmdtrailConfigWithDiagnostics(options: LoadConfigOptions = {}): {
  config: CmdtrailConfig;
  diagnostics: CmdtrailConfigDiagnostic[];
} {
  const env = options.env ?? process.env;
  const home = options.home ?? resolveCmdtrailHome(env);
  const configPath = resolve(options.configPath ?? resolveCmdtrailPaths(home).configPath);
  const diagnostics: CmdtrailConfigDiagnostic[] = [];

  let merged: Record<string, unknown> = {};
  const parsed = readConfigFile(configPath, diagnostics);
  if (parsed) {
    merged = deepMerge(merged, parsed);
  }
  merged = deepMerge(merged, envOverrides(env));

  return {
    config: normalizeCmdtrailConfig(merged, DEFAULT_CMDTRAIL_CONFIG),
    diagnostics,
  };
}

export function loadCmdtrailConfig(options: LoadConfigOptions = {}): CmdtrailConfig {
  return loadCmdtrailConfigWithDiagnostics(options).config;
}

export function resolveMachineId(config: Pick<CmdtrailConfig, "machine">): string {
  return config.machine ?? hostname();
}
