import type { CmdtrailConfig, ScorerName } from "../types.js";
import { isRecord } from "../utils/json.js";

const VALID_SCORERS = new Set<string>(["frequency", "recency", "decaying-frequency"]);

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function normalizePositiveInteger(value: unknown, fallback: number, minimum = 1): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  if (value < minimum) return fallback;
  return Math.floor(value);
}

function normalizePositiveNumber(value: unknown, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) return fallback;
  return value;
}

function normalizeOptionalString(value: unknown, fallback: string | null): string | null {
  if (value === null) return null;
  if (typeof value !== "string") return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function isScorerName(value: unknown): value is ScorerName {
  return typeof value === "string" && VALID_SCORERS.has(value);
}

/** Builds a complete config from merged raw input, falling back field by field. */
export function normalizeCmdtrailConfig(raw: unknown, defaults: CmdtrailConfig): CmdtrailConfig {
  const input = section(raw);
  const sync = section(input.sync);
  const persistence = section(input.persistence);
  const search = section(input.search);
  const logging = section(input.logging);

  return {
    machine: normalizeOptionalString(input.machine, defaults.machine),
    sync: {
      root: normalizeOptionalString(sync.root, defaults.sync.root),
      intervalMs: normalizePositiveInteger(sync.intervalMs, defaults.sync.intervalMs, 1_000),
      recentLimit: normalizePositiveInteger(sync.recentLimit, defaults.sync.recentLimit),
    },
    persistence: {
      compactAfterEvents: normalizePositiveInteger(
        persistence.compactAfterEvents,
        defaults.persistence.compactAfterEvents,
      ),
    },
    search: {
      maxResults: normalizePositiveInteger(search.maxResults, defaults.search.maxResults),
      batchSize: normalizePositiveInteger(search.batchSize, defaults.search.batchSize),
      scorer: isScorerName(search.scorer) ? search.scorer : defaults.search.scorer,
      halfLifeDays: normalizePositiveNumber(search.halfLifeDays, defaults.search.halfLifeDays),
    },
    logging: {
      maxBytes: normalizePositiveInteger(logging.maxBytes, defaults.logging.maxBytes),
      maxFiles: normalizePositiveInteger(logging.maxFiles, defaults.logging.maxFiles),
    },
  };
}
