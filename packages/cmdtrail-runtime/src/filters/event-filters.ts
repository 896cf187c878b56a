import { existsSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import { parse as parseYaml } from "yaml";
import { isFailedExit } from "../events/model.js";
import type { HistoryEvent, HistoryLogger } from "../types.js";
import { ensureDirForFile } from "../utils/fs.js";
import { silentLogger } from "../utils/silent-logger.js";

export const EVENT_FILTERS_FORMAT = "cmdtrail-event-filters-v1";

export const DEFAULT_EVENT_FILTERS_TEMPLATE = `format: ${EVENT_FILTERS_FORMAT}
success-exit-codes: [0]
# exact commands hidden from filtered searches
ignore-commands:
  - top
# regular expressions that must match the whole command
ignore-patterns:
  - ls(\\s.*)?
`;

const EventFiltersFileSchema = Type.Object(
  {
    format: Type.Literal(EVENT_FILTERS_FORMAT),
    "ignore-commands": Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
    "ignore-patterns": Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
    "success-exit-codes": Type.Optional(Type.Array(Type.Integer())),
  },
  { additionalProperties: false },
);

type EventFiltersFile = Static<typeof EventFiltersFileSchema>;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateEventFiltersFile = ajv.compile<EventFiltersFile>(EventFiltersFileSchema);

export interface EventFilterRules {
  ignoreCommands: ReadonlySet<string>;
  ignorePatterns: readonly RegExp[];
  successExitCodes: ReadonlySet<number>;
}

export const EMPTY_EVENT_FILTER_RULES: EventFilterRules = {
  ignoreCommands: new Set<string>(),
  ignorePatterns: [],
  successExitCodes: new Set<number>([0]),
};

/** Throws with a readable message when the document is not a valid filters file. */
export function parseEventFilters(text: string): EventFilterRules {
  const document: unknown = parseYaml(text);
  if (!validateEventFiltersFile(document)) {
    const details = (validateEventFiltersFile.errors ?? [])
      .map((error) => `${error.instancePath || "/"}: ${error.message ?? "invalid value"}`)
      .join("; ");
    throw new Error(`invalid event filters: ${details || "unknown validation error"}`);
  }
  const ignorePatterns = (document["ignore-patterns"] ?? []).map((pattern) => {
    try {
      return new RegExp(`^(?:${pattern})$`);
    } catch (error) {
      throw new Error(
        `invalid ignore pattern ${JSON.stringify(pattern)}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  });
  return {
    ignoreCommands: new Set(document["ignore-commands"] ?? []),
    ignorePatterns,
    successExitCodes: new Set(document["success-exit-codes"] ?? [0]),
  };
}

export function ensureEventFiltersFile(filePath: string): boolean {
  if (existsSync(filePath)) {
    return false;
  }
  ensureDirForFile(filePath);
  writeFileSync(filePath, DEFAULT_EVENT_FILTERS_TEMPLATE, "utf8");
  return true;
}

/**
 * Event filters backed by a YAML file, re-read when its `(mtime, size)`
 * changes. A broken file keeps the previous rules.
 */
export class EventFilters {
  private rules: EventFilterRules = EMPTY_EVENT_FILTER_RULES;
  private signature: string | null = null;
  private revisionValue = 0;

  constructor(
    private readonly filePath: string,
    private readonly logger: HistoryLogger = silentLogger,
  ) {}

  get revision(): number {
    return this.revisionValue;
  }

  get current(): EventFilterRules {
    return this.rules;
  }

  refresh(): void {
    let signature: string;
    try {
      const stats = statSync(this.filePath);
      signature = `${stats.mtimeMs}:${stats.size}`;
    } catch {
      if (this.signature !== null) {
        this.signature = null;
        this.replace(EMPTY_EVENT_FILTER_RULES);
      }
      return;
    }
    if (signature === this.signature) {
      return;
    }
    this.signature = signature;

    try {
      this.replace(parseEventFilters(readFileSync(this.filePath, "utf8")));
    } catch (error) {
      this.logger.warn("event filters not reloaded; keeping previous rules", {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  discard(event: Pick<HistoryEvent, "command">): boolean {
    if (this.rules.ignoreCommands.has(event.command)) {
      return true;
    }
    return this.rules.ignorePatterns.some((pattern) => pattern.test(event.command));
  }

  isFailure(exitCode: number | null): boolean {
    return isFailedExit(exitCode, this.rules.successExitCodes);
  }

  private replace(rules: EventFilterRules): void {
    this.rules = rules;
    this.revisionValue += 1;
  }
}
