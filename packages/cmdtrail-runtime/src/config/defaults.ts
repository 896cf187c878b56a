import type { CmdtrailConfig } from "../types.js";

export const DEFAULT_CMDTRAIL_CONFIG: CmdtrailConfig = {
  machine: null,
  sync: {
    root: null,
    intervalMs: 5 * 60_000,
    recentLimit: 1_000,
  },
  persistence: {
    compactAfterEvents: 500,
  },
  search: {
    maxResults: 10_000,
    batchSize: 200,
    scorer: "decaying-frequency",
    halfLifeDays: 30,
  },
  logging: {
    maxBytes: 10 * 1024 * 1024,
    maxFiles: 5,
  },
};
