import type { HistoryLogger } from "../types.js";

export const silentLogger: HistoryLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
