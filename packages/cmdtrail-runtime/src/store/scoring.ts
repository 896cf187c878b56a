import type { AggregatedEntry, ScorerName } from "../types.js";

export type AggregateStats = Omit<AggregatedEntry, "score">;

/** Higher ranks first. `nowSeconds` is wall-clock epoch seconds. */
export type AggregateScorer = (entry: AggregateStats, nowSeconds: number) => number;

const SECONDS_PER_DAY = 86_400;

export const frequencyScorer: AggregateScorer = (entry) => entry.count;

export const recencyScorer: AggregateScorer = (entry) => entry.latest.startTime;

/**
 * Use count decayed by the age of the latest use, halving every
 * `halfLifeDays`. Commands that mostly fail lose up to half their weight.
 */
export function createDecayingFrequencyScorer(halfLifeDays: number): AggregateScorer {
  const halfLifeSeconds = Math.max(1, halfLifeDays * SECONDS_PER_DAY);
  return (entry, nowSeconds) => {
    const ageSeconds = Math.max(0, nowSeconds - entry.latest.startTime);
    const decay = 0.5 ** (ageSeconds / halfLifeSeconds);
    const known = entry.count - entry.unknownCount;
    const failureRatio = known > 0 ? entry.failedCount / known : 0;
    return entry.count * decay * (1 - 0.5 * failureRatio);
  };
}

export function createScorer(name: ScorerName, options: { halfLifeDays: number }): AggregateScorer {
  switch (name) {
    case "frequency":
      return frequencyScorer;
    case "recency":
      return recencyScorer;
    case "decaying-frequency":
      return createDecayingFrequencyScorer(options.halfLifeDays);
  }
}
