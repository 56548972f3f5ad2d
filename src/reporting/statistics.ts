import type { OutcomeReportTable, OutcomeStatistics, ResolvedOutcome } from "./types.js";

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation; 0 for fewer than two values. */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length <= 1) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Per-outcome summary over the unrounded percentages of students who had
 * something to be scored on (possible > 0).
 */
export function computeOutcomeStatistics(
  outcomes: readonly ResolvedOutcome[],
  table: OutcomeReportTable,
): OutcomeStatistics[] {
  return outcomes.map((outcome) => {
    const scored = table.rows
      .map((row) => row.outcomes[outcome.title])
      .filter((result) => result !== undefined && result.possible > 0);
    const percentages = scored.map((r) => r.percentage);
    const meeting = scored.filter((r) => r.status === "Met").length;

    return {
      outcome: outcome.title,
      description: outcome.description,
      threshold: outcome.threshold,
      count: scored.length,
      mean: mean(percentages),
      median: median(percentages),
      stdDev: sampleStdDev(percentages),
      percentMeeting: scored.length > 0 ? (meeting / scored.length) * 100 : 0,
    };
  });
}
