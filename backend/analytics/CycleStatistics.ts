import type { EventLog } from "../domain/EventLog";
import { compareDates, daysBetween } from "../domain/CalendarDate";
import {
  DEFAULT_MAX_CYCLE_LENGTH_DAYS,
  DEFAULT_MIN_CYCLE_LENGTH_DAYS,
  OUTLIER_SLACK_DAYS,
} from "../domain/EstimationConfig";
import { RegularityClass, type IntervalStatistics } from "../domain/IntervalStatistics";

// =========================================================================
// Cycle Statistics
//
// Interval statistics over logged start dates.
// DETERMINISTIC: no I/O, no clock. Sums accumulate in chronological order
// so repeated runs produce bit-identical output.
// =========================================================================

// Stable ascending sort by startDate. Never mutates the input.
export function sortLogsChronologically(logs: readonly EventLog[]): EventLog[] {
  return logs
    .map((log, index) => ({ log, index }))
    .sort((a, b) => compareDates(a.log.startDate, b.log.startDate) || a.index - b.index)
    .map(({ log }) => log);
}

// Day gaps between consecutive logs. Expects chronological input.
export function consecutiveIntervals(sortedLogs: readonly EventLog[]): number[] {
  const intervals: number[] = [];
  for (let i = 1; i < sortedLogs.length; i++) {
    intervals.push(daysBetween(sortedLogs[i - 1].startDate, sortedLogs[i].startDate));
  }
  return intervals;
}

export function isPlausibleInterval(days: number, minBound: number, maxBound: number): boolean {
  return days >= minBound && days <= maxBound + OUTLIER_SLACK_DAYS;
}

export function classifyRegularity(standardDeviation: number): RegularityClass {
  if (standardDeviation <= 2) return RegularityClass.VeryRegular;
  if (standardDeviation <= 4) return RegularityClass.Regular;
  if (standardDeviation <= 7) return RegularityClass.SomewhatIrregular;
  return RegularityClass.Irregular;
}

/**
 * Computes interval statistics for a set of logs.
 *
 * Intervals outside `[minBound, maxBound + 10]` are treated as data-entry errors and dropped.
 * Returns undefined when fewer than two logs exist or every interval was dropped.
 */
export function computeStatistics(
  logs: readonly EventLog[],
  minBound: number = DEFAULT_MIN_CYCLE_LENGTH_DAYS,
  maxBound: number = DEFAULT_MAX_CYCLE_LENGTH_DAYS,
): IntervalStatistics | undefined {
  if (logs.length < 2) return undefined;

  const surviving = consecutiveIntervals(sortLogsChronologically(logs)).filter((d) =>
    isPlausibleInterval(d, minBound, maxBound),
  );
  if (surviving.length === 0) return undefined;

  let sum = 0;
  let min = surviving[0];
  let max = surviving[0];
  for (const d of surviving) {
    sum += d;
    if (d < min) min = d;
    if (d > max) max = d;
  }

  const averageLengthDays = Math.round(sum / surviving.length);

  // Population deviation around the rounded average.
  let squared = 0;
  for (const d of surviving) squared += (d - averageLengthDays) * (d - averageLengthDays);
  const standardDeviation = Math.sqrt(squared / surviving.length);

  return {
    averageLengthDays,
    minLengthDays: min,
    maxLengthDays: max,
    standardDeviation,
    regularityClass: classifyRegularity(standardDeviation),
    sampleCount: surviving.length,
  };
}
