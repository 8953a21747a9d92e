import type { EventLog } from "../domain/EventLog";
import type { EstimationConfig } from "../domain/EstimationConfig";
import { DEFAULT_CYCLE_LENGTH_DAYS } from "../domain/EstimationConfig";
import type { IntervalStatistics } from "../domain/IntervalStatistics";
import type { PredictionRecord } from "../domain/PredictionRecord";
import { addDays } from "../domain/CalendarDate";
import { systemClock, type Clock } from "../domain/Clock";
import { EmptyLogsError } from "../domain/errors";
import { computeStatistics, sortLogsChronologically } from "./CycleStatistics";
import { FALLBACK_CONFIDENCE, confidenceFor } from "./ConfidenceModel";

// =========================================================================
// Local Estimator
//
// Statistical forecast with no external calls.
// Falls back to a standard 28-day cycle when statistics are unavailable.
// =========================================================================

export const INSUFFICIENT_DATA_REASONING =
  "Insufficient data, using default 28-day cycle. Log more periods for better accuracy.";

export interface LocalEstimate {
  readonly record: PredictionRecord;

  // Absent when the default cycle was used.
  readonly statistics?: IntervalStatistics;
}

export function buildLocalReasoning(statistics: IntervalStatistics, ignoredIntervals: number): string {
  const parts = [
    `Based on ${statistics.sampleCount} cycle(s) averaging ${statistics.averageLengthDays} days.`,
    `Your cycle is ${statistics.regularityClass}.`,
  ];
  if (ignoredIntervals > 0) {
    parts.push(`${ignoredIntervals} interval(s) outside the expected range were ignored.`);
  }
  if (statistics.sampleCount < 2) {
    parts.push("Log at least 3 periods for reliable predictions.");
  }
  return parts.join(" ");
}

export function estimateLocally(
  logs: readonly EventLog[],
  config: EstimationConfig,
  clock: Clock = systemClock,
): LocalEstimate {
  if (logs.length === 0) throw new EmptyLogsError();

  const sorted = sortLogsChronologically(logs);
  const last = sorted[sorted.length - 1];
  const calculatedAt = clock().toISOString();

  const statistics = computeStatistics(sorted, config.minCycleLengthDays, config.maxCycleLengthDays);

  if (!statistics) {
    return {
      record: {
        predictedDate: addDays(last.startDate, DEFAULT_CYCLE_LENGTH_DAYS),
        averageCycleLengthDays: DEFAULT_CYCLE_LENGTH_DAYS,
        confidence: FALLBACK_CONFIDENCE,
        calculatedAt,
        reasoning: INSUFFICIENT_DATA_REASONING,
      },
    };
  }

  const ignoredIntervals = sorted.length - 1 - statistics.sampleCount;

  return {
    statistics,
    record: {
      predictedDate: addDays(last.startDate, statistics.averageLengthDays),
      averageCycleLengthDays: statistics.averageLengthDays,
      confidence: confidenceFor(statistics.regularityClass),
      calculatedAt,
      minCycleLengthDays: statistics.minLengthDays,
      maxCycleLengthDays: statistics.maxLengthDays,
      reasoning: buildLocalReasoning(statistics, ignoredIntervals),
    },
  };
}
