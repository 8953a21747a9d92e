import type { EventLog } from "../domain/EventLog";
import type { IntervalStatistics } from "../domain/IntervalStatistics";
import type { PredictionRecord } from "../domain/PredictionRecord";
import {
  PlainEventLogSchema,
  PlainPredictionSchema,
  PlainStatisticsSchema,
} from "./schemas";

// Round-trip between domain values and plain JSON-safe maps.
// Optional fields are omitted rather than written as null.
// Readers validate with zod and throw on malformed input.

export type PlainEventLog = {
  id: string;
  startDate: string;
  createdAt: string;
  updatedAt?: string;
  ownerKey?: string;
};

export type PlainPrediction = {
  predictedDate: string;
  averageCycleLengthDays: number;
  confidence: number;
  calculatedAt: string;
  minCycleLengthDays?: number;
  maxCycleLengthDays?: number;
  reasoning?: string;
  ownerKey?: string;
};

export type PlainStatistics = {
  averageLengthDays: number;
  minLengthDays: number;
  maxLengthDays: number;
  standardDeviation: number;
  regularityClass: string;
  sampleCount: number;
};

export function logToPlain(log: EventLog): PlainEventLog {
  return {
    id: log.id,
    startDate: log.startDate,
    createdAt: log.createdAt,
    ...(log.updatedAt !== undefined ? { updatedAt: log.updatedAt } : {}),
    ...(log.ownerKey !== undefined ? { ownerKey: log.ownerKey } : {}),
  };
}

export function logFromPlain(value: unknown): EventLog {
  return PlainEventLogSchema.parse(value);
}

export function predictionToPlain(record: PredictionRecord): PlainPrediction {
  return {
    predictedDate: record.predictedDate,
    averageCycleLengthDays: record.averageCycleLengthDays,
    confidence: record.confidence,
    calculatedAt: record.calculatedAt,
    ...(record.minCycleLengthDays !== undefined ? { minCycleLengthDays: record.minCycleLengthDays } : {}),
    ...(record.maxCycleLengthDays !== undefined ? { maxCycleLengthDays: record.maxCycleLengthDays } : {}),
    ...(record.reasoning !== undefined ? { reasoning: record.reasoning } : {}),
    ...(record.ownerKey !== undefined ? { ownerKey: record.ownerKey } : {}),
  };
}

export function predictionFromPlain(value: unknown): PredictionRecord {
  return PlainPredictionSchema.parse(value);
}

export function statisticsToPlain(statistics: IntervalStatistics): PlainStatistics {
  return {
    averageLengthDays: statistics.averageLengthDays,
    minLengthDays: statistics.minLengthDays,
    maxLengthDays: statistics.maxLengthDays,
    standardDeviation: statistics.standardDeviation,
    regularityClass: statistics.regularityClass,
    sampleCount: statistics.sampleCount,
  };
}

export function statisticsFromPlain(value: unknown): IntervalStatistics {
  return PlainStatisticsSchema.parse(value);
}
