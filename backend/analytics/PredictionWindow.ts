import type { PredictionRecord } from "../domain/PredictionRecord";
import { addDays, daysBetween, type ISODateString } from "../domain/CalendarDate";

// Display helpers around a stored prediction. Pure.

export const PREDICTION_WINDOW_DAYS = 2;

export type ConfidenceLabel = "High" | "Medium" | "Low";

export function predictionWindow(record: PredictionRecord): { earliest: ISODateString; latest: ISODateString } {
  return {
    earliest: addDays(record.predictedDate, -PREDICTION_WINDOW_DAYS),
    latest: addDays(record.predictedDate, PREDICTION_WINDOW_DAYS),
  };
}

export function confidenceLabel(confidence: number): ConfidenceLabel {
  if (confidence >= 0.8) return "High";
  if (confidence >= 0.5) return "Medium";
  return "Low";
}

export function daysUntil(date: ISODateString, today: ISODateString): number {
  return daysBetween(today, date);
}

export function isPredictedDay(record: PredictionRecord, date: ISODateString): boolean {
  return Math.abs(daysBetween(record.predictedDate, date)) <= PREDICTION_WINDOW_DAYS;
}
