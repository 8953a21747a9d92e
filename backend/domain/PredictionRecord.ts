import type { ISODateString, ISODateTimeString } from "./CalendarDate";

// The single "current" forecast for an owner.
// Storage replaces it wholesale; the engine never manages more than one.
export interface PredictionRecord {
  readonly predictedDate: ISODateString;
  readonly averageCycleLengthDays: number;

  // Trust in the predicted date, always within [0, 1].
  readonly confidence: number;

  readonly calculatedAt: ISODateTimeString;
  readonly minCycleLengthDays?: number;
  readonly maxCycleLengthDays?: number;
  readonly reasoning?: string;
  readonly ownerKey?: string;
}
