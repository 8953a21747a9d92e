// Regularity buckets derived from the standard deviation of cycle intervals.
// Values are the labels shown to users and embedded in reasoning text.
export enum RegularityClass {
  VeryRegular = "Very Regular",
  Regular = "Regular",
  SomewhatIrregular = "Somewhat Irregular",
  Irregular = "Irregular",
}

// Derived and ephemeral: recomputed from the full log list on every request, never persisted.
export interface IntervalStatistics {
  readonly averageLengthDays: number;
  readonly minLengthDays: number;
  readonly maxLengthDays: number;
  readonly standardDeviation: number;
  readonly regularityClass: RegularityClass;

  // Intervals that survived outlier filtering. Always >= 1.
  readonly sampleCount: number;
}
