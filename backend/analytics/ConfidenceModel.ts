import { RegularityClass } from "../domain/IntervalStatistics";

// Confidence used when statistics are unavailable (single log, or every interval filtered).
export const FALLBACK_CONFIDENCE = 0.3;

const CONFIDENCE_BY_REGULARITY: Readonly<Record<RegularityClass, number>> = {
  [RegularityClass.VeryRegular]: 0.85,
  [RegularityClass.Regular]: 0.7,
  [RegularityClass.SomewhatIrregular]: 0.55,
  [RegularityClass.Irregular]: 0.4,
};

function isRegularityClass(value: unknown): value is RegularityClass {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(CONFIDENCE_BY_REGULARITY, value);
}

// Total: any unrecognised input maps to FALLBACK_CONFIDENCE.
export function confidenceFor(regularity: RegularityClass | string | null | undefined): number {
  return isRegularityClass(regularity) ? CONFIDENCE_BY_REGULARITY[regularity] : FALLBACK_CONFIDENCE;
}
