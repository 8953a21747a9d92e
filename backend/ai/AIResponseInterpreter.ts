import { daysBetween, toCalendarDate, type ISODateString } from "../domain/CalendarDate";
import { OUTLIER_SLACK_DAYS } from "../domain/EstimationConfig";
import type { ParseFailure } from "../domain/errors";

// Interprets free-form provider text as a cycle prediction.
//
// Providers are asked for a bare JSON object but routinely wrap it in code fences,
// prepend commentary, or leave quotes unescaped. Fields are therefore recovered one
// by one with anchored patterns instead of a strict JSON.parse.
//
// Out-of-range predicted dates are NOT rejected: the provider's judgment is kept and
// the anomaly is logged and flagged on the result.

export const DEFAULT_AI_REASONING = "AI-generated prediction";

export interface StructuredPrediction {
  readonly predictedDate: ISODateString;
  readonly averageCycleLengthDays: number;
  readonly confidence: number;
  readonly reasoning: string;
  readonly daysSinceLastEvent: number;
  readonly withinExpectedBounds: boolean;
}

export type InterpretResult =
  | { readonly ok: true; readonly prediction: StructuredPrediction }
  | { readonly ok: false; readonly error: ParseFailure };

const CODE_FENCE = /```[A-Za-z0-9_+-]*[ \t]*\r?\n?/g;

const PREDICTED_DATE_FIELD = /"predicted_date"\s*:\s*"([^"]+)"/;
// Whole-day part only; a sign is not accepted.
const AVERAGE_CYCLE_FIELD = /"average_cycle_length"\s*:\s*"?(\d+)(?:\.\d+)?"?/;
const CONFIDENCE_FIELD = /"confidence"\s*:\s*"?(-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)"?/;
const REASONING_FIELD = /"reasoning"\s*:\s*"((?:[^"\\]|\\.)*)"/;

// Strips fences and surrounding prose; returns the first "{" .. last "}" span.
export function extractJsonSpan(rawText: string): string | null {
  const cleaned = rawText.trim().replace(CODE_FENCE, "").trim();

  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) return null;

  return cleaned.substring(start, end + 1);
}

function unescapeJsonString(value: string): string {
  return value.replace(/\\(["\\/nrt])/g, (_m, ch: string) => {
    switch (ch) {
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      default:
        return ch;
    }
  });
}

function readPredictedDate(span: string): ISODateString | null {
  const match = PREDICTED_DATE_FIELD.exec(span);
  return match ? toCalendarDate(match[1]) : null;
}

function readAverageCycleLength(span: string): number | null {
  const match = AVERAGE_CYCLE_FIELD.exec(span);
  if (!match) return null;
  const value = Number.parseInt(match[1], 10);
  return value > 0 ? value : null;
}

function readConfidence(span: string): number | null {
  const match = CONFIDENCE_FIELD.exec(span);
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

function readReasoning(span: string): string {
  const match = REASONING_FIELD.exec(span);
  const text = match ? unescapeJsonString(match[1]).trim() : "";
  return text || DEFAULT_AI_REASONING;
}

export function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function interpret(
  rawText: string,
  lastEventDate: ISODateString,
  minBound: number,
  maxBound: number,
): InterpretResult {
  const span = extractJsonSpan(rawText);
  if (span === null) {
    console.error("[AI Interpreter] No JSON object found in provider response.");
    return { ok: false, error: { kind: "NoJsonFound" } };
  }

  const predictedDate = readPredictedDate(span);
  if (predictedDate === null) return { ok: false, error: { kind: "MissingField", field: "predicted_date" } };

  const averageCycleLengthDays = readAverageCycleLength(span);
  if (averageCycleLengthDays === null) {
    return { ok: false, error: { kind: "MissingField", field: "average_cycle_length" } };
  }

  const confidence = readConfidence(span);
  if (confidence === null) return { ok: false, error: { kind: "MissingField", field: "confidence" } };

  const daysSinceLastEvent = daysBetween(lastEventDate, predictedDate);
  const withinExpectedBounds =
    daysSinceLastEvent >= minBound && daysSinceLastEvent <= maxBound + OUTLIER_SLACK_DAYS;

  if (!withinExpectedBounds) {
    console.warn(
      `[AI Interpreter] Predicted date ${predictedDate} is ${daysSinceLastEvent} days after the last log ` +
        `(expected ${minBound}-${maxBound + OUTLIER_SLACK_DAYS}); keeping provider result.`,
    );
  }

  return {
    ok: true,
    prediction: {
      predictedDate,
      averageCycleLengthDays,
      confidence: clampConfidence(confidence),
      reasoning: readReasoning(span),
      daysSinceLastEvent,
      withinExpectedBounds,
    },
  };
}
