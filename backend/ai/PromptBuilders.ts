import type { EventLog } from "../domain/EventLog";
import { DEFAULT_CYCLE_LENGTH_DAYS } from "../domain/EstimationConfig";
import type { ISODateString } from "../domain/CalendarDate";
import { consecutiveIntervals } from "../analytics/CycleStatistics";

// Deterministic prompt construction for the external estimation provider.
// Only start dates and intervals leave the service: ids, owner keys and timestamps are stripped.

export const CONNECTION_TEST_PROMPT = "Respond with ONLY the word: SUCCESS";

function assertNonEmpty<T>(arr: readonly T[], name: string): asserts arr is readonly [T, ...T[]] {
  if (!arr.length) throw new Error(`Expected non-empty ${name}.`);
}

// Expects logs in chronological order.
export function buildCyclePredictionPrompt(sortedLogs: readonly EventLog[], today: ISODateString): string {
  assertNonEmpty(sortedLogs, "logs");

  const intervals = consecutiveIntervals(sortedLogs);
  const history = sortedLogs
    .map((log, i) => `Period ${i + 1}: ${log.startDate}${i > 0 ? ` (${intervals[i - 1]} days from previous)` : ""}`)
    .join("\n");

  const preliminaryMean = intervals.length
    ? intervals.reduce((a, b) => a + b, 0) / intervals.length
    : DEFAULT_CYCLE_LENGTH_DAYS;

  const last = sortedLogs[sortedLogs.length - 1];

  return (
    "TASK: Cycle Start Prediction\n" +
    "ROLE: Analyze logged menstrual cycle start dates and predict the NEXT start date.\n\n" +
    "HISTORICAL PERIOD DATA:\n" +
    history +
    "\n\n" +
    "ANALYSIS CONTEXT:\n" +
    `- Today: ${today}\n` +
    `- Total periods logged: ${sortedLogs.length}\n` +
    `- Cycle lengths observed: ${intervals.length ? `${intervals.join(", ")} days` : "N/A"}\n` +
    `- Average cycle length (preliminary): ${preliminaryMean.toFixed(1)} days\n` +
    `- Last period start date: ${last.startDate}\n\n` +
    "CONSIDER:\n" +
    "1. Overall cycle regularity and consistency.\n" +
    "2. Trends (increasing or decreasing cycle length).\n" +
    "3. Outliers or irregular cycles (filter if needed).\n" +
    "4. Statistical confidence in the prediction.\n\n" +
    "OUTPUT RULES:\n" +
    "- Return ONLY valid JSON. No markdown. No extra text.\n" +
    "- Use ISO 8601 dates (YYYY-MM-DD).\n" +
    "- predicted_date MUST be in the future.\n" +
    "- predicted_date should be about average_cycle_length days after the last period.\n" +
    "- confidence is 0.0-1.0: regular cycles score higher, irregular cycles lower.\n\n" +
    "RETURN JSON SCHEMA:\n" +
    "{\n" +
    '  "predicted_date": "YYYY-MM-DD",\n' +
    '  "average_cycle_length": integer,\n' +
    '  "confidence": number,\n' +
    '  "reasoning": string\n' +
    "}"
  );
}
