import { describe, it, expect } from "vitest";
import type { EventLog } from "../domain/EventLog";
import { defaultEstimationConfig } from "../domain/EstimationConfig";
import { RegularityClass } from "../domain/IntervalStatistics";
import { EmptyLogsError } from "../domain/errors";
import { INSUFFICIENT_DATA_REASONING, estimateLocally } from "./LocalEstimator";

const NOW = new Date("2025-03-01T12:00:00.000Z");
const clock = () => NOW;
const config = defaultEstimationConfig();

function makeLogs(...dates: string[]): EventLog[] {
  return dates.map((startDate, i) => ({ id: `log-${i}`, startDate, createdAt: `${startDate}T08:00:00.000Z` }));
}

describe("estimateLocally", () => {
  it("projects the average interval from the last start", () => {
    const { record, statistics } = estimateLocally(makeLogs("2025-01-01", "2025-01-29", "2025-02-26"), config, clock);

    expect(record).toEqual({
      predictedDate: "2025-03-26",
      averageCycleLengthDays: 28,
      confidence: 0.85,
      calculatedAt: "2025-03-01T12:00:00.000Z",
      minCycleLengthDays: 28,
      maxCycleLengthDays: 28,
      reasoning: "Based on 2 cycle(s) averaging 28 days. Your cycle is Very Regular.",
    });
    expect(statistics?.regularityClass).toBe(RegularityClass.VeryRegular);
  });

  it("uses the default cycle for a single log", () => {
    const { record, statistics } = estimateLocally(makeLogs("2025-03-10"), config, clock);

    expect(statistics).toBeUndefined();
    expect(record).toEqual({
      predictedDate: "2025-04-07",
      averageCycleLengthDays: 28,
      confidence: 0.3,
      calculatedAt: "2025-03-01T12:00:00.000Z",
      reasoning: INSUFFICIENT_DATA_REASONING,
    });
  });

  it("uses the default cycle when every interval is implausible", () => {
    const { record } = estimateLocally(makeLogs("2025-01-01", "2025-01-05"), config, clock);

    expect(record.predictedDate).toBe("2025-02-02");
    expect(record.confidence).toBe(0.3);
  });

  it("asks for more data after a single interval", () => {
    const { record } = estimateLocally(makeLogs("2025-01-01", "2025-01-29"), config, clock);

    expect(record.reasoning).toBe(
      "Based on 1 cycle(s) averaging 28 days. Your cycle is Very Regular. Log at least 3 periods for reliable predictions.",
    );
  });

  it("reports ignored intervals and still projects from the latest log", () => {
    const { record } = estimateLocally(makeLogs("2025-01-01", "2025-01-29", "2025-05-01"), config, clock);

    expect(record.predictedDate).toBe("2025-05-29");
    expect(record.reasoning).toBe(
      "Based on 1 cycle(s) averaging 28 days. Your cycle is Very Regular. " +
        "1 interval(s) outside the expected range were ignored. Log at least 3 periods for reliable predictions.",
    );
  });

  it("accepts unsorted input", () => {
    const { record } = estimateLocally(makeLogs("2025-02-26", "2025-01-01", "2025-01-29"), config, clock);
    expect(record.predictedDate).toBe("2025-03-26");
  });

  it("rejects an empty list", () => {
    expect(() => estimateLocally([], config, clock)).toThrow(EmptyLogsError);
  });
});
