import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import type { PredictionRecord } from "../domain/PredictionRecord";
import { RegularityClass } from "../domain/IntervalStatistics";
import {
  logFromPlain,
  logToPlain,
  predictionFromPlain,
  predictionToPlain,
  statisticsFromPlain,
  statisticsToPlain,
} from "./serialization";

describe("logs", () => {
  it("omits absent optional fields", () => {
    const plain = logToPlain({ id: "a", startDate: "2025-01-01", createdAt: "2025-01-01T08:00:00.000Z" });

    expect(plain).toEqual({ id: "a", startDate: "2025-01-01", createdAt: "2025-01-01T08:00:00.000Z" });
    expect(Object.keys(plain)).toEqual(["id", "startDate", "createdAt"]);
  });

  it("reads back what it writes", () => {
    const log = {
      id: "a",
      startDate: "2025-01-01",
      createdAt: "2025-01-01T08:00:00.000Z",
      updatedAt: "2025-01-02T08:00:00.000Z",
      ownerKey: "owner-0001",
    };
    expect(logFromPlain(logToPlain(log))).toEqual(log);
  });

  it("normalises date-time start dates to the calendar day", () => {
    expect(logFromPlain({ id: "a", startDate: "2025-01-01T22:00:00Z", createdAt: "2025-01-01T08:00:00.000Z" }).startDate).toBe(
      "2025-01-01",
    );
  });

  it("rejects impossible dates", () => {
    expect(() => logFromPlain({ id: "a", startDate: "2025-02-30", createdAt: "2025-01-01T08:00:00.000Z" })).toThrow(
      ZodError,
    );
  });
});

describe("predictions", () => {
  const record: PredictionRecord = {
    predictedDate: "2025-03-26",
    averageCycleLengthDays: 28,
    confidence: 0.85,
    calculatedAt: "2025-03-01T12:00:00.000Z",
    minCycleLengthDays: 27,
    maxCycleLengthDays: 29,
    reasoning: "Based on 2 cycle(s) averaging 28 days.",
  };

  it("reads back what it writes", () => {
    expect(predictionFromPlain(predictionToPlain(record))).toEqual(record);
  });

  it("omits absent optional fields", () => {
    const plain = predictionToPlain({
      predictedDate: "2025-03-26",
      averageCycleLengthDays: 28,
      confidence: 0.3,
      calculatedAt: "2025-03-01T12:00:00.000Z",
    });
    expect(Object.keys(plain)).toEqual(["predictedDate", "averageCycleLengthDays", "confidence", "calculatedAt"]);
  });

  it("rejects confidence outside the unit interval", () => {
    expect(() => predictionFromPlain({ ...predictionToPlain(record), confidence: 1.5 })).toThrow(ZodError);
  });

  it("rejects missing required fields", () => {
    expect(() => predictionFromPlain({ predictedDate: "2025-03-26" })).toThrow(ZodError);
  });
});

describe("statistics", () => {
  it("keeps the regularity label as text", () => {
    const plain = statisticsToPlain({
      averageLengthDays: 28,
      minLengthDays: 27,
      maxLengthDays: 29,
      standardDeviation: 1,
      regularityClass: RegularityClass.VeryRegular,
      sampleCount: 2,
    });

    expect(plain.regularityClass).toBe("Very Regular");
    expect(statisticsFromPlain(plain).regularityClass).toBe(RegularityClass.VeryRegular);
  });

  it("rejects unknown regularity labels", () => {
    expect(() =>
      statisticsFromPlain({
        averageLengthDays: 28,
        minLengthDays: 27,
        maxLengthDays: 29,
        standardDeviation: 1,
        regularityClass: "Chaotic",
        sampleCount: 2,
      }),
    ).toThrow(ZodError);
  });
});
