import { describe, it, expect } from "vitest";
import type { EventLog } from "../domain/EventLog";
import { buildCyclePredictionPrompt } from "./PromptBuilders";

function makeLogs(...dates: string[]): EventLog[] {
  return dates.map((startDate, i) => ({
    id: `log-${i}`,
    startDate,
    createdAt: `${startDate}T08:00:00.000Z`,
    ownerKey: "owner-abcdefgh",
  }));
}

describe("buildCyclePredictionPrompt", () => {
  it("lists each start date with its interval", () => {
    const lines = buildCyclePredictionPrompt(makeLogs("2025-01-01", "2025-01-29", "2025-02-26"), "2025-03-01").split("\n");

    expect(lines).toContain("Period 1: 2025-01-01");
    expect(lines).toContain("Period 2: 2025-01-29 (28 days from previous)");
    expect(lines).toContain("Period 3: 2025-02-26 (28 days from previous)");
    expect(lines).toContain("- Today: 2025-03-01");
    expect(lines).toContain("- Total periods logged: 3");
    expect(lines).toContain("- Cycle lengths observed: 28, 28 days");
    expect(lines).toContain("- Average cycle length (preliminary): 28.0 days");
    expect(lines).toContain("- Last period start date: 2025-02-26");
  });

  it("falls back to the default mean for one log", () => {
    const lines = buildCyclePredictionPrompt(makeLogs("2025-03-10"), "2025-03-12").split("\n");

    expect(lines).toContain("- Cycle lengths observed: N/A");
    expect(lines).toContain("- Average cycle length (preliminary): 28.0 days");
  });

  it("shows the mean to one decimal", () => {
    const lines = buildCyclePredictionPrompt(makeLogs("2025-01-01", "2025-01-29", "2025-02-27"), "2025-03-01").split("\n");
    expect(lines).toContain("- Average cycle length (preliminary): 28.5 days");
  });

  it("asks for the response schema", () => {
    const prompt = buildCyclePredictionPrompt(makeLogs("2025-03-10"), "2025-03-12");

    expect(prompt).toContain('"predicted_date": "YYYY-MM-DD"');
    expect(prompt).toContain('"average_cycle_length": integer');
    expect(prompt).toContain('"confidence": number');
    expect(prompt).toContain('"reasoning": string');
  });

  it("leaves identifiers out", () => {
    const prompt = buildCyclePredictionPrompt(makeLogs("2025-01-01", "2025-01-29"), "2025-02-01");

    expect(prompt).not.toContain("log-0");
    expect(prompt).not.toContain("owner-abcdefgh");
  });

  it("rejects an empty list", () => {
    expect(() => buildCyclePredictionPrompt([], "2025-03-01")).toThrow("Expected non-empty logs.");
  });
});
