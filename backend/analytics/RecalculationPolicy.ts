import type { EventLog } from "../domain/EventLog";
import type { PredictionRecord } from "../domain/PredictionRecord";
import { DAY_MS, dateToMs } from "../domain/CalendarDate";
import { systemClock, type Clock } from "../domain/Clock";

// Decides whether a stored prediction is still usable.
// Consumed by the service layer; the orchestrator never calls it.

export const STALENESS_CEILING_DAYS = 30;

export type RecalculationReason = "missing" | "stale" | "new_data" | "elapsed";

export function recalculationReason(
  current: PredictionRecord | null | undefined,
  logs: readonly EventLog[],
  clock: Clock = systemClock,
): RecalculationReason | null {
  if (!current) return "missing";

  const now = clock().getTime();
  const calculatedAt = Date.parse(current.calculatedAt);

  // Unreadable timestamps count as stale.
  if (!Number.isFinite(calculatedAt)) return "stale";

  if (Math.floor((now - calculatedAt) / DAY_MS) > STALENESS_CEILING_DAYS) return "stale";

  if (logs.some((log) => Date.parse(log.createdAt) > calculatedAt)) return "new_data";

  if (dateToMs(current.predictedDate) < now) return "elapsed";

  return null;
}

export function needsRecalculation(
  current: PredictionRecord | null | undefined,
  logs: readonly EventLog[],
  clock: Clock = systemClock,
): boolean {
  return recalculationReason(current, logs, clock) !== null;
}
