import type { EventLog } from "../domain/EventLog";
import type { OwnerSettings } from "../domain/EstimationConfig";
import type { PredictionRecord } from "../domain/PredictionRecord";
import type { ISODateString, ISODateTimeString } from "../domain/CalendarDate";
import { DuplicateLogError } from "../domain/errors";

// Repository Boundary (CycleCast)
// - This is the ONLY layer that reads/writes logs, predictions and owner settings.
// - No estimation logic here; the engine only ever receives lists from it.
//
// Invariants every implementation enforces:
// - At most one log per (ownerKey, startDate) calendar day.
// - Logs are immutable except for `updatedAt`.
// - At most one current prediction per owner; saving replaces it.

export type OwnerKey = string;

export interface CycleRepository {
  // Chronological (oldest first).
  listLogsForOwner(ownerKey: OwnerKey): Promise<readonly EventLog[]>;

  getLogByDate(ownerKey: OwnerKey, date: ISODateString): Promise<EventLog | undefined>;

  // Rejects a second log on the same calendar day with DuplicateLogError.
  addLog(ownerKey: OwnerKey, log: EventLog): Promise<void>;

  // Sets updatedAt; LogNotFoundError when the id is unknown for this owner.
  touchLog(ownerKey: OwnerKey, logId: string, at: ISODateTimeString): Promise<EventLog>;

  deleteLog(ownerKey: OwnerKey, logId: string): Promise<boolean>;

  getCurrentPrediction(ownerKey: OwnerKey): Promise<PredictionRecord | undefined>;
  savePrediction(ownerKey: OwnerKey, prediction: PredictionRecord): Promise<void>;
  clearPrediction(ownerKey: OwnerKey): Promise<void>;

  // Defaults when nothing was stored yet.
  getSettings(ownerKey: OwnerKey): Promise<OwnerSettings>;
  saveSettings(ownerKey: OwnerKey, settings: OwnerSettings): Promise<void>;

  // Atomic swap of an owner's logs and prediction (import).
  replaceOwnerData(ownerKey: OwnerKey, logs: readonly EventLog[], prediction: PredictionRecord | undefined): Promise<void>;

  // Removes logs and prediction. Settings survive.
  clearOwnerData(ownerKey: OwnerKey): Promise<void>;
}

export function assertUniqueStartDates(logs: readonly EventLog[]): void {
  const seen = new Set<ISODateString>();
  for (const log of logs) {
    if (seen.has(log.startDate)) {
      throw new DuplicateLogError(log.startDate);
    }
    seen.add(log.startDate);
  }
}
