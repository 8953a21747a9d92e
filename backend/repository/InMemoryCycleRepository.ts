import type { EventLog } from "../domain/EventLog";
import { DEFAULT_OWNER_SETTINGS, type OwnerSettings } from "../domain/EstimationConfig";
import type { PredictionRecord } from "../domain/PredictionRecord";
import { compareDates, type ISODateString, type ISODateTimeString } from "../domain/CalendarDate";
import { DuplicateLogError, LogNotFoundError } from "../domain/errors";
import { assertUniqueStartDates, type CycleRepository, type OwnerKey } from "./CycleRepository";

// In-memory repository (reference implementation)
// - For local development, unit tests, and demos.
// - NOT production storage.
//
// Enforcement:
// - One log per owner and calendar day.
// - Stores immutable snapshots (clones) to prevent mutation through shared references.
// - Writes are serialized per owner.

function cloneSnapshot<T>(value: T): T {
  return structuredClone(value);
}

function byStartDate(a: EventLog, b: EventLog): number {
  return compareDates(a.startDate, b.startDate);
}

export class InMemoryCycleRepository implements CycleRepository {
  private readonly logs = new Map<OwnerKey, EventLog[]>();
  private readonly predictions = new Map<OwnerKey, PredictionRecord>();
  private readonly settings = new Map<OwnerKey, OwnerSettings>();

  // Serialize writes per-owner so the same-day check and the insert cannot interleave.
  private readonly ownerQueue = new Map<OwnerKey, Promise<void>>();

  private enqueue<T>(ownerKey: OwnerKey, op: () => Promise<T>): Promise<T> {
    const prev = this.ownerQueue.get(ownerKey) ?? Promise.resolve();

    const next = prev.then(op, op);

    // Ensure queue advances even if an op fails.
    this.ownerQueue.set(ownerKey, next.then(() => undefined, () => undefined));

    return next;
  }

  async listLogsForOwner(ownerKey: OwnerKey): Promise<readonly EventLog[]> {
    const logs = this.logs.get(ownerKey) ?? [];
    return cloneSnapshot([...logs].sort(byStartDate));
  }

  async getLogByDate(ownerKey: OwnerKey, date: ISODateString): Promise<EventLog | undefined> {
    const found = (this.logs.get(ownerKey) ?? []).find((log) => log.startDate === date);
    return found ? cloneSnapshot(found) : undefined;
  }

  async addLog(ownerKey: OwnerKey, log: EventLog): Promise<void> {
    return this.enqueue(ownerKey, async () => {
      const existing = this.logs.get(ownerKey) ?? [];
      if (existing.some((e) => e.startDate === log.startDate)) throw new DuplicateLogError(log.startDate);

      this.logs.set(ownerKey, existing.concat(cloneSnapshot({ ...log, ownerKey })));
    });
  }

  async touchLog(ownerKey: OwnerKey, logId: string, at: ISODateTimeString): Promise<EventLog> {
    return this.enqueue(ownerKey, async () => {
      const existing = this.logs.get(ownerKey) ?? [];
      const index = existing.findIndex((e) => e.id === logId);
      if (index === -1) throw new LogNotFoundError(logId);

      const touched: EventLog = { ...existing[index], updatedAt: at };
      this.logs.set(ownerKey, existing.map((e, i) => (i === index ? touched : e)));
      return cloneSnapshot(touched);
    });
  }

  async deleteLog(ownerKey: OwnerKey, logId: string): Promise<boolean> {
    return this.enqueue(ownerKey, async () => {
      const existing = this.logs.get(ownerKey) ?? [];
      const remaining = existing.filter((e) => e.id !== logId);
      this.logs.set(ownerKey, remaining);
      return remaining.length !== existing.length;
    });
  }

  async getCurrentPrediction(ownerKey: OwnerKey): Promise<PredictionRecord | undefined> {
    const current = this.predictions.get(ownerKey);
    return current ? cloneSnapshot(current) : undefined;
  }

  async savePrediction(ownerKey: OwnerKey, prediction: PredictionRecord): Promise<void> {
    this.predictions.set(ownerKey, cloneSnapshot(prediction));
  }

  async clearPrediction(ownerKey: OwnerKey): Promise<void> {
    this.predictions.delete(ownerKey);
  }

  async getSettings(ownerKey: OwnerKey): Promise<OwnerSettings> {
    return cloneSnapshot(this.settings.get(ownerKey) ?? DEFAULT_OWNER_SETTINGS);
  }

  async saveSettings(ownerKey: OwnerKey, settings: OwnerSettings): Promise<void> {
    this.settings.set(ownerKey, cloneSnapshot(settings));
  }

  async replaceOwnerData(
    ownerKey: OwnerKey,
    logs: readonly EventLog[],
    prediction: PredictionRecord | undefined,
  ): Promise<void> {
    assertUniqueStartDates(logs);

    return this.enqueue(ownerKey, async () => {
      this.logs.set(ownerKey, logs.map((log) => cloneSnapshot({ ...log, ownerKey })));
      if (prediction) {
        this.predictions.set(ownerKey, cloneSnapshot(prediction));
      } else {
        this.predictions.delete(ownerKey);
      }
    });
  }

  async clearOwnerData(ownerKey: OwnerKey): Promise<void> {
    return this.enqueue(ownerKey, async () => {
      this.logs.delete(ownerKey);
      this.predictions.delete(ownerKey);
    });
  }
}
