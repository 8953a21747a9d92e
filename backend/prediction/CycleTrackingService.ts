import { randomUUID } from "crypto";
import type { EventLog } from "../domain/EventLog";
import type { IntervalStatistics } from "../domain/IntervalStatistics";
import type { PredictionRecord } from "../domain/PredictionRecord";
import type { OwnerSettings } from "../domain/EstimationConfig";
import { systemClock, type Clock } from "../domain/Clock";
import { formatISODate, toCalendarDate, type ISODateString } from "../domain/CalendarDate";
import { DuplicateLogError, ExternalEstimationError, ParseError } from "../domain/errors";
import { computeStatistics } from "../analytics/CycleStatistics";
import { recalculationReason } from "../analytics/RecalculationPolicy";
import type { ExternalEstimator } from "../ai/EstimationProvider";
import type { AppConfig } from "../config/AppConfig";
import { buildEstimationConfig } from "../config/AppConfig";
import type { CycleRepository, OwnerKey } from "../repository/CycleRepository";
import { logFromPlain, logToPlain, predictionFromPlain, predictionToPlain } from "../validation/serialization";
import type { PlainEventLog, PlainPrediction } from "../validation/serialization";
import { ExportBundleSchema } from "../validation/schemas";
import { PredictionOrchestrator, type PredictOptions } from "./PredictionOrchestrator";

// =========================================================================
// Cycle Tracking Service
//
// Owner-scoped layer around the repository and the prediction engine.
// Reads go through the recalculation policy; writes recalculate eagerly.
// =========================================================================

export interface CycleTrackingDependencies {
  repository: CycleRepository;
  config: AppConfig;
  orchestrator?: PredictionOrchestrator;
  externalEstimator?: ExternalEstimator;
  clock?: Clock;
  idFactory?: () => string;
}

export interface LogSummary {
  totalLogs: number;
  firstLogDate?: ISODateString;
  lastLogDate?: ISODateString;
}

export interface StatisticsReport {
  statistics?: IntervalStatistics;
  summary: LogSummary;
}

// A log write succeeds even when the follow-up estimation fails.
// The failure is reported here and the next read retries it.
export interface LogMutationResult<T> {
  result: T;
  prediction?: PredictionRecord;
  predictionError?: string;
}

export interface ExportBundlePayload {
  logs: PlainEventLog[];
  prediction: PlainPrediction | null;
  settings: OwnerSettings;
  exportedAt: string;
}

export function shortKey(ownerKey: OwnerKey): string {
  return ownerKey.substring(0, 8);
}

function isEstimationFailure(err: unknown): err is ExternalEstimationError | ParseError {
  return err instanceof ExternalEstimationError || err instanceof ParseError;
}

export class CycleTrackingService {
  private readonly repository: CycleRepository;
  private readonly config: AppConfig;
  private readonly orchestrator: PredictionOrchestrator;
  private readonly externalEstimator?: ExternalEstimator;
  private readonly clock: Clock;
  private readonly idFactory: () => string;

  constructor(deps: CycleTrackingDependencies) {
    this.repository = deps.repository;
    this.config = deps.config;
    this.clock = deps.clock ?? systemClock;
    this.orchestrator = deps.orchestrator ?? new PredictionOrchestrator(this.clock);
    this.externalEstimator = deps.externalEstimator;
    this.idFactory = deps.idFactory ?? randomUUID;
  }

  // --- Logs ---

  async listLogs(ownerKey: OwnerKey): Promise<readonly EventLog[]> {
    return this.repository.listLogsForOwner(ownerKey);
  }

  async addLog(ownerKey: OwnerKey, date: ISODateString | Date): Promise<LogMutationResult<EventLog>> {
    const startDate = typeof date === "string" ? toCalendarDate(date) : formatISODate(date);
    if (!startDate) throw new RangeError(`Not a calendar date: ${String(date)}`);

    if (await this.repository.getLogByDate(ownerKey, startDate)) {
      throw new DuplicateLogError(startDate);
    }

    const log: EventLog = {
      id: this.idFactory(),
      startDate,
      createdAt: this.clock().toISOString(),
      ownerKey,
    };
    await this.repository.addLog(ownerKey, log);
    console.log(`[CycleCast] Log ${startDate} added for ${shortKey(ownerKey)}...`);

    return { result: log, ...(await this.refreshAfterWrite(ownerKey)) };
  }

  // Marks a log as re-confirmed. The start day is unchanged, so the prediction stands.
  async touchLog(ownerKey: OwnerKey, logId: string): Promise<EventLog> {
    return this.repository.touchLog(ownerKey, logId, this.clock().toISOString());
  }

  async deleteLog(ownerKey: OwnerKey, logId: string): Promise<LogMutationResult<boolean>> {
    const deleted = await this.repository.deleteLog(ownerKey, logId);
    if (!deleted) return { result: false };

    return { result: true, ...(await this.refreshAfterWrite(ownerKey)) };
  }

  // --- Statistics ---

  async getStatistics(ownerKey: OwnerKey): Promise<StatisticsReport> {
    const logs = await this.repository.listLogsForOwner(ownerKey);
    const statistics = computeStatistics(logs, this.config.cycle.minLengthDays, this.config.cycle.maxLengthDays);

    const summary: LogSummary = { totalLogs: logs.length };
    if (logs.length) {
      summary.firstLogDate = logs[0].startDate;
      summary.lastLogDate = logs[logs.length - 1].startDate;
    }

    return statistics ? { statistics, summary } : { summary };
  }

  // --- Prediction ---

  async getPrediction(ownerKey: OwnerKey, options: PredictOptions = {}): Promise<PredictionRecord | undefined> {
    const logs = await this.repository.listLogsForOwner(ownerKey);
    const current = await this.repository.getCurrentPrediction(ownerKey);

    if (!logs.length) {
      if (current) await this.repository.clearPrediction(ownerKey);
      return undefined;
    }

    const reason = recalculationReason(current, logs, this.clock);
    if (!reason && current) return current;

    console.log(`[Prediction] Recalculating for ${shortKey(ownerKey)}... (${reason ?? "missing"})`);
    return this.computeAndSave(ownerKey, logs, options);
  }

  async recalculate(ownerKey: OwnerKey, options: PredictOptions = {}): Promise<PredictionRecord | undefined> {
    const logs = await this.repository.listLogsForOwner(ownerKey);
    if (!logs.length) {
      await this.repository.clearPrediction(ownerKey);
      return undefined;
    }
    return this.computeAndSave(ownerKey, logs, options);
  }

  // --- Settings ---

  async getSettings(ownerKey: OwnerKey): Promise<OwnerSettings> {
    return this.repository.getSettings(ownerKey);
  }

  async updateSettings(ownerKey: OwnerKey, patch: Partial<OwnerSettings>): Promise<OwnerSettings> {
    const current = await this.repository.getSettings(ownerKey);
    const next: OwnerSettings = { ...current, ...patch };
    await this.repository.saveSettings(ownerKey, next);

    // A different estimation path applies now; the stored prediction no longer reflects it.
    if (next.useAIPrediction !== current.useAIPrediction) {
      await this.repository.clearPrediction(ownerKey);
    }
    return next;
  }

  // --- Export / import ---

  async exportData(ownerKey: OwnerKey): Promise<ExportBundlePayload> {
    const [logs, prediction, settings] = await Promise.all([
      this.repository.listLogsForOwner(ownerKey),
      this.repository.getCurrentPrediction(ownerKey),
      this.repository.getSettings(ownerKey),
    ]);

    return {
      logs: logs.map(logToPlain),
      prediction: prediction ? predictionToPlain(prediction) : null,
      settings,
      exportedAt: this.clock().toISOString(),
    };
  }

  // Throws ZodError on a malformed bundle and leaves existing data untouched.
  async importData(ownerKey: OwnerKey, bundle: unknown): Promise<{ importedLogs: number }> {
    const parsed = ExportBundleSchema.parse(bundle);

    // Log ids are unique across owners, so imported logs get fresh ones.
    const logs = parsed.logs.map((plain) => ({ ...logFromPlain(plain), id: this.idFactory(), ownerKey }));
    const prediction = parsed.prediction ? { ...predictionFromPlain(parsed.prediction), ownerKey } : undefined;

    await this.repository.replaceOwnerData(ownerKey, logs, prediction);
    if (parsed.settings) await this.repository.saveSettings(ownerKey, parsed.settings);

    console.log(`[CycleCast] Imported ${logs.length} log(s) for ${shortKey(ownerKey)}...`);
    return { importedLogs: logs.length };
  }

  async clearData(ownerKey: OwnerKey): Promise<void> {
    await this.repository.clearOwnerData(ownerKey);
    console.log(`[CycleCast] Cleared data for ${shortKey(ownerKey)}...`);
  }

  // --- Internals ---

  private async computeAndSave(
    ownerKey: OwnerKey,
    logs: readonly EventLog[],
    options: PredictOptions,
  ): Promise<PredictionRecord> {
    const settings = await this.repository.getSettings(ownerKey);
    const estimation = buildEstimationConfig(this.config, settings, ownerKey);

    const prediction = await this.orchestrator.predictNext(logs, estimation, this.externalEstimator, options);
    await this.repository.savePrediction(ownerKey, prediction);
    return prediction;
  }

  private async refreshAfterWrite(
    ownerKey: OwnerKey,
  ): Promise<{ prediction?: PredictionRecord; predictionError?: string }> {
    try {
      const prediction = await this.recalculate(ownerKey);
      return prediction ? { prediction } : {};
    } catch (err) {
      if (!isEstimationFailure(err)) throw err;
      console.warn(`[Prediction] Recalculation after write failed for ${shortKey(ownerKey)}...:`, err.message);
      // Next read recomputes from scratch.
      await this.repository.clearPrediction(ownerKey);
      return { predictionError: err.message };
    }
  }
}
