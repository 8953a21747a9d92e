import type { EventLog } from "../domain/EventLog";
import { DEFAULT_OWNER_SETTINGS, type OwnerSettings } from "../domain/EstimationConfig";
import type { PredictionRecord } from "../domain/PredictionRecord";
import type { ISODateString, ISODateTimeString } from "../domain/CalendarDate";
import { DuplicateLogError, LogNotFoundError } from "../domain/errors";
import { query, withTransaction } from "../database/connection";
import { assertUniqueStartDates, type CycleRepository, type OwnerKey } from "./CycleRepository";

// =========================================================================
// PostgreSQL Cycle Repository (CycleCast)
//
// Production storage backend. Implements the same CycleRepository interface
// as InMemoryCycleRepository, preserving all invariants:
// - UNIQUE(owner_key, start_date) backs the one-log-per-day rule
// - One row per owner in cycle_predictions (upsert replaces)
// Dates are read back through to_char so the pg driver never shifts them by timezone.
// =========================================================================

// --- Row ↔ Domain mapping ---

interface LogRow {
  [key: string]: unknown;
  id: string;
  owner_key: string;
  start_date: string;
  created_at: Date;
  updated_at: Date | null;
}

interface PredictionRow {
  [key: string]: unknown;
  owner_key: string;
  predicted_date: string;
  average_cycle_length: number;
  confidence: number;
  calculated_at: Date;
  min_cycle_length: number | null;
  max_cycle_length: number | null;
  reasoning: string | null;
}

interface SettingsRow {
  [key: string]: unknown;
  use_ai_prediction: boolean;
}

const LOG_COLUMNS = `id, owner_key, to_char(start_date, 'YYYY-MM-DD') AS start_date, created_at, updated_at`;

const PREDICTION_COLUMNS =
  `owner_key, to_char(predicted_date, 'YYYY-MM-DD') AS predicted_date, average_cycle_length, ` +
  `confidence, calculated_at, min_cycle_length, max_cycle_length, reasoning`;

const UNIQUE_VIOLATION = "23505";

function rowToLog(row: LogRow): EventLog {
  return {
    id: row.id,
    startDate: row.start_date,
    createdAt: row.created_at.toISOString(),
    ...(row.updated_at ? { updatedAt: row.updated_at.toISOString() } : {}),
    ownerKey: row.owner_key,
  };
}

function rowToPrediction(row: PredictionRow): PredictionRecord {
  return {
    predictedDate: row.predicted_date,
    averageCycleLengthDays: row.average_cycle_length,
    confidence: Number(row.confidence),
    calculatedAt: row.calculated_at.toISOString(),
    ...(row.min_cycle_length !== null ? { minCycleLengthDays: row.min_cycle_length } : {}),
    ...(row.max_cycle_length !== null ? { maxCycleLengthDays: row.max_cycle_length } : {}),
    ...(row.reasoning !== null ? { reasoning: row.reasoning } : {}),
    ownerKey: row.owner_key,
  };
}

function predictionParams(ownerKey: OwnerKey, p: PredictionRecord): unknown[] {
  return [
    ownerKey,
    p.predictedDate,
    p.averageCycleLengthDays,
    p.confidence,
    p.calculatedAt,
    p.minCycleLengthDays ?? null,
    p.maxCycleLengthDays ?? null,
    p.reasoning ?? null,
  ];
}

const UPSERT_PREDICTION = `
  INSERT INTO cycle_predictions
    (owner_key, predicted_date, average_cycle_length, confidence, calculated_at,
     min_cycle_length, max_cycle_length, reasoning)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (owner_key) DO UPDATE SET
    predicted_date = EXCLUDED.predicted_date,
    average_cycle_length = EXCLUDED.average_cycle_length,
    confidence = EXCLUDED.confidence,
    calculated_at = EXCLUDED.calculated_at,
    min_cycle_length = EXCLUDED.min_cycle_length,
    max_cycle_length = EXCLUDED.max_cycle_length,
    reasoning = EXCLUDED.reasoning`;

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION;
}

export class PostgresCycleRepository implements CycleRepository {

  async listLogsForOwner(ownerKey: OwnerKey): Promise<readonly EventLog[]> {
    const result = await query<LogRow>(
      `SELECT ${LOG_COLUMNS} FROM cycle_logs WHERE owner_key = $1 ORDER BY start_date ASC`,
      [ownerKey],
    );
    return result.rows.map(rowToLog);
  }

  async getLogByDate(ownerKey: OwnerKey, date: ISODateString): Promise<EventLog | undefined> {
    const result = await query<LogRow>(
      `SELECT ${LOG_COLUMNS} FROM cycle_logs WHERE owner_key = $1 AND start_date = $2::date`,
      [ownerKey, date],
    );
    return result.rows.length ? rowToLog(result.rows[0]) : undefined;
  }

  async addLog(ownerKey: OwnerKey, log: EventLog): Promise<void> {
    try {
      await query(
        `INSERT INTO cycle_logs (id, owner_key, start_date, created_at, updated_at)
         VALUES ($1, $2, $3::date, $4, $5)`,
        [log.id, ownerKey, log.startDate, log.createdAt, log.updatedAt ?? null],
      );
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateLogError(log.startDate);
      throw err;
    }
  }

  async touchLog(ownerKey: OwnerKey, logId: string, at: ISODateTimeString): Promise<EventLog> {
    const result = await query<LogRow>(
      `UPDATE cycle_logs SET updated_at = $3
       WHERE owner_key = $1 AND id = $2
       RETURNING ${LOG_COLUMNS}`,
      [ownerKey, logId, at],
    );
    if (!result.rows.length) throw new LogNotFoundError(logId);
    return rowToLog(result.rows[0]);
  }

  async deleteLog(ownerKey: OwnerKey, logId: string): Promise<boolean> {
    const result = await query(`DELETE FROM cycle_logs WHERE owner_key = $1 AND id = $2`, [ownerKey, logId]);
    return (result.rowCount ?? 0) > 0;
  }

  async getCurrentPrediction(ownerKey: OwnerKey): Promise<PredictionRecord | undefined> {
    const result = await query<PredictionRow>(
      `SELECT ${PREDICTION_COLUMNS} FROM cycle_predictions WHERE owner_key = $1`,
      [ownerKey],
    );
    return result.rows.length ? rowToPrediction(result.rows[0]) : undefined;
  }

  async savePrediction(ownerKey: OwnerKey, prediction: PredictionRecord): Promise<void> {
    await query(UPSERT_PREDICTION, predictionParams(ownerKey, prediction));
  }

  async clearPrediction(ownerKey: OwnerKey): Promise<void> {
    await query(`DELETE FROM cycle_predictions WHERE owner_key = $1`, [ownerKey]);
  }

  async getSettings(ownerKey: OwnerKey): Promise<OwnerSettings> {
    const result = await query<SettingsRow>(
      `SELECT use_ai_prediction FROM owner_settings WHERE owner_key = $1`,
      [ownerKey],
    );
    if (!result.rows.length) return DEFAULT_OWNER_SETTINGS;
    return { useAIPrediction: result.rows[0].use_ai_prediction };
  }

  async saveSettings(ownerKey: OwnerKey, settings: OwnerSettings): Promise<void> {
    await query(
      `INSERT INTO owner_settings (owner_key, use_ai_prediction, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (owner_key) DO UPDATE SET use_ai_prediction = EXCLUDED.use_ai_prediction, updated_at = NOW()`,
      [ownerKey, settings.useAIPrediction],
    );
  }

  async replaceOwnerData(
    ownerKey: OwnerKey,
    logs: readonly EventLog[],
    prediction: PredictionRecord | undefined,
  ): Promise<void> {
    assertUniqueStartDates(logs);

    await withTransaction(async (client) => {
      await client.query(`DELETE FROM cycle_logs WHERE owner_key = $1`, [ownerKey]);
      await client.query(`DELETE FROM cycle_predictions WHERE owner_key = $1`, [ownerKey]);

      for (const log of logs) {
        await client.query(
          `INSERT INTO cycle_logs (id, owner_key, start_date, created_at, updated_at)
           VALUES ($1, $2, $3::date, $4, $5)`,
          [log.id, ownerKey, log.startDate, log.createdAt, log.updatedAt ?? null],
        );
      }

      if (prediction) await client.query(UPSERT_PREDICTION, predictionParams(ownerKey, prediction));
    });
  }

  async clearOwnerData(ownerKey: OwnerKey): Promise<void> {
    await withTransaction(async (client) => {
      await client.query(`DELETE FROM cycle_logs WHERE owner_key = $1`, [ownerKey]);
      await client.query(`DELETE FROM cycle_predictions WHERE owner_key = $1`, [ownerKey]);
    });
  }
}
