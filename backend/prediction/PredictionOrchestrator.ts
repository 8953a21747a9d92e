import type { EventLog } from "../domain/EventLog";
import type { EstimationConfig } from "../domain/EstimationConfig";
import type { PredictionRecord } from "../domain/PredictionRecord";
import { systemClock, type Clock } from "../domain/Clock";
import { EmptyLogsError, ExternalEstimationError, ParseError } from "../domain/errors";
import { sortLogsChronologically } from "../analytics/CycleStatistics";
import { estimateLocally } from "../analytics/LocalEstimator";
import { interpret } from "../ai/AIResponseInterpreter";
import type { ExternalEstimator } from "../ai/EstimationProvider";

// =========================================================================
// Prediction Orchestrator
//
// Entry point for producing one PredictionRecord.
// - Stateless: safe to share across concurrent callers.
// - No silent downgrade: an eligible, opted-in owner gets an AI-derived answer
//   or an explicit error, never a local estimate in its place.
// - Never retries; retry policy belongs to the caller.
// =========================================================================

export interface PredictOptions {
  readonly signal?: AbortSignal;
}

export function shouldUseExternalEstimator(config: EstimationConfig): boolean {
  return config.aiEligible && config.aiEnabled;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export class PredictionOrchestrator {
  constructor(private readonly clock: Clock = systemClock) {}

  async predictNext(
    logs: readonly EventLog[],
    config: EstimationConfig,
    externalEstimator?: ExternalEstimator,
    options: PredictOptions = {},
  ): Promise<PredictionRecord> {
    if (logs.length === 0) throw new EmptyLogsError();

    const sorted = sortLogsChronologically(logs);

    const record = shouldUseExternalEstimator(config)
      ? await this.predictWithExternal(sorted, config, externalEstimator, options)
      : estimateLocally(sorted, config, this.clock).record;

    return this.stamp(record, config);
  }

  private async predictWithExternal(
    sorted: readonly EventLog[],
    config: EstimationConfig,
    externalEstimator: ExternalEstimator | undefined,
    options: PredictOptions,
  ): Promise<PredictionRecord> {
    if (!externalEstimator) {
      throw new ExternalEstimationError("not_configured", "No external estimator is configured.");
    }

    const { signal } = options;
    if (signal?.aborted) {
      throw new ExternalEstimationError("cancelled", "Estimation request was cancelled.");
    }

    let raw: string;
    try {
      raw = await externalEstimator(sorted, { signal });
    } catch (err) {
      if (err instanceof ExternalEstimationError) throw err;
      if (signal?.aborted || isAbortError(err)) {
        throw new ExternalEstimationError("cancelled", "Estimation request was cancelled.", { cause: err });
      }
      throw new ExternalEstimationError(
        "provider_error",
        `External estimation failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!raw || !raw.trim()) {
      throw new ExternalEstimationError("empty_response", "External estimator returned no text.");
    }

    const last = sorted[sorted.length - 1];
    const result = interpret(raw, last.startDate, config.minCycleLengthDays, config.maxCycleLengthDays);
    if (!result.ok) throw new ParseError(result.error);

    console.log(`[Prediction] AI prediction parsed: ${result.prediction.predictedDate}`);

    return {
      predictedDate: result.prediction.predictedDate,
      averageCycleLengthDays: result.prediction.averageCycleLengthDays,
      confidence: result.prediction.confidence,
      reasoning: result.prediction.reasoning,
      calculatedAt: this.clock().toISOString(),
    };
  }

  private stamp(record: PredictionRecord, config: EstimationConfig): PredictionRecord {
    return {
      ...record,
      calculatedAt: this.clock().toISOString(),
      ...(config.ownerIdentity !== undefined ? { ownerKey: config.ownerIdentity } : {}),
    };
  }
}
