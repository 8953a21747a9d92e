import type { EventLog } from "../domain/EventLog";
import type { Clock } from "../domain/Clock";
import { systemClock } from "../domain/Clock";
import { formatISODate } from "../domain/CalendarDate";
import { buildCyclePredictionPrompt } from "./PromptBuilders";

export interface CompletionOptions {
  readonly signal?: AbortSignal;
}

// Sends a prompt to a generative model and returns its raw text.
export interface EstimationProvider {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
  testConnection(): Promise<boolean>;
}

// Capability handed to the orchestrator: sorted logs in, raw provider text out.
export type ExternalEstimator = (sortedLogs: readonly EventLog[], options: CompletionOptions) => Promise<string>;

export function createExternalEstimator(provider: EstimationProvider, clock: Clock = systemClock): ExternalEstimator {
  return (sortedLogs, options) =>
    provider.complete(buildCyclePredictionPrompt(sortedLogs, formatISODate(clock())), options);
}
