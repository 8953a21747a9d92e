// Engine and storage failures.
// Each class carries a literal `code` so callers can switch on it instead of matching messages.

export class EmptyLogsError extends Error {
  readonly code = "EMPTY_LOGS" as const;

  constructor(message = "No cycle logs available for prediction.") {
    super(message);
    this.name = "EmptyLogsError";
  }
}

export type ExternalEstimationFailureReason =
  | "cancelled"
  | "timeout"
  | "provider_error"
  | "empty_response"
  | "not_configured";

export class ExternalEstimationError extends Error {
  readonly code = "EXTERNAL_ESTIMATION_FAILED" as const;

  constructor(
    readonly reason: ExternalEstimationFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExternalEstimationError";
  }
}

export type RequiredPredictionField = "predicted_date" | "average_cycle_length" | "confidence";

export type ParseFailure =
  | { readonly kind: "NoJsonFound" }
  | { readonly kind: "MissingField"; readonly field: RequiredPredictionField };

export function describeParseFailure(failure: ParseFailure): string {
  switch (failure.kind) {
    case "NoJsonFound":
      return "No JSON object found in estimation response.";
    case "MissingField":
      return `Estimation response is missing or has an invalid "${failure.field}".`;
  }
}

export class ParseError extends Error {
  readonly code = "PARSE_FAILED" as const;

  constructor(readonly failure: ParseFailure) {
    super(describeParseFailure(failure));
    this.name = "ParseError";
  }
}

export class DuplicateLogError extends Error {
  readonly code = "DUPLICATE_LOG" as const;

  constructor(readonly startDate: string) {
    super(`A cycle log already exists for ${startDate}.`);
    this.name = "DuplicateLogError";
  }
}

export class LogNotFoundError extends Error {
  readonly code = "LOG_NOT_FOUND" as const;

  constructor(readonly logId: string) {
    super(`Cycle log not found: ${logId}.`);
    this.name = "LogNotFoundError";
  }
}

export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID" as const;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
