// Per-call estimation settings. Immutable for the duration of one prediction.

export const DEFAULT_MIN_CYCLE_LENGTH_DAYS = 21;
export const DEFAULT_MAX_CYCLE_LENGTH_DAYS = 35;
export const DEFAULT_CYCLE_LENGTH_DAYS = 28;

// Intervals up to maxCycleLengthDays + this slack still count as real cycles.
export const OUTLIER_SLACK_DAYS = 10;

export interface EstimationConfig {
  // Identity policy (allow-list) already applied by the caller.
  readonly aiEligible: boolean;

  // Owner opt-in combined with the deployment-wide switch.
  readonly aiEnabled: boolean;

  readonly minCycleLengthDays: number;
  readonly maxCycleLengthDays: number;
  readonly ownerIdentity?: string;
}

export function defaultEstimationConfig(overrides: Partial<EstimationConfig> = {}): EstimationConfig {
  return {
    aiEligible: false,
    aiEnabled: false,
    minCycleLengthDays: DEFAULT_MIN_CYCLE_LENGTH_DAYS,
    maxCycleLengthDays: DEFAULT_MAX_CYCLE_LENGTH_DAYS,
    ...overrides,
  };
}

export interface OwnerSettings {
  readonly useAIPrediction: boolean;
}

export const DEFAULT_OWNER_SETTINGS: OwnerSettings = {
  useAIPrediction: true,
};
