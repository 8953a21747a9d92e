import { z } from "zod";
import { ConfigError } from "../domain/errors";
import {
  DEFAULT_CYCLE_LENGTH_DAYS,
  DEFAULT_MAX_CYCLE_LENGTH_DAYS,
  DEFAULT_MIN_CYCLE_LENGTH_DAYS,
  type EstimationConfig,
  type OwnerSettings,
} from "../domain/EstimationConfig";

// CycleCast Runtime Configuration
//
// Read once from the environment (after dotenv has loaded .env) and validated with zod.
// Nothing else in the backend reads process.env for these values.

const DEFAULT_ORIGINS = [
  "http://localhost:5500",
  "http://127.0.0.1:5500",
  "http://localhost:3000",
  "http://localhost:3001",
];

const csv = z
  .string()
  .optional()
  .transform((val) => (val ? val.split(",").map((s) => s.trim()).filter(Boolean) : []));

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((val) => (val === undefined ? fallback : val === "true" || val === "1"));

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3001),
    NODE_ENV: z.string().default("development"),
    CORS_ORIGINS: csv,
    DATABASE_URL: z.string().min(1).optional(),
    JWT_SECRET: z.string().min(1).default("cyclecast-dev-secret-change-in-production"),
    DISABLE_AUTH: flag(false),
    AI_PREDICTION_ENABLED: flag(true),
    AI_ALLOWED_OWNERS: csv,
    GEMINI_API_KEY: z.string().min(1).optional(),
    GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
    AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    MIN_CYCLE_LENGTH: z.coerce.number().int().positive().default(DEFAULT_MIN_CYCLE_LENGTH_DAYS),
    MAX_CYCLE_LENGTH: z.coerce.number().int().positive().default(DEFAULT_MAX_CYCLE_LENGTH_DAYS),
  })
  .refine((env) => env.MIN_CYCLE_LENGTH <= env.MAX_CYCLE_LENGTH, {
    message: "MIN_CYCLE_LENGTH must not exceed MAX_CYCLE_LENGTH",
    path: ["MIN_CYCLE_LENGTH"],
  });

export interface AppConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly corsOrigins: readonly string[];
  readonly databaseUrl?: string;
  readonly jwtSecret: string;
  readonly disableAuth: boolean;
  readonly ai: {
    readonly enabled: boolean;
    readonly allowedOwners: readonly string[];
    readonly apiKey?: string;
    readonly model: string;
    readonly timeoutMs: number;
  };
  readonly cycle: {
    readonly minLengthDays: number;
    readonly maxLengthDays: number;
    readonly defaultLengthDays: number;
  };
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank variables behave as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`));
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    corsOrigins: e.CORS_ORIGINS.length ? e.CORS_ORIGINS : DEFAULT_ORIGINS,
    databaseUrl: e.DATABASE_URL,
    jwtSecret: e.JWT_SECRET,
    disableAuth: e.DISABLE_AUTH,
    ai: Object.freeze({
      enabled: e.AI_PREDICTION_ENABLED,
      allowedOwners: e.AI_ALLOWED_OWNERS,
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      timeoutMs: e.AI_TIMEOUT_MS,
    }),
    cycle: Object.freeze({
      minLengthDays: e.MIN_CYCLE_LENGTH,
      maxLengthDays: e.MAX_CYCLE_LENGTH,
      defaultLengthDays: DEFAULT_CYCLE_LENGTH_DAYS,
    }),
  });
}

// Applies the identity allow-list and both AI switches, so the orchestrator stays identity-agnostic.
export function buildEstimationConfig(
  config: AppConfig,
  settings: OwnerSettings,
  ownerKey: string,
): EstimationConfig {
  return {
    aiEligible: config.ai.allowedOwners.includes(ownerKey),
    aiEnabled: config.ai.enabled && settings.useAIPrediction,
    minCycleLengthDays: config.cycle.minLengthDays,
    maxCycleLengthDays: config.cycle.maxLengthDays,
    ownerIdentity: ownerKey,
  };
}
