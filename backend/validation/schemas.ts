import { z } from "zod";
import { toCalendarDate } from "../domain/CalendarDate";
import { RegularityClass } from "../domain/IntervalStatistics";

// CycleCast Input Validation Schemas (Zod)
//
// Validates incoming API payloads and stored plain-data shapes before they reach domain logic.
// These schemas mirror the domain types but enforce runtime constraints
// that TypeScript types alone cannot guarantee.

// --- Shared ---

export const CalendarDateSchema = z
  .string()
  .transform((val, ctx) => {
    const day = toCalendarDate(val);
    if (!day) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Must be a valid calendar date (YYYY-MM-DD)" });
      return z.NEVER;
    }
    return day;
  });

const ISODateTimeSchema = z.string().refine(
  (val: string) => !isNaN(Date.parse(val)),
  { message: "Must be a valid ISO 8601 datetime string" },
);

const OwnerKeySchema = z.string().trim().min(8).max(128);

// --- Plain-data shapes (storage / transport) ---

export const PlainEventLogSchema = z.object({
  id: z.string().min(1),
  startDate: CalendarDateSchema,
  createdAt: ISODateTimeSchema,
  updatedAt: ISODateTimeSchema.optional(),
  ownerKey: z.string().min(1).optional(),
});

export const PlainPredictionSchema = z.object({
  predictedDate: CalendarDateSchema,
  averageCycleLengthDays: z.number().int(),
  confidence: z.number().min(0).max(1),
  calculatedAt: ISODateTimeSchema,
  minCycleLengthDays: z.number().int().optional(),
  maxCycleLengthDays: z.number().int().optional(),
  reasoning: z.string().optional(),
  ownerKey: z.string().min(1).optional(),
});

export const PlainStatisticsSchema = z.object({
  averageLengthDays: z.number().int(),
  minLengthDays: z.number().int(),
  maxLengthDays: z.number().int(),
  standardDeviation: z.number().min(0),
  regularityClass: z.nativeEnum(RegularityClass),
  sampleCount: z.number().int().min(1),
});

export const OwnerSettingsSchema = z.object({
  useAIPrediction: z.boolean(),
});

export const ExportBundleSchema = z.object({
  logs: z.array(PlainEventLogSchema),
  prediction: PlainPredictionSchema.nullable(),
  settings: OwnerSettingsSchema.optional(),
  exportedAt: ISODateTimeSchema.optional(),
});

// --- API request schemas ---

export const CreateLogRequestSchema = z.object({
  startDate: CalendarDateSchema,
});

export const UpdateSettingsRequestSchema = OwnerSettingsSchema.partial().refine(
  (data: { useAIPrediction?: boolean }) => data.useAIPrediction !== undefined,
  { message: "Provide at least one setting to update." },
);

export const TokenRequestSchema = z.object({
  ownerKey: OwnerKeySchema.refine(
    (val: string) => !["demo-user", "undefined", "null"].includes(val),
    { message: "Invalid ownerKey." },
  ),
});

export const RefreshTokenRequestSchema = z.object({
  refreshToken: z.string().min(1),
});

export type CreateLogRequest = z.infer<typeof CreateLogRequestSchema>;
export type UpdateSettingsRequest = z.infer<typeof UpdateSettingsRequestSchema>;
export type ExportBundle = z.infer<typeof ExportBundleSchema>;

// Flattens zod issues into one client-facing message.
export function formatValidationError(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}
