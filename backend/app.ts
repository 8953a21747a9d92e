import express, { Express, Request, RequestHandler, Response, NextFunction } from "express";
import cors from "cors";
import { ZodError } from "zod";

import type { AppConfig } from "./config/AppConfig";
import type { CycleTrackingService } from "./prediction/CycleTrackingService";
import type { EstimationProvider } from "./ai/EstimationProvider";
import type { PredictionRecord } from "./domain/PredictionRecord";
import { formatISODate } from "./domain/CalendarDate";
import { systemClock, type Clock } from "./domain/Clock";
import {
  DuplicateLogError,
  EmptyLogsError,
  ExternalEstimationError,
  LogNotFoundError,
  ParseError,
} from "./domain/errors";
import { confidenceLabel, daysUntil, predictionWindow } from "./analytics/PredictionWindow";
import { logToPlain, predictionToPlain, statisticsToPlain } from "./validation/serialization";
import {
  CreateLogRequestSchema,
  UpdateSettingsRequestSchema,
  formatValidationError,
} from "./validation/schemas";

import { createAuthMiddleware, createOwnerGuard, createTokenHandlers } from "./middleware/auth";
import { generalRateLimiter, predictionRateLimiter, logCreationRateLimiter } from "./middleware/rateLimiter";
import { createAuditMiddleware, recordAudit, type AuditWriter } from "./middleware/audit";

export const PREDICTION_UNAVAILABLE_MESSAGE = "Prediction unavailable. Please try again.";

export interface AppDependencies {
  config: AppConfig;
  service: CycleTrackingService;
  auditWriter: AuditWriter;
  provider?: EstimationProvider;
  clock?: Clock;
  // Off in tests that fire many requests from one key.
  rateLimiting?: boolean;
}

// ---- OwnerKey validation helper (Privacy-critical) ----
export function validateOwnerKey(ownerKey: string | undefined): string | null {
  if (!ownerKey) return null;
  const trimmed = ownerKey.trim();
  // Reject empty, 'demo-user', 'undefined', 'null', or suspiciously short keys
  if (!trimmed || trimmed.length < 8 || trimmed === "demo-user" || trimmed === "undefined" || trimmed === "null") {
    return null;
  }
  return trimmed;
}

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

// Aborts in-flight estimation when the client goes away.
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

// Maps engine and repository errors to HTTP status codes.
export function errorStatus(err: unknown): { status: number; message: string } {
  if (err instanceof EmptyLogsError) return { status: 400, message: err.message };
  if (err instanceof ZodError) return { status: 400, message: formatValidationError(err) };
  if (err instanceof DuplicateLogError) return { status: 409, message: err.message };
  if (err instanceof LogNotFoundError) return { status: 404, message: err.message };
  if (err instanceof ExternalEstimationError || err instanceof ParseError) {
    return { status: 502, message: PREDICTION_UNAVAILABLE_MESSAGE };
  }
  return { status: 500, message: "Internal server error." };
}

export function createApp(deps: AppDependencies): Express {
  const { config, service, auditWriter, provider } = deps;
  const clock = deps.clock ?? systemClock;
  const rateLimiting = deps.rateLimiting ?? true;
  const app = express();

  // ---- CORS ----
  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (config.corsOrigins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  }));

  app.use(express.json({ limit: "1mb" }));

  // ---- Privacy headers (prevent response caching of health data) ----
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  // ---- Middleware stack ----
  if (rateLimiting) app.use(generalRateLimiter);
  app.use(createAuthMiddleware(config));

  const requireOwnerMatch = createOwnerGuard(config);
  const { handleTokenRequest, handleTokenRefresh } = createTokenHandlers(config);
  const passThrough: RequestHandler = (_req, _res, next) => next();
  const predictionLimit = rateLimiting ? predictionRateLimiter : passThrough;
  const logCreationLimit = rateLimiting ? logCreationRateLimiter : passThrough;

  // Every owner-scoped route: valid key, and the caller's own data only.
  app.use("/api/cycles/:ownerKey", (req, res, next) => {
    if (!validateOwnerKey(req.params.ownerKey)) {
      res.status(400).json({ error: "Valid ownerKey required." });
      return;
    }
    next();
  }, requireOwnerMatch);

  // After the owner guard, so rejected requests are not audited.
  app.use(createAuditMiddleware(auditWriter));

  function presentPrediction(prediction: PredictionRecord | undefined) {
    if (!prediction) return { prediction: null };
    return {
      prediction: predictionToPlain(prediction),
      window: predictionWindow(prediction),
      confidenceLabel: confidenceLabel(prediction.confidence),
      daysUntil: daysUntil(prediction.predictedDate, formatISODate(clock())),
    };
  }

  // ===============================
  // GET /api/health
  // ===============================
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      version: "1.0.0",
      timestamp: clock().toISOString(),
      features: ["cycle-logs", "statistics", "prediction", "export"],
    });
  });

  // ===============================
  // POST /api/auth/token
  // ===============================
  app.post("/api/auth/token", handleTokenRequest);

  // ===============================
  // POST /api/auth/refresh
  // ===============================
  app.post("/api/auth/refresh", handleTokenRefresh);

  // ===============================
  // GET /api/cycles/:ownerKey/logs
  // ===============================
  app.get("/api/cycles/:ownerKey/logs", asyncHandler(async (req, res) => {
    const logs = await service.listLogs(req.params.ownerKey);
    res.json({ logs: logs.map(logToPlain), totalLogs: logs.length });
  }));

  // ===============================
  // POST /api/cycles/:ownerKey/logs
  // ===============================
  app.post("/api/cycles/:ownerKey/logs", logCreationLimit, asyncHandler(async (req, res) => {
    const parsed = CreateLogRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatValidationError(parsed.error) });
      return;
    }

    const { result, prediction, predictionError } = await service.addLog(req.params.ownerKey, parsed.data.startDate);
    res.status(201).json({
      log: logToPlain(result),
      ...presentPrediction(prediction),
      ...(predictionError ? { predictionError: PREDICTION_UNAVAILABLE_MESSAGE } : {}),
    });
  }));

  // ===============================
  // PATCH /api/cycles/:ownerKey/logs/:logId
  // ===============================
  app.patch("/api/cycles/:ownerKey/logs/:logId", asyncHandler(async (req, res) => {
    const log = await service.touchLog(req.params.ownerKey, req.params.logId);
    res.json({ log: logToPlain(log) });
  }));

  // ===============================
  // DELETE /api/cycles/:ownerKey/logs/:logId
  // ===============================
  app.delete("/api/cycles/:ownerKey/logs/:logId", asyncHandler(async (req, res) => {
    const { result, prediction, predictionError } = await service.deleteLog(req.params.ownerKey, req.params.logId);
    if (!result) {
      res.status(404).json({ error: "Log not found." });
      return;
    }
    res.json({
      deleted: true,
      ...presentPrediction(prediction),
      ...(predictionError ? { predictionError: PREDICTION_UNAVAILABLE_MESSAGE } : {}),
    });
  }));

  // ===============================
  // GET /api/cycles/:ownerKey/statistics
  // ===============================
  app.get("/api/cycles/:ownerKey/statistics", asyncHandler(async (req, res) => {
    const { statistics, summary } = await service.getStatistics(req.params.ownerKey);
    res.json({ statistics: statistics ? statisticsToPlain(statistics) : null, summary });
  }));

  // ===============================
  // GET /api/cycles/:ownerKey/prediction
  // ===============================
  app.get("/api/cycles/:ownerKey/prediction", predictionLimit, asyncHandler(async (req, res) => {
    const prediction = await service.getPrediction(req.params.ownerKey, { signal: requestSignal(res) });
    res.json(presentPrediction(prediction));
  }));

  // ===============================
  // POST /api/cycles/:ownerKey/prediction/recalculate
  // ===============================
  app.post("/api/cycles/:ownerKey/prediction/recalculate", predictionLimit, asyncHandler(async (req, res) => {
    const prediction = await service.recalculate(req.params.ownerKey, { signal: requestSignal(res) });
    res.json(presentPrediction(prediction));
  }));

  // ===============================
  // GET /api/cycles/:ownerKey/settings
  // ===============================
  app.get("/api/cycles/:ownerKey/settings", asyncHandler(async (req, res) => {
    res.json({ settings: await service.getSettings(req.params.ownerKey) });
  }));

  // ===============================
  // PUT /api/cycles/:ownerKey/settings
  // ===============================
  app.put("/api/cycles/:ownerKey/settings", asyncHandler(async (req, res) => {
    const parsed = UpdateSettingsRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatValidationError(parsed.error) });
      return;
    }
    res.json({ settings: await service.updateSettings(req.params.ownerKey, parsed.data) });
  }));

  // ===============================
  // GET /api/cycles/:ownerKey/export
  // ===============================
  app.get("/api/cycles/:ownerKey/export", asyncHandler(async (req, res) => {
    const ownerKey = req.params.ownerKey;
    const bundle = await service.exportData(ownerKey);

    recordAudit(auditWriter, {
      ownerKey,
      action: "data_exported",
      resource: "owner",
      detail: { logs: bundle.logs.length },
      ipAddress: req.ip || req.socket.remoteAddress,
      userAgent: req.headers["user-agent"],
    });

    res.json(bundle);
  }));

  // ===============================
  // POST /api/cycles/:ownerKey/import
  // ===============================
  app.post("/api/cycles/:ownerKey/import", asyncHandler(async (req, res) => {
    res.json(await service.importData(req.params.ownerKey, req.body));
  }));

  // ===============================
  // DELETE /api/cycles/:ownerKey
  // ===============================
  app.delete("/api/cycles/:ownerKey", asyncHandler(async (req, res) => {
    await service.clearData(req.params.ownerKey);
    res.json({ cleared: true });
  }));

  // ===============================
  // GET /api/ai/status
  // ===============================
  app.get("/api/ai/status", predictionLimit, asyncHandler(async (_req, res) => {
    if (!config.ai.enabled || !provider) {
      res.json({ enabled: config.ai.enabled, configured: Boolean(provider), connected: false });
      return;
    }
    res.json({ enabled: true, configured: true, model: config.ai.model, connected: await provider.testConnection() });
  }));

  // ---- Global error handler ----
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, message } = errorStatus(err);
    if (status >= 500) {
      console.error("[CycleCast Server Error]", err instanceof Error ? err.message : String(err));
    }
    res.status(status).json({ error: message });
  });

  return app;
}
