import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";

// Load .env before any module that reads process.env.
// Resolve from deterministic locations so startup cwd does not matter.
const envPathCandidates = [
  pathResolve(__dirname, "..", ".env"),
  pathResolve(__dirname, "..", "..", ".env"),
  pathResolve(process.cwd(), ".env"),
];

const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
if (resolvedEnvPath) {
  dotenv.config({ path: resolvedEnvPath });
} else {
  dotenv.config();
}

import { loadAppConfig } from "./config/AppConfig";
import { createApp } from "./app";
import { getCycleRepository } from "./repository/RepositoryFactory";
import { closeDatabasePool } from "./database/connection";
import { CycleTrackingService } from "./prediction/CycleTrackingService";
import { createGeminiEstimationProvider } from "./ai/GeminiEstimationProvider";
import { createExternalEstimator } from "./ai/EstimationProvider";
import { createAuditWriter } from "./middleware/audit";

const config = loadAppConfig();

console.log("[CycleCast] CORS allowed origins:", config.corsOrigins);

const repository = getCycleRepository(config.databaseUrl);

const provider = config.ai.enabled
  ? createGeminiEstimationProvider({
      apiKey: config.ai.apiKey,
      model: config.ai.model,
      timeoutMs: config.ai.timeoutMs,
    })
  : undefined;

const service = new CycleTrackingService({
  repository,
  config,
  externalEstimator: provider ? createExternalEstimator(provider) : undefined,
});

const app = createApp({
  config,
  service,
  provider,
  auditWriter: createAuditWriter(config.databaseUrl),
});

// ---- Start server ----
const server = app.listen(config.port, "0.0.0.0", () => {
  console.log(`[CycleCast] Server running on port ${config.port}`);
  console.log(`[CycleCast] API health check: http://0.0.0.0:${config.port}/api/health`);
  console.log(`[CycleCast] Environment: ${config.nodeEnv}`);
  console.log(`[CycleCast] Database: ${config.databaseUrl ? "PostgreSQL" : "In-memory"}`);
  console.log(`[CycleCast] Auth: ${config.disableAuth ? "DISABLED (dev mode)" : "JWT enabled"}`);
  console.log(
    `[CycleCast] AI prediction: ${provider ? `${config.ai.model} for ${config.ai.allowedOwners.length} owner(s)` : "disabled"}`,
  );
});

// ---- Graceful shutdown ----
async function shutdown(signal: string): Promise<void> {
  console.log(`[CycleCast] ${signal} received, shutting down gracefully`);
  server.close();
  try {
    await closeDatabasePool();
  } catch (err) {
    console.error("[CycleCast] Failed to close database pool:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
