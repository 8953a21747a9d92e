import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server } from "http";
import { z } from "zod";
import { createApp } from "./app";
import { loadAppConfig } from "./config/AppConfig";
import { CycleTrackingService } from "./prediction/CycleTrackingService";
import { InMemoryCycleRepository } from "./repository/InMemoryCycleRepository";
import { createInMemoryAuditWriter, type AuditEntry } from "./middleware/audit";

const OWNER = "owner-0001";
const AI_OWNER = "owner-ai-0001";

const TokenPairSchema = z.object({ accessToken: z.string(), refreshToken: z.string(), expiresIn: z.number() });

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;
  let auditLog: AuditEntry[];

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    const clock = () => new Date("2025-01-02T09:00:00.000Z");
    const config = loadAppConfig({ JWT_SECRET: "test-secret", AI_ALLOWED_OWNERS: AI_OWNER });
    let nextId = 0;

    const service = new CycleTrackingService({
      repository: new InMemoryCycleRepository(),
      config,
      clock,
      idFactory: () => `log-${++nextId}`,
      externalEstimator: async () => {
        throw new Error("provider offline");
      },
    });

    auditLog = [];
    const app = createApp({
      config,
      service,
      clock,
      auditWriter: createInMemoryAuditWriter(auditLog),
      rateLimiting: false,
    });

    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server has no TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
  });

  function send(path: string, init: { method?: string; token?: string; body?: unknown } = {}) {
    return fetch(`${baseUrl}${path}`, {
      method: init.method ?? "GET",
      headers: {
        "Content-Type": "application/json",
        ...(init.token ? { Authorization: `Bearer ${init.token}` } : {}),
      },
      ...(init.body !== undefined ? { body: JSON.stringify(init.body) } : {}),
    });
  }

  async function tokensFor(ownerKey: string) {
    const res = await send("/api/auth/token", { method: "POST", body: { ownerKey } });
    expect(res.status).toBe(200);
    return TokenPairSchema.parse(await res.json());
  }

  it("answers health checks without a token", async () => {
    const res = await send("/api/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", timestamp: "2025-01-02T09:00:00.000Z" });
    expect(res.headers.get("cache-control")).toBe("no-store, no-cache, must-revalidate, private");
  });

  it("requires a bearer token", async () => {
    const res = await send(`/api/cycles/${OWNER}/logs`);

    expect(res.status).toBe(401);
  });

  it("refuses placeholder owner keys", async () => {
    const res = await send("/api/auth/token", { method: "POST", body: { ownerKey: "demo-user" } });

    expect(res.status).toBe(400);
  });

  it("creates a log and returns the new prediction", async () => {
    const { accessToken } = await tokensFor(OWNER);

    const res = await send(`/api/cycles/${OWNER}/logs`, {
      method: "POST",
      token: accessToken,
      body: { startDate: "2025-01-01" },
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      log: { id: "log-1", startDate: "2025-01-01", createdAt: "2025-01-02T09:00:00.000Z", ownerKey: OWNER },
      prediction: {
        predictedDate: "2025-01-29",
        averageCycleLengthDays: 28,
        confidence: 0.3,
        calculatedAt: "2025-01-02T09:00:00.000Z",
        reasoning: "Insufficient data, using default 28-day cycle. Log more periods for better accuracy.",
        ownerKey: OWNER,
      },
      window: { earliest: "2025-01-27", latest: "2025-01-31" },
      confidenceLabel: "Low",
      daysUntil: 27,
    });
    expect(auditLog).toMatchObject([{ action: "token_issued" }, { action: "log_created", ownerKey: OWNER }]);
  });

  it("rejects duplicates and bad dates", async () => {
    const { accessToken } = await tokensFor(OWNER);
    const path = `/api/cycles/${OWNER}/logs`;

    await send(path, { method: "POST", token: accessToken, body: { startDate: "2025-01-01" } });
    const duplicate = await send(path, { method: "POST", token: accessToken, body: { startDate: "2025-01-01" } });
    const invalid = await send(path, { method: "POST", token: accessToken, body: { startDate: "2025-02-30" } });

    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toEqual({ error: "A cycle log already exists for 2025-01-01." });
    expect(invalid.status).toBe(400);
  });

  it("keeps owners out of each other's data", async () => {
    const { accessToken } = await tokensFor(OWNER);

    const res = await send(`/api/cycles/owner-0002/logs`, { token: accessToken });

    expect(res.status).toBe(403);
  });

  it("hides estimation failures behind a generic message", async () => {
    const { accessToken } = await tokensFor(AI_OWNER);
    await send(`/api/cycles/${AI_OWNER}/logs`, { method: "POST", token: accessToken, body: { startDate: "2025-01-01" } });

    const res = await send(`/api/cycles/${AI_OWNER}/prediction`, { token: accessToken });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Prediction unavailable. Please try again." });
  });

  it("returns a null prediction without logs", async () => {
    const { accessToken } = await tokensFor(OWNER);

    const res = await send(`/api/cycles/${OWNER}/prediction`, { token: accessToken });

    expect(await res.json()).toEqual({ prediction: null });
  });

  it("reports statistics", async () => {
    const { accessToken } = await tokensFor(OWNER);
    for (const startDate of ["2024-11-06", "2024-12-04"]) {
      await send(`/api/cycles/${OWNER}/logs`, { method: "POST", token: accessToken, body: { startDate } });
    }

    const res = await send(`/api/cycles/${OWNER}/statistics`, { token: accessToken });

    expect(await res.json()).toEqual({
      statistics: {
        averageLengthDays: 28,
        minLengthDays: 28,
        maxLengthDays: 28,
        standardDeviation: 0,
        regularityClass: "Very Regular",
        sampleCount: 1,
      },
      summary: { totalLogs: 2, firstLogDate: "2024-11-06", lastLogDate: "2024-12-04" },
    });
  });

  it("touches a log and audits the update", async () => {
    const { accessToken } = await tokensFor(OWNER);
    await send(`/api/cycles/${OWNER}/logs`, { method: "POST", token: accessToken, body: { startDate: "2025-01-01" } });

    const res = await send(`/api/cycles/${OWNER}/logs/log-1`, { method: "PATCH", token: accessToken });
    const missing = await send(`/api/cycles/${OWNER}/logs/missing`, { method: "PATCH", token: accessToken });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      log: {
        id: "log-1",
        startDate: "2025-01-01",
        createdAt: "2025-01-02T09:00:00.000Z",
        updatedAt: "2025-01-02T09:00:00.000Z",
        ownerKey: OWNER,
      },
    });
    expect(missing.status).toBe(404);
    expect(auditLog.map((entry) => entry.action)).toContain("log_updated");
  });

  it("returns 404 for unknown logs", async () => {
    const { accessToken } = await tokensFor(OWNER);

    const res = await send(`/api/cycles/${OWNER}/logs/missing`, { method: "DELETE", token: accessToken });

    expect(res.status).toBe(404);
  });

  it("validates settings updates", async () => {
    const { accessToken } = await tokensFor(OWNER);
    const path = `/api/cycles/${OWNER}/settings`;

    const empty = await send(path, { method: "PUT", token: accessToken, body: {} });
    const updated = await send(path, { method: "PUT", token: accessToken, body: { useAIPrediction: false } });

    expect(empty.status).toBe(400);
    expect(await updated.json()).toEqual({ settings: { useAIPrediction: false } });
  });

  it("rejects malformed imports", async () => {
    const { accessToken } = await tokensFor(OWNER);

    const res = await send(`/api/cycles/${OWNER}/import`, { method: "POST", token: accessToken, body: { logs: "nope" } });

    expect(res.status).toBe(400);
  });

  it("exchanges refresh tokens only", async () => {
    const { accessToken, refreshToken } = await tokensFor(OWNER);

    const refreshed = await send("/api/auth/refresh", { method: "POST", body: { refreshToken } });
    const wrongType = await send("/api/auth/refresh", { method: "POST", body: { refreshToken: accessToken } });
    const refreshAsBearer = await send(`/api/cycles/${OWNER}/logs`, { token: refreshToken });

    expect(TokenPairSchema.safeParse(await refreshed.json()).success).toBe(true);
    expect(wrongType.status).toBe(400);
    expect(refreshAsBearer.status).toBe(401);
  });

  it("reports AI status without a provider", async () => {
    const { accessToken } = await tokensFor(OWNER);

    const res = await send("/api/ai/status", { token: accessToken });

    expect(await res.json()).toEqual({ enabled: true, configured: false, connected: false });
  });
});
