import rateLimit from "express-rate-limit";
import type { Request } from "express";

// CycleCast Rate Limiting Middleware
//
// Three tiers:
// 1. General API: 100 req/min per owner
// 2. Prediction endpoints: 20 req/min per owner
// 3. Log creation: 50 req/hour per owner
//
// Key extraction: uses the authenticated owner key, falls back to IP.

export function extractRateLimitKey(req: Request): string {
  if (req.auth?.ownerKey) return req.auth.ownerKey;
  if (req.params.ownerKey) return req.params.ownerKey;
  return req.ip || req.socket.remoteAddress || "unknown";
}

// General API rate limiter: 100 req/min
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 100,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractRateLimitKey,
  message: { error: "Too many requests. Please try again later.", retryAfterMs: 60000 },
});

// Estimation endpoints (may call the LLM): 20 req/min
export const predictionRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractRateLimitKey,
  message: { error: "Prediction request limit reached. Please wait before trying again.", retryAfterMs: 60000 },
});

// Log creation: 50 req/hour
export const logCreationRateLimiter = rateLimit({
  windowMs: 60 * 60 * 1000,
  limit: 50,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractRateLimitKey,
  message: { error: "Log creation limit reached. Maximum 50 logs per hour.", retryAfterMs: 3600000 },
});
