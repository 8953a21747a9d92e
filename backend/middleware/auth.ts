import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { AppConfig } from "../config/AppConfig";
import { RefreshTokenRequestSchema, TokenRequestSchema, formatValidationError } from "../validation/schemas";

// CycleCast JWT Authentication Middleware
//
// The owner key (an opaque device/account identifier) is the identity.
// The server issues a token pair on first contact.
//
// Token scheme: HS256 with a shared secret.
// Access token: 15 minutes. Refresh token: 7 days.

const ACCESS_TOKEN_EXPIRY = "15m";
const REFRESH_TOKEN_EXPIRY = "7d";
const ACCESS_TOKEN_TTL_SECONDS = 900;

const PUBLIC_PATHS = new Set(["/api/health", "/api/auth/token", "/api/auth/refresh"]);

export interface AuthPayload {
  ownerKey: string;
  type?: "refresh";
  iat?: number;
  exp?: number;
}

const AuthPayloadSchema = z.object({
  ownerKey: z.string().min(1),
  type: z.literal("refresh").optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

declare global {
  namespace Express {
    interface Request {
      auth?: AuthPayload;
    }
  }
}

export type AuthSettings = Pick<AppConfig, "jwtSecret" | "disableAuth">;

// --- Token generation ---

export function generateAccessToken(ownerKey: string, secret: string): string {
  return jwt.sign({ ownerKey }, secret, { expiresIn: ACCESS_TOKEN_EXPIRY });
}

export function generateRefreshToken(ownerKey: string, secret: string): string {
  return jwt.sign({ ownerKey, type: "refresh" }, secret, { expiresIn: REFRESH_TOKEN_EXPIRY });
}

// Throws jwt errors for bad signatures or expiry, and a plain Error for a foreign payload.
export function verifyToken(token: string, secret: string): AuthPayload {
  const decoded = jwt.verify(token, secret);
  const parsed = AuthPayloadSchema.safeParse(decoded);
  if (!parsed.success) throw new Error("Token payload is not a CycleCast identity.");
  return parsed.data;
}

function issueTokenPair(ownerKey: string, secret: string) {
  return {
    accessToken: generateAccessToken(ownerKey, secret),
    refreshToken: generateRefreshToken(ownerKey, secret),
    expiresIn: ACCESS_TOKEN_TTL_SECONDS,
  };
}

// --- Middleware ---

export function createAuthMiddleware(settings: AuthSettings) {
  return function authMiddleware(req: Request, res: Response, next: NextFunction): void {
    if (PUBLIC_PATHS.has(req.path)) return next();

    // Development mode: identity comes from the route (see requireOwnerMatch)
    if (settings.disableAuth) return next();

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      res.status(401).json({ error: "Missing or invalid Authorization header. Expected: Bearer <token>" });
      return;
    }

    try {
      const payload = verifyToken(authHeader.slice(7), settings.jwtSecret);
      if (payload.type === "refresh") {
        res.status(401).json({ error: "Refresh tokens cannot authorize requests." });
        return;
      }
      req.auth = payload;
      next();
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        res.status(401).json({ error: "Token expired. Please refresh your token." });
      } else {
        res.status(401).json({ error: "Invalid token." });
      }
    }
  };
}

// Route-level guard: a token only grants access to its own owner's data.
export function createOwnerGuard(settings: AuthSettings) {
  return function requireOwnerMatch(req: Request, res: Response, next: NextFunction): void {
    const ownerKey = req.params.ownerKey;

    if (settings.disableAuth) {
      req.auth = { ownerKey };
      return next();
    }

    if (!req.auth || req.auth.ownerKey !== ownerKey) {
      res.status(403).json({ error: "Token does not grant access to this owner." });
      return;
    }
    next();
  };
}

// --- Token endpoint handlers ---

export function createTokenHandlers(settings: AuthSettings) {
  function handleTokenRequest(req: Request, res: Response): void {
    const parsed = TokenRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatValidationError(parsed.error) });
      return;
    }

    res.json(issueTokenPair(parsed.data.ownerKey, settings.jwtSecret));
  }

  function handleTokenRefresh(req: Request, res: Response): void {
    const parsed = RefreshTokenRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "refreshToken required." });
      return;
    }

    let payload: AuthPayload;
    try {
      payload = verifyToken(parsed.data.refreshToken, settings.jwtSecret);
    } catch (err) {
      console.warn("[Auth] Refresh rejected:", err instanceof Error ? err.message : String(err));
      res.status(401).json({ error: "Invalid or expired refresh token." });
      return;
    }

    if (payload.type !== "refresh") {
      res.status(400).json({ error: "Invalid token type. Expected refresh token." });
      return;
    }

    res.json(issueTokenPair(payload.ownerKey, settings.jwtSecret));
  }

  return { handleTokenRequest, handleTokenRefresh };
}
