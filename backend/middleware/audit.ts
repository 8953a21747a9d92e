import { Request, Response, NextFunction } from "express";
import { query } from "../database/connection";

// CycleCast Audit Logging Middleware
//
// Records all state-changing operations.
// Append-only: no deletes, no updates.

export type AuditAction =
  | "log_created"
  | "log_updated"
  | "log_deleted"
  | "prediction_recalculated"
  | "settings_updated"
  | "data_exported"
  | "data_imported"
  | "data_cleared"
  | "token_issued"
  | "token_refreshed";

export interface AuditEntry {
  ownerKey?: string;
  action: AuditAction;
  resource?: string;
  detail?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
}

export type AuditWriter = (entry: AuditEntry) => Promise<void>;

const IN_MEMORY_CAP = 10000;

// In-memory fallback when no database is available
export function createInMemoryAuditWriter(store: AuditEntry[] = []): AuditWriter {
  return async (entry) => {
    store.push(entry);
    if (store.length > IN_MEMORY_CAP) {
      store.splice(0, store.length - IN_MEMORY_CAP);
    }
  };
}

export const writeDatabaseAuditLog: AuditWriter = async (entry) => {
  await query(
    `INSERT INTO audit_log (owner_key, action, resource, detail, ip_address, user_agent)
     VALUES ($1, $2, $3, $4, $5, $6)`,
    [
      entry.ownerKey || null,
      entry.action,
      entry.resource || null,
      entry.detail ? JSON.stringify(entry.detail) : null,
      entry.ipAddress || null,
      entry.userAgent || null,
    ],
  );
};

export function createAuditWriter(databaseUrl?: string): AuditWriter {
  return databaseUrl ? writeDatabaseAuditLog : createInMemoryAuditWriter();
}

// Audit logging must never fail the request it describes.
export function recordAudit(writer: AuditWriter, entry: AuditEntry): void {
  writer(entry).catch((err: unknown) => {
    console.error("[Audit] Failed to write audit log:", err);
  });
}

const LOGS_PATH = /^\/api\/cycles\/[^/]+\/logs(\/[^/]+)?$/;
const OWNER_PATH = /^\/api\/cycles\/[^/]+$/;

// Maps a state-changing request to its audit action; null when it is not audited.
export function resolveAuditAction(
  method: string,
  path: string,
): { action: AuditAction; resource: string } | null {
  const logsMatch = LOGS_PATH.exec(path);
  if (logsMatch) {
    if (method === "POST" && !logsMatch[1]) return { action: "log_created", resource: "log" };
    if (method === "PATCH" && logsMatch[1]) return { action: "log_updated", resource: "log" };
    if (method === "DELETE" && logsMatch[1]) return { action: "log_deleted", resource: "log" };
    return null;
  }

  if (method === "POST" && path.endsWith("/prediction/recalculate")) {
    return { action: "prediction_recalculated", resource: "prediction" };
  }
  if (method === "PUT" && path.endsWith("/settings")) return { action: "settings_updated", resource: "settings" };
  if (method === "POST" && path.endsWith("/import")) return { action: "data_imported", resource: "owner" };
  if (method === "DELETE" && OWNER_PATH.test(path)) return { action: "data_cleared", resource: "owner" };
  if (method === "POST" && path === "/api/auth/token") return { action: "token_issued", resource: "auth" };
  if (method === "POST" && path === "/api/auth/refresh") return { action: "token_refreshed", resource: "auth" };

  return null;
}

function ownerKeyFromPath(path: string): string | undefined {
  const match = /^\/api\/cycles\/([^/]+)/.exec(path);
  return match ? match[1] : undefined;
}

// Middleware: auto-logs state-changing requests
export function createAuditMiddleware(writer: AuditWriter) {
  return function auditMiddleware(req: Request, _res: Response, next: NextFunction): void {
    if (req.method !== "POST" && req.method !== "PUT" && req.method !== "PATCH" && req.method !== "DELETE") {
      return next();
    }

    const resolved = resolveAuditAction(req.method, req.path);
    if (!resolved) return next();

    // Write asynchronously; don't block the response
    recordAudit(writer, {
      ownerKey: req.auth?.ownerKey ?? ownerKeyFromPath(req.path),
      action: resolved.action,
      resource: resolved.resource,
      detail: { method: req.method, path: req.path },
      ipAddress: req.ip || req.socket.remoteAddress,
      userAgent: req.headers["user-agent"],
    });

    next();
  };
}
