// src/routes/middleware.ts

import { timingSafeEqual } from "crypto";
import type {
  ErrorRequestHandler,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";
import { AdminCapability } from "../lib/adminCapability";
import {
  RateLimitedError,
  SeatingError,
  UnauthorizedError,
} from "../lib/errors";
import { createLog } from "../lib/logger";

const log = createLog("HTTP");

// ─── Envelope ────────────────────────────────────────────────────

export const ok = <T>(res: Response, message: string, data: T, status = 200): void => {
  res.status(status).json({ success: true, message, data });
};

export const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

// ─── Admin bearer ────────────────────────────────────────────────

const bearerOf = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (!header?.startsWith("Bearer ")) return null;
  return header.slice("Bearer ".length).trim() || null;
};

const matches = (given: string, expected: string): boolean => {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

const grantFrom = (req: Request, adminToken: string): AdminCapability | null => {
  const bearer = bearerOf(req);
  if (!bearer || !matches(bearer, adminToken)) return null;
  return AdminCapability.grant(`admin@${req.ip ?? "unknown"}`);
};

export const requireAdmin =
  (adminToken: string): RequestHandler =>
  (req, res, next) => {
    const cap = grantFrom(req, adminToken);
    if (!cap) {
      log.warn("Rejected admin request", { path: req.path, ip: req.ip });
      next(new UnauthorizedError("A valid admin bearer token is required"));
      return;
    }
    res.locals.admin = cap;
    next();
  };

// Grants the capability when a valid bearer is present, never rejects
export const optionalAdmin =
  (adminToken: string): RequestHandler =>
  (req, res, next) => {
    const cap = grantFrom(req, adminToken);
    if (cap) res.locals.admin = cap;
    next();
  };

export const adminOf = (res: Response): AdminCapability => {
  const cap: unknown = res.locals.admin;
  if (cap instanceof AdminCapability) return cap;
  throw new UnauthorizedError("A valid admin bearer token is required");
};

export const maybeAdminOf = (res: Response): AdminCapability | undefined => {
  const cap: unknown = res.locals.admin;
  return cap instanceof AdminCapability ? cap : undefined;
};

// ─── Rate limiting ───────────────────────────────────────────────

interface Window {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  limit: number; // requests per window and client
  windowMs: number;
  now?: () => number;
}

/** Fixed-window limiter keyed by client IP. A limit of 0 disables it. */
export const rateLimit = (options: RateLimitOptions): RequestHandler => {
  const windows = new Map<string, Window>();
  const now = options.now ?? Date.now;
  let nextSweep = 0;

  return (req, _res, next) => {
    if (options.limit <= 0) {
      next();
      return;
    }
    const at = now();
    if (at >= nextSweep) {
      for (const [key, window] of windows) if (window.resetAt <= at) windows.delete(key);
      nextSweep = at + options.windowMs;
    }

    const key = req.ip ?? "unknown";
    let window = windows.get(key);
    if (!window || window.resetAt <= at) {
      window = { count: 0, resetAt: at + options.windowMs };
      windows.set(key, window);
    }
    window.count += 1;
    if (window.count > options.limit) {
      next(new RateLimitedError());
      return;
    }
    next();
  };
};

// ─── Errors ──────────────────────────────────────────────────────

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && "body" in err;

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({
    success: false,
    message: `No route for ${req.method} ${req.path}`,
    data: null,
  });
};

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  if (err instanceof SeatingError) {
    if (err.status >= 500) log.error(`${req.method} ${req.path} failed`, err);
    res.status(err.status).json({ success: false, message: err.message, data: err.toJSON() });
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ success: false, message: "Malformed JSON body", data: null });
    return;
  }
  log.error(`${req.method} ${req.path} failed`, err);
  res.status(500).json({ success: false, message: "Internal server error", data: null });
};
