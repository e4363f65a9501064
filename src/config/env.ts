// src/config/env.ts

import dotenv from "dotenv";

dotenv.config();

export type StoreKind = "mongo" | "memory";

export interface AppConfig {
  port: number;
  nodeEnv: string;
  allowedOrigins: string[];
  databaseUrl: string | null;
  store: StoreKind;
  adminToken: string;
  tokenSecret: string;
  baseUrl: string;
  deltaLogRetention: number;
  subscriberQueueLimit: number;
  deliveryAckTimeoutMs: number;
  storageRetryAttempts: number;
  storageRetryBaseMs: number;
  storageCommitTimeoutMs: number;
  rateLimitPerMinute: number;
}

const DEFAULT_ORIGINS = ["http://localhost:3000", "http://localhost:3001"];

const readInt = (
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

const readStore = (env: NodeJS.ProcessEnv): StoreKind => {
  const raw = env.SEATING_STORE ?? (env.DATABASE_URL ? "mongo" : "memory");
  if (raw !== "mongo" && raw !== "memory") {
    throw new Error(`SEATING_STORE must be "mongo" or "memory", got "${raw}"`);
  }
  return raw;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const store = readStore(env);
  const databaseUrl = env.DATABASE_URL ?? null;
  if (store === "mongo" && !databaseUrl) {
    throw new Error("DATABASE_URL is required when SEATING_STORE=mongo");
  }

  const adminToken = env.ADMIN_TOKEN;
  const tokenSecret = env.TOKEN_SECRET;
  if (!adminToken) throw new Error("ADMIN_TOKEN is required");
  if (!tokenSecret) throw new Error("TOKEN_SECRET is required");

  const port = readInt(env, "PORT", 8080);

  return {
    port,
    nodeEnv: env.NODE_ENV || "dev",
    allowedOrigins:
      env.CORS_ORIGIN?.split(",")
        .map((o) => o.trim())
        .filter(Boolean) ?? DEFAULT_ORIGINS,
    databaseUrl,
    store,
    adminToken,
    tokenSecret,
    baseUrl: env.BASE_URL || `http://localhost:${port}`,
    deltaLogRetention: readInt(env, "DELTA_LOG_RETENTION", 500),
    subscriberQueueLimit: readInt(env, "SUBSCRIBER_QUEUE_LIMIT", 256),
    deliveryAckTimeoutMs: readInt(env, "DELIVERY_ACK_TIMEOUT_MS", 10000),
    storageRetryAttempts: readInt(env, "STORAGE_RETRY_ATTEMPTS", 3),
    storageRetryBaseMs: readInt(env, "STORAGE_RETRY_BASE_MS", 50),
    storageCommitTimeoutMs: readInt(env, "STORAGE_COMMIT_TIMEOUT_MS", 5000),
    rateLimitPerMinute: readInt(env, "RATE_LIMIT_PER_MINUTE", 30),
  };
};
