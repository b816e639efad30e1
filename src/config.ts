// src/config.ts
/**
 * Application configuration loader.
 *
 * - Reads values from process.env (dotenv is loaded here).
 * - `loadConfig(env)` builds the typed `AppConfig` that is handed to services at construction.
 * - `config` is the instance built from the process environment, used by the entrypoint and logger.
 *
 * IMPORTANT:
 *  - Put secrets (API_KEYS, FIREBASE_CREDENTIALS, DB_PASSWORD) in your .env and never commit .env to git.
 *  - Missing values fall back to dev defaults so the app can start locally; the default API key
 *    is insecure and a warning is logged at boot when it is in use.
 */

import dotenv from "dotenv";
import path from "path";
import type { Dialect } from "sequelize";

dotenv.config();

export const DEFAULT_API_KEY = "dev-insecure-api-key";

const DIALECTS: readonly Dialect[] = [
  "postgres",
  "mysql",
  "mariadb",
  "sqlite",
  "mssql",
];

export interface DbConfig {
  dialect: Dialect;
  url?: string;
  host?: string;
  port?: number;
  database?: string;
  username?: string;
  password?: string;
  // sqlite only: file path or ":memory:"
  storage?: string;
  timezone?: string;
}

export interface FirebaseConfig {
  credentialsJson?: string;
  credentialsPath?: string;
}

export interface LogConfig {
  level: string;
  enabled: boolean;
  toFile: boolean;
  ttlDays: number;
  dir: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  apiKeys: string[];
  usingDefaultApiKey: boolean;
  storageDir: string;
  publicBaseUrl: string;
  uploadLimitBytes: number;
  corsOrigins: string[];
  db: DbConfig;
  firebase: FirebaseConfig;
  log: LogConfig;
}

type Env = Record<string, string | undefined>;

function list(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return value.toLowerCase() === "true";
}

function positiveNumber(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function parseDialect(value: string | undefined): Dialect {
  const found = DIALECTS.find((d) => d === value);
  return found ?? "postgres";
}

function loadDbConfig(env: Env): DbConfig {
  // Hosted Postgres often hands out "postgres://" URLs; normalise to the canonical scheme.
  const url = env.DATABASE_URL?.replace(/^postgres:\/\//, "postgresql://");

  return {
    dialect: parseDialect(env.DB_DIALECT),
    url: url || undefined,
    host: env.DB_HOST || "localhost",
    port: env.DB_PORT ? Number(env.DB_PORT) : undefined,
    database: env.DB_NAME,
    username: env.DB_USERNAME,
    password: env.DB_PASSWORD,
    storage: env.DB_STORAGE,
    timezone: env.TIME_ZONE,
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = positiveNumber(env.PORT, 4000);
  const configuredKeys = list(env.API_KEYS).concat(list(env.API_KEY));
  const apiKeys = Array.from(new Set(configuredKeys));

  return {
    // Server
    port,
    nodeEnv: env.NODE_ENV || "development",

    // Mobile client keys. Replace in production via env.
    apiKeys: apiKeys.length ? apiKeys : [DEFAULT_API_KEY],
    usingDefaultApiKey: apiKeys.length === 0,

    // Uploaded files land here and are served under /files
    storageDir: path.resolve(env.STORAGE_DIR || path.join(process.cwd(), "uploads")),

    // Public base URL used to build file URLs (configure to your domain)
    publicBaseUrl: (env.PUBLIC_BASE_URL || `http://localhost:${port}`).replace(/\/+$/, ""),

    // Default: 50 MB
    uploadLimitBytes: positiveNumber(env.UPLOAD_LIMIT_BYTES, 50 * 1024 * 1024),

    corsOrigins: list(env.CORS_ORIGINS).length ? list(env.CORS_ORIGINS) : ["*"],

    db: loadDbConfig(env),

    firebase: {
      credentialsJson: env.FIREBASE_CREDENTIALS || undefined,
      credentialsPath: env.FIREBASE_JSON_PATH || undefined,
    },

    log: {
      level: env.LOG_LEVEL || "info",
      enabled: flag(env.LOGGING_ENABLED, true),
      toFile: flag(env.LOG_TO_FILE, false),
      ttlDays: positiveNumber(env.LOG_TTL_DAYS, 30),
      dir: path.resolve(env.LOG_DIR || path.join(process.cwd(), "data", "logs")),
    },
  };
}

export const config = loadConfig();

/**
 * Boot-time warnings for settings that are fine in dev and dangerous in production.
 */
export function configWarnings(cfg: AppConfig): string[] {
  const warnings: string[] = [];
  if (cfg.usingDefaultApiKey) {
    warnings.push(
      "API_KEYS is not set; running with the default insecure key. Set API_KEYS in production!"
    );
  }
  if (cfg.nodeEnv === "production" && cfg.corsOrigins.includes("*")) {
    warnings.push("CORS_ORIGINS allows any origin in production.");
  }
  if (!cfg.firebase.credentialsJson && !cfg.firebase.credentialsPath) {
    warnings.push(
      "No Firebase credentials configured; bearer-protected routes will reject every request."
    );
  }
  return warnings;
}
