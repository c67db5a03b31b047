// backend/services/employee/src/config.ts
/**
 * Typed service config.
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Every variable has a default; a present but invalid value fails fast.
 */
import { envOr, intEnvOr, type EnvSource } from "../../shared/config/env";

export const SERVICE_NAME = "employee" as const;

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  /** Connections kept warm. */
  poolSize: number;
  /** Extra transient connections allowed on top of poolSize. */
  maxOverflow: number;
  idleTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface StartupConfig {
  maxRetries: number;
  maxBackoffSec: number;
}

export interface EmployeeServiceConfig {
  env: string;
  app: { host: string; port: number };
  db: DbConfig;
  startup: StartupConfig;
}

const PORT_RANGE = { min: 0, max: 65_535 };

export function loadConfig(
  env: EnvSource = process.env
): EmployeeServiceConfig {
  return {
    env: envOr(env, "NODE_ENV", "development"),
    app: {
      host: envOr(env, "APP_HOST", "0.0.0.0"),
      port: intEnvOr(env, "APP_PORT", 8000, PORT_RANGE),
    },
    db: {
      host: envOr(env, "POSTGRES_HOST", "postgres"),
      port: intEnvOr(env, "POSTGRES_PORT", 5432, { min: 1, max: 65_535 }),
      user: envOr(env, "POSTGRES_USER", "appuser"),
      password: envOr(env, "POSTGRES_PASSWORD", "apppass"),
      database: envOr(env, "POSTGRES_DB", "appdb"),
      poolSize: intEnvOr(env, "DB_POOL_SIZE", 5, { min: 1 }),
      maxOverflow: intEnvOr(env, "DB_POOL_MAX_OVERFLOW", 10, { min: 0 }),
      idleTimeoutMs: intEnvOr(env, "DB_POOL_IDLE_MS", 30_000, { min: 0 }),
      connectTimeoutMs: intEnvOr(env, "DB_CONNECT_TIMEOUT_MS", 5_000, {
        min: 0,
      }),
    },
    startup: {
      maxRetries: intEnvOr(env, "DB_STARTUP_MAX_RETRIES", 10, { min: 1 }),
      maxBackoffSec: intEnvOr(env, "DB_STARTUP_MAX_BACKOFF_SEC", 10, {
        min: 0,
      }),
    },
  };
}
