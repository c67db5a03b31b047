// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
} from "pino";

// ─────────────────────────── Env (read once at import) ────────────────────────
const SERVICE_NAME = process.env.SERVICE_NAME?.trim();
const RAW_LEVEL = (process.env.LOG_LEVEL || "info").trim();

const validLevels: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.some((l) => l === v);
}

if (!isLevel(RAW_LEVEL)) {
  throw new Error(`Invalid LOG_LEVEL: "${RAW_LEVEL}"`);
}
const LOG_LEVEL: LevelWithSilent = RAW_LEVEL;

// ────────────────────────────── Pino (stdout only) ────────────────────────────
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.body.password",
      "res.headers['set-cookie']",
    ],
  },
};

/** Root logger factory; tests hand in a capture stream. */
export function createLogger(destination?: DestinationStream): Logger {
  return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}

export const logger = createLogger();

// ───────────────────────────── Request context helper ─────────────────────────
export function extractLogContext(req: Request): Record<string, unknown> {
  return {
    requestId: req.id ?? null,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    ip: req.ip,
    service: SERVICE_NAME,
  };
}
