// backend/services/shared/config/env.ts

import fs from "fs";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

export type EnvSource = Record<string, string | undefined>;

/**
 * Load an env file if it exists. Returns false when there is no file;
 * a file that exists but cannot be parsed throws.
 * Variables already present in process.env win over the file.
 */
export function loadEnvFileIfPresent(envFilePath: string): boolean {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE path was empty.");
  }
  if (!fs.existsSync(envFilePath)) return false;

  const parsed = dotenv.config({ path: envFilePath });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${envFilePath} (${String(parsed.error)})`
    );
  }
  expand(parsed);
  return true;
}

/** Trimmed env value, or the fallback when unset/blank. */
export function envOr(env: EnvSource, name: string, fallback: string): string {
  const v = env[name];
  if (v == null || v.trim() === "") return fallback;
  return v.trim();
}

export interface IntRange {
  min?: number;
  max?: number;
}

/** Integer env value within [min, max], or the fallback when unset/blank. */
export function intEnvOr(
  env: EnvSource,
  name: string,
  fallback: number,
  range: IntRange = {}
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;

  const n = Number(raw.trim());
  if (!Number.isInteger(n)) {
    throw new Error(`Env ${name} must be an integer, got "${raw}"`);
  }
  if (range.min !== undefined && n < range.min) {
    throw new Error(`Env ${name} must be >= ${range.min}, got ${n}`);
  }
  if (range.max !== undefined && n > range.max) {
    throw new Error(`Env ${name} must be <= ${range.max}, got ${n}`);
  }
  return n;
}
