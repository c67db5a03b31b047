// backend/services/employee/src/bootstrap.ts
// Side-effect module: import first, before anything that reads process.env.
import path from "path";
import { loadEnvFileIfPresent, type EnvSource } from "../../shared/config/env";
import { SERVICE_NAME } from "./config";

/**
 * ENV_FILE (default `.env`) relative to the working directory the service is
 * started from, so the same path works from sources and from dist/.
 */
export function resolveEnvFilePath(
  env: EnvSource = process.env,
  cwd: string = process.cwd()
): string {
  const envFile = (env.ENV_FILE && env.ENV_FILE.trim()) || ".env";
  return path.resolve(cwd, envFile);
}

const resolved = resolveEnvFilePath();

// Every variable has a default, so a missing file is fine.
const loaded = loadEnvFileIfPresent(resolved);
console.log(
  `[bootstrap] ${loaded ? "Loaded env from" : "No env file at"}: ${resolved}`
);

process.env.SERVICE_NAME ??= SERVICE_NAME;
