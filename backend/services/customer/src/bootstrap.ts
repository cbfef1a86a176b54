// backend/services/customer/src/bootstrap.ts
/**
 * Env cascade for the customer service (repo root → service dir → ENV_FILE).
 * Import before anything reads config.
 */
import path from "node:path";
import { fileURLToPath } from "node:url";
import { EnvLoader, type ApplyStats } from "@shared/env/EnvLoader";

export const SERVICE_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  ".."
);

export function loadServiceEnv(): ApplyStats[] {
  return new EnvLoader(process.env).loadAll({ serviceDir: SERVICE_DIR });
}
