// backend/services/customer/src/config.ts

/**
 * Customer service config.
 * - No dotenv loading here (bootstrap.ts loads env files first).
 * - Optional vars fall back to the defaults below; anything present but
 *   invalid throws, so the process fails fast at startup.
 */
import type { LevelWithSilent } from "pino";
import { EnvLoader, type EnvSource } from "@shared/env/EnvLoader";
import { LOG_LEVELS, isLogLevel } from "@shared/utils/logger";

export interface CustomerConfig {
  serviceName: string;
  host: string;
  port: number;
  dataFile: string;
  bodyLimit: string;
  logLevel: LevelWithSilent;
}

export const DEFAULTS = {
  serviceName: "customer",
  host: "127.0.0.1",
  port: 3000,
  dataFile: "./data/customers.json",
  bodyLimit: "16kb",
  logLevel: "info",
} as const satisfies CustomerConfig;

const BODY_LIMIT = /^\d+(b|kb|mb)?$/i;

export function loadConfig(env: EnvSource = process.env): CustomerConfig {
  const e = new EnvLoader(env);

  const logLevel =
    e.optString("LOG_LEVEL", { allowed: LOG_LEVELS }) ?? DEFAULTS.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`ENV: LOG_LEVEL is not a log level (got: "${logLevel}").`);
  }

  const bodyLimit = e.optString("CUSTOMER_BODY_LIMIT") ?? DEFAULTS.bodyLimit;
  if (!BODY_LIMIT.test(bodyLimit)) {
    throw new Error(
      `ENV: CUSTOMER_BODY_LIMIT must look like "16kb" (got: "${bodyLimit}").`
    );
  }

  return {
    serviceName: e.optString("CUSTOMER_SERVICE_NAME") ?? DEFAULTS.serviceName,
    host: e.optString("CUSTOMER_HOST") ?? DEFAULTS.host,
    port: e.optInt("CUSTOMER_PORT", { min: 0, max: 65535 }) ?? DEFAULTS.port,
    dataFile: e.optString("CUSTOMER_DATA_FILE") ?? DEFAULTS.dataFile,
    bodyLimit,
    logLevel,
  };
}
