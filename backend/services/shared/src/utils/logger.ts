// backend/services/shared/src/utils/logger.ts
import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service creates its root logger ONCE at bootstrap and passes it down:
 *   const logger = createLogger({ service: "customer", level: config.logLevel });
 *
 * Components take a child so every line carries `{ service, component }`.
 */

export type { Logger };

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === v);
}

export interface CreateLoggerOptions {
  service: string;
  level: LevelWithSilent;
  /** Alternate sink (tests capture lines through this). */
  destination?: DestinationStream;
}

export function createLogger(opts: CreateLoggerOptions): Logger {
  const service = opts.service.trim();
  if (!service) throw new Error("createLogger requires a service name");

  const options: LoggerOptions = {
    level: opts.level,
    base: { service },
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["req.headers.authorization", "req.headers.cookie"],
    },
  };

  return opts.destination ? pino(options, opts.destination) : pino(options);
}

/** Logger that drops everything; handy default for tests and tools. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function errorFields(err: unknown): { name?: string; message: string } {
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { message: String(err) };
}
