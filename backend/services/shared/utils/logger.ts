// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, { type LoggerOptions, type LevelWithSilent, stdTimeFunctions } from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap BEFORE
 * building its app, since pino-http captures the logger instance it is given.
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger(SERVICE_NAME);
 */

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((l) => l === v);
}

const LOG_LEVEL_RAW = (process.env.LOG_LEVEL || "info").trim();
if (!isLevel(LOG_LEVEL_RAW)) throw new Error(`Invalid LOG_LEVEL: "${LOG_LEVEL_RAW}"`);

// NOTE: no "service" in base until initLogger() runs; avoids stamping "unknown".
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL_RAW,
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "res.headers['set-cookie']",
    ],
  },
};

export let logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string, level?: LevelWithSilent): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: level ?? pinoOptions.level,
    base: { service: SERVICE_NAME },
  });
}

/** Correlation id for a request: pino-http's req.id first, then the usual headers. */
export function requestIdOf(req: Request): string {
  if (req.id != null && String(req.id) !== "") return String(req.id);
  const hdr = req.headers["x-request-id"] ?? req.headers["x-correlation-id"];
  return (Array.isArray(hdr) ? hdr[0] : hdr) ?? "";
}

export function extractLogContext(req: Request): Record<string, unknown> {
  return {
    requestId: requestIdOf(req) || null,
    path: req.originalUrl,
    method: req.method,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
