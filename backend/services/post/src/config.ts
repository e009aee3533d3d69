// backend/services/post/src/config.ts
import {
  envEnum,
  envInt,
  envPositiveInt,
  envString,
  envUrl,
  type EnvMap,
} from "@shared/env";
import { LOG_LEVELS } from "@shared/utils/logger";

export function loadPostConfig(env: EnvMap = process.env) {
  return {
    env: env.NODE_ENV,
    port: envInt(env, "PORT", 8081),
    mongoUri: envString(env, "MONGO_URI", "mongodb://localhost:27017"),
    mongoDb: envString(env, "MONGO_DB", "TTTN"),
    storeTimeoutMs: envPositiveInt(env, "STORE_TIMEOUT_MS", 5000),
    userServiceUrl: envUrl(env, "USER_SERVICE_URL", "http://localhost:8080"),
    userCheckTimeoutMs: envPositiveInt(env, "USER_CHECK_TIMEOUT_MS", 5000),
    logLevel: envEnum(env, "LOG_LEVEL", LOG_LEVELS, "info"),
  } as const;
}
