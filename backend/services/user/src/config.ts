// backend/services/user/src/config.ts
import {
  envEnum,
  envInt,
  envPositiveInt,
  envString,
  type EnvMap,
} from "@shared/env";
import { LOG_LEVELS } from "@shared/utils/logger";

/**
 * No dotenv loading here (bootstrap.ts loads env files).
 * Every value has a local-development default; invalid values fail fast.
 */
export function loadUserConfig(env: EnvMap = process.env) {
  return {
    env: env.NODE_ENV,
    port: envInt(env, "PORT", 8080),
    mongoUri: envString(env, "MONGO_URI", "mongodb://localhost:27017"),
    mongoDb: envString(env, "MONGO_DB", "TTTN"),
    storeTimeoutMs: envPositiveInt(env, "STORE_TIMEOUT_MS", 5000),
    logLevel: envEnum(env, "LOG_LEVEL", LOG_LEVELS, "info"),
  } as const;
}
