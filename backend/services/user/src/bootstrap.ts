// backend/services/user/src/bootstrap.ts
/**
 * Side-effect module: load env files (repo → service, service wins), then
 * tag the shared logger. Import FIRST from index.ts.
 */

import { loadEnvCascadeForService } from "@shared/env";
import { initLogger, logger } from "@shared/utils/logger";
import { loadUserConfig } from "./config";
import { SERVICE_NAME } from "./app";

const envFiles = loadEnvCascadeForService(__dirname);

export const config = loadUserConfig();

initLogger(SERVICE_NAME, config.logLevel);
logger.debug({ envFiles }, "env loaded");
