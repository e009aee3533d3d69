// backend/services/post/src/bootstrap.ts
// Side-effect module: env files, config, logger. Import FIRST from index.ts.

import { loadEnvCascadeForService } from "@shared/env";
import { initLogger, logger } from "@shared/utils/logger";
import { loadPostConfig } from "./config";
import { SERVICE_NAME } from "./app";

const envFiles = loadEnvCascadeForService(__dirname);

export const config = loadPostConfig();

initLogger(SERVICE_NAME, config.logLevel);
logger.debug({ envFiles, userServiceUrl: config.userServiceUrl }, "env loaded");
