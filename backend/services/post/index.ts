// backend/services/post/index.ts
import { config } from "./src/bootstrap";

import { logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { connectMongo, disconnectMongo, mongoReadiness } from "@shared/db/mongo";
import { buildPostApp, SERVICE_NAME } from "./src/app";
import { createMongoPostRepo } from "./src/repo/postRepo";
import { createUserClient } from "./src/services/userClient";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start() {
  await connectMongo({
    uri: config.mongoUri,
    dbName: config.mongoDb,
    timeoutMs: config.storeTimeoutMs,
    logger,
  });

  const app = buildPostApp({
    repo: createMongoPostRepo({ maxTimeMS: config.storeTimeoutMs }),
    users: createUserClient({
      baseUrl: config.userServiceUrl,
      timeoutMs: config.userCheckTimeoutMs,
    }),
    readiness: mongoReadiness,
  });

  const { listening } = startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: disconnectMongo,
  });
  await listening;
}

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
