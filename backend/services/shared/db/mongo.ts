// backend/services/shared/db/mongo.ts

/**
 * Mongo boot shared by the record services:
 *  • disable mongoose buffering so a dead store fails fast instead of queueing
 *  • bound server selection and socket reads/writes by the store deadline
 *  • log a redacted URI (no credentials)
 */

import mongoose from "mongoose";
import type { Logger } from "pino";
import { redactUri } from "../env";
import { NotReadyError, type ReadinessDetails } from "../health";

export type MongoOptions = {
  uri: string;
  dbName: string;
  timeoutMs: number;
  logger: Logger;
};

export async function connectMongo(opts: MongoOptions): Promise<void> {
  const { uri, dbName, timeoutMs, logger } = opts;
  if (mongoose.connection.readyState === 1) return;

  mongoose.set("bufferCommands", false);
  mongoose.set("strictQuery", true);

  logger.info({ component: "mongodb", uri: redactUri(uri), dbName }, "connecting to Mongo");

  try {
    await mongoose.connect(uri, {
      dbName,
      serverSelectionTimeoutMS: timeoutMs,
      socketTimeoutMS: timeoutMs,
    });
  } catch (err) {
    logger.error({ component: "mongodb", err }, "mongoose.connect failed");
    throw err;
  }

  logger.info({ component: "mongodb", dbName }, "Mongo connected");
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}

/** Readiness hook: ok only while the connection is open (readyState 1). */
export function mongoReadiness(): ReadinessDetails {
  const state = mongoose.connection.readyState;
  if (state !== 1) throw new NotReadyError({ mongo: `state=${state}` });
  return { mongo: "ok" };
}
