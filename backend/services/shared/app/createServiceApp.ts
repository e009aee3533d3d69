// backend/services/shared/app/createServiceApp.ts

/**
 * Shared app builder for the record services.
 *
 * Order: http logger (request id) → health (open) → json parser → routes →
 * 404 → Problem+JSON error formatter.
 */

import express, { type Express } from "express";
import { makeHttpLogger } from "../middleware/httpLogger";
import { notFoundProblemJson, errorProblemJson } from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "user", "post"). Used in logs & health payloads. */
  serviceName: string;
  /** Route prefixes that get Problem+JSON 404s (e.g., ["/users"]). */
  routePrefixes: string[];
  /**
   * Mounts the service's routes onto the provided Router.
   * Routes are one-liners that wire handlers only.
   */
  mountRoutes: (router: express.Router) => void;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
  /** JSON body limit (default 1mb). */
  jsonLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, routePrefixes, mountRoutes, readiness, jsonLimit } = opts;

  const app = express();
  app.disable("x-powered-by");

  app.use(makeHttpLogger(serviceName));

  app.use(createHealthRouter({ service: serviceName, readiness }));

  app.use(express.json({ limit: jsonLimit ?? "1mb" }));

  const api = express.Router();
  mountRoutes(api);
  app.use(api);

  app.use(notFoundProblemJson([...routePrefixes, "/health"]));
  app.use(errorProblemJson());

  return app;
}
