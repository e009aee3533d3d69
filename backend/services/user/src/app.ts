// backend/services/user/src/app.ts
/**
 * User service app. The store is injected so the entrypoint wires Mongo and
 * tests wire an in-memory repo.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ReadinessFn } from "@shared/health";
import { ping } from "./controllers/handlers/ping";
import { userRoutes } from "./routes/userRoutes";
import type { UserRepo } from "./repo/userRepo";

export const SERVICE_NAME = "user" as const;

export type UserAppDeps = {
  repo: UserRepo;
  readiness?: ReadinessFn;
};

export function buildUserApp(deps: UserAppDeps): Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    routePrefixes: ["/users"],
    readiness: deps.readiness,
    mountRoutes: (api) => {
      api.get("/ping", ping);
      api.use("/users", userRoutes(deps.repo));
    },
  });
}
