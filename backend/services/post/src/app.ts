// backend/services/post/src/app.ts
/**
 * Post service app. Both the post store and the user existence checker are
 * injected; nothing here reaches Mongo or the user service directly.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ReadinessFn } from "@shared/health";
import { ping } from "./controllers/handlers/ping";
import { postRoutes } from "./routes/postRoutes";
import type { PostRepo } from "./repo/postRepo";
import type { UserExistenceChecker } from "./services/userClient";

export const SERVICE_NAME = "post" as const;

export type PostAppDeps = {
  repo: PostRepo;
  users: UserExistenceChecker;
  readiness?: ReadinessFn;
};

export function buildPostApp(deps: PostAppDeps): Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    routePrefixes: ["/posts"],
    readiness: deps.readiness,
    mountRoutes: (api) => {
      api.get("/ping", ping);
      api.use("/posts", postRoutes({ repo: deps.repo, users: deps.users }));
    },
  });
}
