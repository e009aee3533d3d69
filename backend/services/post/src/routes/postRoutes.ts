// backend/services/post/src/routes/postRoutes.ts
import { Router } from "express";
import type { PostHandlerDeps } from "../controllers/handlers/deps";
import { makeListByUser } from "../controllers/handlers/listByUser";
import { makeCreate } from "../controllers/handlers/create";
import { makeRemove } from "../controllers/handlers/remove";

// one-liners only, no logic here
export function postRoutes(deps: PostHandlerDeps): Router {
  const router = Router();

  router.get("/:userID", makeListByUser(deps));
  router.post("/", makeCreate(deps));
  router.delete("/:postID", makeRemove(deps.repo));

  return router;
}
