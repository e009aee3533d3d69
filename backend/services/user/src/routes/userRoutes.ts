// backend/services/user/src/routes/userRoutes.ts
import { Router } from "express";
import type { UserRepo } from "../repo/userRepo";
import { makeList } from "../controllers/handlers/list";
import { makeCreate } from "../controllers/handlers/create";
import { makeRemove } from "../controllers/handlers/remove";
import { makeExists } from "../controllers/handlers/exists";

// one-liners only, no logic here
export function userRoutes(repo: UserRepo): Router {
  const router = Router();

  router.get("/", makeList(repo));
  router.post("/", makeCreate(repo));
  router.get("/exists/:id", makeExists(repo));
  router.delete("/:id", makeRemove(repo));

  return router;
}
