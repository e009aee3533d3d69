// backend/services/user/src/controllers/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { zUserList } from "../../contracts/user";
import type { UserRepo } from "../../repo/userRepo";

// GET /users
export function makeList(repo: UserRepo): RequestHandler {
  return asyncHandler(async (_req, res) => {
    const users = await repo.findAll();
    return respond(res, zUserList, users);
  });
}
