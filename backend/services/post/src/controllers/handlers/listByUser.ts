// backend/services/post/src/controllers/handlers/listByUser.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { logger, requestIdOf } from "@shared/utils/logger";
import { zPostList, zUserIdParam } from "../../contracts/post";
import { requireUser } from "../../services/userGate";
import type { PostHandlerDeps } from "./deps";

// GET /posts/:userID
export function makeListByUser({ repo, users }: PostHandlerDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const parsed = zUserIdParam.safeParse(req.params);
    if (!parsed.success) return zodBadRequest(res, parsed.error);
    const { userID } = parsed.data;

    if (!(await requireUser(users, res, userID, requestId))) return;

    const posts = await repo.findByUserId(userID);

    logger.debug({ requestId, userId: userID, count: posts.length }, "[PostHandlers.listByUser] exit");
    return respond(res, zPostList, { user_id: userID, posts });
  });
}
