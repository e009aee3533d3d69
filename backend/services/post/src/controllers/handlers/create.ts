// backend/services/post/src/controllers/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { logger, requestIdOf } from "@shared/utils/logger";
import { zPost, zPostCreate } from "../../contracts/post";
import { requireUser } from "../../services/userGate";
import type { PostHandlerDeps } from "./deps";

// POST /posts: the author must exist at write time
export function makeCreate({ repo, users }: PostHandlerDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[PostHandlers.create] enter");

    const parsed = zPostCreate.safeParse(req.body ?? {});
    if (!parsed.success) return zodBadRequest(res, parsed.error);

    if (!(await requireUser(users, res, parsed.data.user_id, requestId))) return;

    const created = await repo.create(parsed.data);

    logger.debug({ requestId, postId: created.id }, "[PostHandlers.create] exit");
    return respond(res, zPost, created, 201);
  });
}
