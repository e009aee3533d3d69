// backend/services/post/src/controllers/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { notFound } from "@shared/http/errors";
import { logger, requestIdOf } from "@shared/utils/logger";
import { zDeleted, zPostIdParam } from "../../contracts/post";
import type { PostRepo } from "../../repo/postRepo";

// DELETE /posts/:postID: no user check
export function makeRemove(repo: PostRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const parsed = zPostIdParam.safeParse(req.params);
    if (!parsed.success) return zodBadRequest(res, parsed.error);
    const { postID } = parsed.data;

    const deleted = await repo.deleteById(postID);
    if (!deleted) return notFound(res, "post not found");

    logger.debug({ requestId: requestIdOf(req), postId: postID }, "[PostHandlers.remove] deleted");
    return respond(res, zDeleted, { message: "post deleted" });
  });
}
