// backend/services/user/src/controllers/handlers/exists.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { zUserExists } from "@shared/contracts/userExists.contract";
import { logger, requestIdOf } from "@shared/utils/logger";
import { zUserIdParam } from "../../contracts/user";
import type { UserRepo } from "../../repo/userRepo";

/**
 * GET /users/exists/:id
 * Answers for the post service. Absence is a 200 with exists:false, not a 404;
 * a malformed id is rejected before the store is touched.
 */
export function makeExists(repo: UserRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const requestId = requestIdOf(req);
    const parsed = zUserIdParam.safeParse(req.params);
    if (!parsed.success) return zodBadRequest(res, parsed.error);
    const { id } = parsed.data;

    const count = await repo.countById(id);

    logger.debug({ requestId, userId: id, count }, "[UserHandlers.exists] exit");
    return respond(res, zUserExists, { id, exists: count > 0 });
  });
}
