// backend/services/post/src/services/userGate.ts
import type { Response } from "express";
import { badGateway, notFound } from "@shared/http/errors";
import type { UserExistenceChecker } from "./userClient";

/**
 * Runs the existence check for a post operation. When it returns false the
 * response has already been sent (502 or 404).
 */
export async function requireUser(
  users: UserExistenceChecker,
  res: Response,
  userId: string,
  requestId: string
): Promise<boolean> {
  const check = await users.checkExists(userId, { requestId });
  if (!check.ok) {
    badGateway(res, "cannot connect to user-service");
    return false;
  }
  if (!check.exists) {
    notFound(res, "user does not exist", "USER_NOT_FOUND");
    return false;
  }
  return true;
}
