// backend/services/post/test/helpers/fakeUsers.ts
import { vi } from "vitest";
import type { UserExistence, UserExistenceChecker } from "../../src/services/userClient";

/** Checker that always answers with the given outcome. */
export function fakeUsers(answer: UserExistence) {
  const checkExists = vi.fn(async (_userId: string, _ctx?: { requestId?: string }) => answer);
  const users: UserExistenceChecker = { checkExists };
  return { users, checkExists };
}

export const USER_EXISTS: UserExistence = { ok: true, exists: true };
export const USER_MISSING: UserExistence = { ok: true, exists: false };
export const USER_SERVICE_DOWN: UserExistence = { ok: false, reason: "ECONNREFUSED" };
