// backend/services/post/src/services/userClient.ts
import axios, { type AxiosResponse } from "axios";
import { zProblem } from "@shared/contracts/common";
import { userExistsPath, zUserExists } from "@shared/contracts/userExists.contract";
import { logger } from "@shared/utils/logger";

/**
 * Outcome of asking the user service whether a user exists.
 * ok:false means nobody could tell; callers must not read it as "missing".
 */
export type UserExistence =
  | { ok: true; exists: boolean }
  | { ok: false; reason: string };

export interface UserExistenceChecker {
  checkExists(userId: string, ctx?: { requestId?: string }): Promise<UserExistence>;
}

export type UserClientOptions = {
  baseUrl: string;
  /** Deadline for the whole call, connect through body. */
  timeoutMs: number;
};

/** URL resolution would collapse these segments, so they never reach the id route. */
const DOT_SEGMENTS = new Set([".", ".."]);

function describe(err: unknown): string {
  if (axios.isAxiosError(err)) return err.code ? `${err.code}: ${err.message}` : err.message;
  return err instanceof Error ? err.message : String(err);
}

export function createUserClient(opts: UserClientOptions): UserExistenceChecker {
  const http = axios.create({
    baseURL: opts.baseUrl,
    timeout: opts.timeoutMs,
    // every status is classified below
    validateStatus: () => true,
  });

  const unavailable = (userId: string, reason: string, requestId?: string): UserExistence => {
    logger.warn({ userId, requestId, reason }, "[UserClient] existence check failed");
    return { ok: false, reason };
  };

  return {
    async checkExists(userId, ctx = {}) {
      const { requestId } = ctx;

      // never an ObjectId, so never a user
      if (DOT_SEGMENTS.has(userId)) return { ok: true, exists: false };

      let r: AxiosResponse<unknown>;
      try {
        r = await http.get<unknown>(userExistsPath(userId), {
          headers: requestId ? { "x-request-id": requestId } : {},
          signal: AbortSignal.timeout(opts.timeoutMs),
        });
      } catch (err) {
        return unavailable(userId, describe(err), requestId);
      }

      // The user service rejects ids that cannot be ObjectIds; no such user can exist.
      // Any other 400 (a proxy, the wrong service) proves nothing.
      if (r.status === 400) {
        const problem = zProblem.safeParse(r.data);
        if (problem.success && problem.data.code === "BAD_REQUEST") return { ok: true, exists: false };
        return unavailable(userId, "unexpected 400 response", requestId);
      }
      if (r.status < 200 || r.status >= 300) {
        return unavailable(userId, `unexpected status ${r.status}`, requestId);
      }

      const body = zUserExists.safeParse(r.data);
      if (!body.success) return unavailable(userId, "undecodable response", requestId);
      if (body.data.id !== userId) {
        return unavailable(userId, `response for another id (${body.data.id})`, requestId);
      }

      logger.debug({ userId, requestId, exists: body.data.exists }, "[UserClient] checked");
      return { ok: true, exists: body.data.exists };
    },
  };
}
