// backend/services/shared/middleware/problemJson.ts

/**
 * Transport-level error formatting: every error leaving a service is RFC 7807
 * Problem+JSON so clients and tests can rely on one shape.
 */

import type { Request, Response, NextFunction } from "express";
import { extractLogContext, logger, requestIdOf } from "../utils/logger";

/** Read a property off an unknown thrown value without trusting its shape. */
function field(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return Reflect.get(err, key);
}

function pickStatus(err: unknown): number {
  const n = Number(field(err, "statusCode") ?? field(err, "status") ?? 500);
  return Number.isInteger(n) && n >= 400 && n <= 599 ? n : 500;
}

/**
 * 404 formatter: only emits Problem+JSON for known prefixes; everything
 * else gets a bare 404.
 */
export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      return res
        .status(404)
        .type("application/problem+json")
        .json({
          type: "about:blank",
          title: "Not Found",
          status: 404,
          code: "NOT_FOUND",
          detail: "Route not found",
          instance: requestIdOf(req) || undefined,
        });
    }
    return res.status(404).end();
  };
}

/** Error formatter: converts any thrown/next(err) into Problem+JSON. */
export function errorProblemJson() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = pickStatus(err);

    const ctx = extractLogContext(req);
    if (status >= 500) {
      logger.error({ ...ctx, status, err }, "request error");
    } else {
      logger.debug({ ...ctx, status, err }, "request rejected");
    }

    // body-parser sets type="entity.parse.failed"; only URI-ish types are RFC 7807 types.
    const rawType = field(err, "type");
    const rawTitle = field(err, "title");
    const rawMessage = field(err, "message");
    const type = typeof rawType === "string" && rawType.includes(":") ? rawType : "about:blank";
    const title =
      typeof rawTitle === "string"
        ? rawTitle
        : status >= 500
        ? "Internal Server Error"
        : "Request Error";
    const detail =
      typeof rawMessage === "string" && rawMessage ? rawMessage : "Unexpected error";

    res
      .status(status)
      .type("application/problem+json")
      .json({
        type,
        title,
        status,
        detail,
        instance: requestIdOf(req) || undefined,
      });
  };
}
