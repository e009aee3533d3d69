// backend/services/shared/http/errors.ts
import type { Response } from "express";
import { clean } from "../contracts/common";

function problem(
  res: Response,
  status: number,
  title: string,
  code: string,
  detail: string
) {
  return res
    .status(status)
    .type("application/problem+json")
    .json(clean({ type: "about:blank", title, status, code, detail }));
}

export const notFound = (res: Response, detail = "Resource not found", code = "NOT_FOUND") =>
  problem(res, 404, "Not Found", code, detail);

/** Upstream dependency could not be reached or gave no usable answer. */
export const badGateway = (res: Response, detail: string) =>
  problem(res, 502, "Bad Gateway", "BAD_GATEWAY", detail);
