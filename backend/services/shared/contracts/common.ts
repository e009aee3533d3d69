// backend/services/shared/contracts/common.ts
import { z, type ZodError } from "zod";
import type { Response } from "express";

/** Mongo ObjectId (24 hex chars) */
export const zObjectId = z
  .string()
  .regex(/^[a-f0-9]{24}$/i, "Expected 24-hex Mongo ObjectId");

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z
    .array(z.object({ path: z.string(), code: z.string(), message: z.string() }))
    .optional(),
});
export type Problem = z.infer<typeof zProblem>;

/** Strip undefined (stable wire format) */
export function clean<T extends Record<string, unknown>>(obj: T): T {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v;
  }
  return out as T;
}

/** Problem+JSON helper for Zod validation errors */
export function zodBadRequest(res: Response, error: ZodError) {
  const errors = error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
  return res
    .status(400)
    .type("application/problem+json")
    .json({
      type: "about:blank",
      title: "Bad Request",
      status: 400,
      code: "BAD_REQUEST",
      detail: errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join("; "),
      errors,
    });
}

/** Output guard: validate payload before sending */
export function respond<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  payload: unknown,
  status = 200
) {
  const out = schema.parse(payload);
  return res.status(status).json(out);
}
