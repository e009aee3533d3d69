// backend/services/shared/health.ts
import express from "express";

export type ReadinessDetails = Record<string, string | number | boolean>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  readiness?: ReadinessFn;
};

/** Thrown by a readiness hook to report "not ready" with details. */
export class NotReadyError extends Error {
  constructor(readonly details: ReadinessDetails) {
    super("not ready");
    this.name = "NotReadyError";
  }
}

/**
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
  };

  const liveness = (_req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true });
  };

  const readiness = async (_req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        ...(err instanceof NotReadyError ? err.details : {}),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
