// backend/services/user/src/controllers/handlers/ping.ts
import type { Request, Response } from "express";

export function ping(_req: Request, res: Response) {
  res.type("text/plain").send("user pong");
}
