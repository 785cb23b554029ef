/**
 * GET /api/health: liveness of the agent process.
 *
 * Always 200 while the process serves requests. `status` is "ok" when the
 * control-plane session is connected and "degraded" otherwise (the health
 * check will reconnect it).
 */

import { Router } from "express";
import { VERSION } from "../../version.js";
import type { SessionView } from "../app.js";

/** Timestamp when the agent process started (for uptime calculation) */
const startTime = Date.now();

export function createHealthRouter(session: SessionView): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      status: session.state === "connected" ? "ok" : "degraded",
      session: session.state,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      version: VERSION,
    });
  });

  return router;
}
