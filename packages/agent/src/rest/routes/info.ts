/**
 * GET /api/info: agent identity and control-plane connection.
 * GET /api/board: the full board snapshot.
 */

import * as os from "node:os";
import { Router } from "express";
import type { Board } from "@boardlink/core";
import { AGENT_NAME, VERSION } from "../../version.js";
import type { SessionView } from "../app.js";

export function createInfoRouter(board: Board, session: SessionView): Router {
  const router = Router();

  router.get("/info", (_req, res) => {
    const snapshot = board.snapshot();
    res.json({
      name: AGENT_NAME,
      version: VERSION,
      board: {
        uuid: snapshot.uuid,
        name: snapshot.name,
        type: snapshot.type,
        status: snapshot.status,
        hostname: os.hostname(),
      },
      wamp: {
        connected: session.state === "connected",
        state: session.state,
        session_id: session.sessionId,
        url: snapshot.endpoint?.url ?? null,
        realm: snapshot.endpoint?.realm ?? null,
      },
    });
  });

  router.get("/board", (_req, res) => {
    res.json(board.snapshot());
  });

  return router;
}
