/**
 * Express application factory for the local status API.
 *
 * Separated from the agent so tests can build an app over a Board and a
 * session view without starting the rest of the agent.
 *
 * Middleware stack (order matters):
 *   1. helmet(): security headers
 *   2. cors(): cross-origin access disabled
 *   3. pino-http: request logging (health probes ignored)
 *   4. Routes: /api/health, /api/info, /api/board, /api/status
 *   5. Redirects: / and /dashboard → /api/info
 *   6. Error handler: must be last
 *
 * Every route is read-only: the API never changes board or manager state.
 */

import express from "express";
import cors from "cors";
import helmet from "helmet";
import { pinoHttp } from "pino-http";
import type { Logger } from "pino";
import type { Board, SessionState } from "@boardlink/core";
import { createErrorHandler } from "./error-handler.js";
import { createHealthRouter } from "./routes/health.js";
import { createInfoRouter } from "./routes/info.js";
import { createStatusRouter, type HostMetrics } from "./routes/status.js";

/** The parts of the session manager the status API reads */
export interface SessionView {
  readonly state: SessionState;
  readonly sessionId: string | null;
}

/** Dependencies injected into createApp */
export interface AppDeps {
  board: Board;
  session: SessionView;
  logger: Logger;
  /** Host metrics source; defaults to node:os */
  metrics?: () => HostMetrics;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: false }));
  app.use(
    pinoHttp({
      logger: deps.logger,
      autoLogging: {
        ignore: (req) => req.url === "/api/health",
      },
    }),
  );

  app.use("/api/health", createHealthRouter(deps.session));
  app.use("/api", createInfoRouter(deps.board, deps.session));
  app.use("/api", createStatusRouter(deps.metrics));

  app.get(["/", "/dashboard"], (_req, res) => {
    res.redirect(302, "/api/info");
  });

  app.use(createErrorHandler(deps.logger));

  return app;
}
