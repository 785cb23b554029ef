/**
 * GET /api/status: host resource metrics.
 */

import * as os from "node:os";
import { Router } from "express";

export interface HostMetrics {
  hostname: string;
  platform: string;
  arch: string;
  cpu_count: number;
  load_average: number[];
  memory_total: number;
  memory_used: number;
  memory_percent: number;
  uptime_seconds: number;
}

export function collectHostMetrics(): HostMetrics {
  const total = os.totalmem();
  const used = total - os.freemem();
  return {
    hostname: os.hostname(),
    platform: os.platform(),
    arch: os.arch(),
    cpu_count: os.cpus().length,
    load_average: os.loadavg(),
    memory_total: total,
    memory_used: used,
    // two decimals
    memory_percent: total > 0 ? Math.round((used / total) * 10000) / 100 : 0,
    uptime_seconds: Math.floor(os.uptime()),
  };
}

export function createStatusRouter(metrics: () => HostMetrics = collectHostMetrics): Router {
  const router = Router();

  router.get("/status", (_req, res) => {
    res.json({ status: "online", system: metrics() });
  });

  return router;
}
