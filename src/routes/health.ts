/**
 * Health check endpoint.
 *
 * Returns system health including image storage writability, the active
 * provider, memory usage, uptime and in-memory metrics. Used by load
 * balancers and monitoring tooling.
 *
 * Response shape:
 *   {
 *     status: "ok" | "degraded",
 *     timestamp: string,
 *     uptime: number,
 *     provider: string,
 *     storage: { imagesDir: string, writable: boolean },
 *     metrics: { requestCount, errorCount, generationCount, ... },
 *     memory: { rss, heapUsed, heapTotal, external } (all in MB)
 *   }
 */

import { Router, type Request, type Response } from "express";
import * as fs from "fs/promises";
import { constants as fsConstants } from "fs";
import { monitoringService } from "../services/monitoringService";

export interface HealthTarget {
  readonly providerName: string;
  readonly imagesRoot: string;
}

/** Whether the images root exists (or can be created) and is writable. */
async function isWritable(dir: string): Promise<boolean> {
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.access(dir, fsConstants.W_OK);
    return true;
  } catch {
    return false;
  }
}

function createHealthRouter(target: HealthTarget): Router {
  const healthRouter = Router();

  healthRouter.get("/", async (_req: Request, res: Response) => {
    const writable = await isWritable(target.imagesRoot);

    const mem = process.memoryUsage();
    const toMB = (bytes: number) => Math.round((bytes / 1024 / 1024) * 100) / 100;

    res.status(writable ? 200 : 503).json({
      status: writable ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      provider: target.providerName,
      storage: {
        imagesDir: target.imagesRoot,
        writable,
      },
      metrics: monitoringService.getMetrics(),
      memory: {
        rss: toMB(mem.rss),
        heapUsed: toMB(mem.heapUsed),
        heapTotal: toMB(mem.heapTotal),
        external: toMB(mem.external),
      },
    });
  });

  return healthRouter;
}

export { createHealthRouter };
