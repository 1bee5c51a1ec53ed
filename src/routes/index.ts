/**
 * API Route Index
 *
 * ┌─────────────────────┬────────┬───────────────────────────────────────────────┐
 * │ Endpoint            │ Method │ Description                                   │
 * ├─────────────────────┼────────┼───────────────────────────────────────────────┤
 * │ /api/health         │ GET    │ Health check with storage and metrics         │
 * ├─────────────────────┼────────┼───────────────────────────────────────────────┤
 * │ /mcp                │ POST   │ Streamable HTTP MCP endpoint (generate_image) │
 * │ /mcp                │ GET    │ 405, stateless server                         │
 * │ /mcp                │ DELETE │ 405, stateless server                         │
 * └─────────────────────┴────────┴───────────────────────────────────────────────┘
 *
 * Error responses follow the shape: { error: { message, code, requestId? } }
 */

import { Router } from "express";
import { createHealthRouter, type HealthTarget } from "./health";

function createApiRouter(target: HealthTarget): Router {
  const router = Router();

  // Health check
  router.use("/health", createHealthRouter(target));

  return router;
}

export { createApiRouter };
export { createMcpRouter } from "./mcp";
