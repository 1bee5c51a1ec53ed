/**
 * Streamable HTTP MCP endpoint.
 *
 * POST /mcp: one JSON-RPC message (or batch) per request, answered with a
 *   JSON body. Stateless: a fresh McpServer and transport are
 *   created for every request and closed when the response ends.
 * GET, DELETE /mcp: 405; there are no sessions or server-sent streams.
 */

import { Router, type Request, type Response } from "express";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { logger } from "../config/logger";
import { errorMessage } from "../errors";
import { generationLimiter } from "../middleware/rateLimiter";

function methodNotAllowed(_req: Request, res: Response): void {
  res.status(405).json({
    jsonrpc: "2.0",
    error: {
      code: -32000,
      message: "Method not allowed. This server is stateless; use POST.",
    },
    id: null,
  });
}

function createMcpRouter(createServer: () => McpServer): Router {
  const mcpRouter = Router();

  mcpRouter.post("/", generationLimiter, async (req: Request, res: Response) => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warn("mcp", "Failed to close MCP request resources", {
          requestId: req.requestId,
          error: errorMessage(error),
        });
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  });

  mcpRouter.get("/", methodNotAllowed);
  mcpRouter.delete("/", methodNotAllowed);

  return mcpRouter;
}

export { createMcpRouter };
