import "express-async-errors"; // Must be imported before any route handlers
import express, { type Express, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { createApiRouter, createMcpRouter } from "./routes/index";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { generalLimiter } from "./middleware/rateLimiter";
import { createMcpServer } from "./mcp/server";
import type { ImageRequestHandler } from "./services/imageRequestHandler";
import { env } from "./config/env";

/**
 * Build the HTTP host for the Streamable HTTP MCP transport.
 *
 * The request handler is created by the caller, which owns the provider.
 */
function createApp(handler: ImageRequestHandler): Express {
  const app = express();

  // Trust proxy headers (X-Forwarded-For, etc.) when running behind a load balancer.
  // Required for accurate IP detection in rate limiting and request logging.
  if (env.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  // Security headers
  app.use(helmet());

  // MCP clients read the session and protocol headers from responses
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      exposedHeaders: ["Mcp-Session-Id", "X-Request-Id"],
    })
  );

  // Body parsing
  app.use(express.json({ limit: "1mb" }));

  // Request logging
  app.use(requestLogger);

  // General rate limiting
  app.use(generalLimiter);

  // MCP endpoint
  app.use("/mcp", createMcpRouter(() => createMcpServer(handler)));

  // API routes
  app.use("/api", createApiRouter(handler));

  // Catch-all 404 for any /api route that was not matched above
  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({
      error: {
        message: "Not found",
        code: "NOT_FOUND",
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

export { createApp };
