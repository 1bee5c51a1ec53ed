// Import env config first (loads .env and validates required vars immediately)
import { env } from "./config/env";
import { logger } from "./config/logger";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createApp } from "./app";
import { createMcpServer } from "./mcp/server";
import { createImageProvider } from "./services/imageGeneration";
import { ImageRequestHandler } from "./services/imageRequestHandler";

function createHandler(): ImageRequestHandler {
  const provider = createImageProvider(env.IMAGE_PROVIDER, env);

  logger.info("server", `Using ${provider.name} image provider`, {
    imagesDir: env.IMAGES_DIR,
    ...(provider.name === "azure" && {
      endpoint: env.AZURE_OPENAI_ENDPOINT,
      deployment: env.AZURE_OPENAI_DALLE_DEPLOYMENT,
    }),
  });

  return new ImageRequestHandler({
    provider,
    imagesDir: env.IMAGES_DIR,
    providerTimeoutMs: env.PROVIDER_TIMEOUT_MS,
    downloadTimeoutMs: env.DOWNLOAD_TIMEOUT_MS,
  });
}

async function startStdio(handler: ImageRequestHandler): Promise<void> {
  const server = createMcpServer(handler);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info("server", "MCP server listening on stdio");

  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down...`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("server", "Failed to close MCP server", { error: err });
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

function startHttp(handler: ImageRequestHandler): void {
  const app = createApp(handler);

  const server = app.listen(env.PORT, () => {
    logger.info("server", `MCP server listening on http://localhost:${env.PORT}/mcp`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/api/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    server.close(() => {
      logger.info("server", "Server shut down.");
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

async function start(): Promise<void> {
  const handler = createHandler();

  if (env.MCP_TRANSPORT === "http") {
    startHttp(handler);
  } else {
    await startStdio(handler);
  }
}

start().catch((err: unknown) => {
  logger.error("server", "Failed to start", { error: err });
  process.exit(1);
});
