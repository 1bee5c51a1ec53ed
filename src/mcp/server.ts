/**
 * MCP server factory.
 *
 * Builds an McpServer exposing the generate_image tool. The stdio entry
 * point creates one for the life of the process; the HTTP route creates one
 * per request (stateless Streamable HTTP).
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  GENERATE_IMAGE_DESCRIPTION,
  GENERATE_IMAGE_TOOL_NAME,
  generateImageInputShape,
  runGenerateImageTool,
  type GenerateImageCapability,
} from "../tools/generateImage";

export const SERVER_NAME = "dalle-image-server";
export const SERVER_VERSION = "1.0.0";

export function createMcpServer(handler: GenerateImageCapability): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    GENERATE_IMAGE_TOOL_NAME,
    {
      title: "Generate image",
      description: GENERATE_IMAGE_DESCRIPTION,
      inputSchema: generateImageInputShape,
    },
    async (args) => runGenerateImageTool(handler, args)
  );

  return server;
}
