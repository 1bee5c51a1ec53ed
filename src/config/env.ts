/**
 * Centralized environment configuration.
 * Validates required environment variables at startup and exports typed config.
 * Import this module early to fail fast on missing configuration.
 */

import dotenv from "dotenv";
import * as path from "path";

// Load .env from the working directory the server is started in
dotenv.config();

type ImageProviderName = "azure" | "openai" | "mock";

type McpTransportName = "stdio" | "http";

interface EnvConfig {
  /** Image generation provider: azure, openai or mock (default: azure) */
  IMAGE_PROVIDER: ImageProviderName;
  /** Azure OpenAI API key (required when IMAGE_PROVIDER=azure) */
  AZURE_OPENAI_API_KEY: string;
  /** Azure OpenAI resource endpoint, e.g. https://my-resource.openai.azure.com */
  AZURE_OPENAI_ENDPOINT: string;
  /** Azure deployment serving the dalle3 model (default: dalle3) */
  AZURE_OPENAI_DALLE_DEPLOYMENT: string;
  /** Azure deployment serving the dalle2 model (default: dalle2) */
  AZURE_OPENAI_DALLE2_DEPLOYMENT: string;
  /** Azure OpenAI REST API version (default: 2024-02-01) */
  AZURE_OPENAI_API_VERSION: string;
  /** OpenAI API key (required when IMAGE_PROVIDER=openai) */
  OPENAI_API_KEY: string;
  /** Root directory for generated image artifacts (default: ./images) */
  IMAGES_DIR: string;
  /** MCP transport the process serves: stdio or http (default: stdio) */
  MCP_TRANSPORT: McpTransportName;
  /** HTTP port when MCP_TRANSPORT=http (default: 3001) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** CORS origin for browser-based MCP clients (default: *) */
  CORS_ORIGIN: string;
  /** Whether to trust proxy headers (e.g. X-Forwarded-For) when behind a load balancer (default: false) */
  TRUST_PROXY: boolean;
  /** Rate limit window duration in milliseconds (default: 900000 = 15 minutes) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Maximum number of requests per window per IP (default: 300) */
  RATE_LIMIT_MAX: number;
  /** Timeout for one image generation API call, in milliseconds (default: 120000) */
  PROVIDER_TIMEOUT_MS: number;
  /** Timeout for downloading a generated image, in milliseconds (default: 60000) */
  DOWNLOAD_TIMEOUT_MS: number;
}

const PROVIDER_NAMES: readonly ImageProviderName[] = ["azure", "openai", "mock"];

const TRANSPORT_NAMES: readonly McpTransportName[] = ["stdio", "http"];

/**
 * Credentials each provider needs before the server can start.
 * The mock provider needs none.
 */
const REQUIRED_VARS: Record<ImageProviderName, readonly string[]> = {
  azure: ["AZURE_OPENAI_API_KEY", "AZURE_OPENAI_ENDPOINT"],
  openai: ["OPENAI_API_KEY"],
  mock: [],
};

function readVar(name: string): string {
  return (process.env[name] ?? "").trim();
}

function parseProviderName(raw: string): ImageProviderName {
  const value = (raw || "azure").toLowerCase();
  const match = PROVIDER_NAMES.find((name) => name === value);
  if (!match) {
    throw new Error(
      `Unknown IMAGE_PROVIDER "${raw}". Supported providers: ${PROVIDER_NAMES.join(", ")}.`
    );
  }
  return match;
}

function parseTransportName(raw: string): McpTransportName {
  const value = (raw || "stdio").toLowerCase();
  const match = TRANSPORT_NAMES.find((name) => name === value);
  if (!match) {
    throw new Error(
      `Unknown MCP_TRANSPORT "${raw}". Supported transports: ${TRANSPORT_NAMES.join(", ")}.`
    );
  }
  return match;
}

function parseFlag(raw: string): boolean {
  return raw === "true" || raw === "1";
}

/**
 * Validates that the credentials for the selected provider are present.
 * Throws a descriptive error listing all missing variables.
 */
function validateEnv(provider: ImageProviderName): void {
  const missing = REQUIRED_VARS[provider].filter((varName) => readVar(varName) === "");

  if (missing.length > 0) {
    const message = [
      "",
      "=== Missing Required Environment Variables ===",
      "",
      ...missing.map((v) => `  - ${v}`),
      "",
      `IMAGE_PROVIDER=${provider} needs these variables in your .env file or environment.`,
      "See .env.example for reference, or use IMAGE_PROVIDER=mock for development.",
      "",
    ].join("\n");

    throw new Error(message);
  }
}

/**
 * Load and validate environment configuration.
 * Call this after dotenv.config() has been invoked.
 */
function loadEnvConfig(): EnvConfig {
  const provider = parseProviderName(readVar("IMAGE_PROVIDER"));
  validateEnv(provider);

  return {
    IMAGE_PROVIDER: provider,
    AZURE_OPENAI_API_KEY: readVar("AZURE_OPENAI_API_KEY"),
    AZURE_OPENAI_ENDPOINT: readVar("AZURE_OPENAI_ENDPOINT"),
    AZURE_OPENAI_DALLE_DEPLOYMENT: readVar("AZURE_OPENAI_DALLE_DEPLOYMENT") || "dalle3",
    AZURE_OPENAI_DALLE2_DEPLOYMENT: readVar("AZURE_OPENAI_DALLE2_DEPLOYMENT") || "dalle2",
    AZURE_OPENAI_API_VERSION: readVar("AZURE_OPENAI_API_VERSION") || "2024-02-01",
    OPENAI_API_KEY: readVar("OPENAI_API_KEY"),
    IMAGES_DIR: path.resolve(readVar("IMAGES_DIR") || "images"),
    MCP_TRANSPORT: parseTransportName(readVar("MCP_TRANSPORT")),
    PORT: parseInt(readVar("PORT") || "3001", 10),
    NODE_ENV: readVar("NODE_ENV") || "development",
    LOG_LEVEL: (readVar("LOG_LEVEL") || "info").toLowerCase(),
    CORS_ORIGIN: readVar("CORS_ORIGIN") || "*",
    TRUST_PROXY: parseFlag(readVar("TRUST_PROXY")),
    RATE_LIMIT_WINDOW_MS: parseInt(readVar("RATE_LIMIT_WINDOW_MS") || "900000", 10),
    RATE_LIMIT_MAX: parseInt(readVar("RATE_LIMIT_MAX") || "300", 10),
    PROVIDER_TIMEOUT_MS: parseInt(readVar("PROVIDER_TIMEOUT_MS") || "120000", 10),
    DOWNLOAD_TIMEOUT_MS: parseInt(readVar("DOWNLOAD_TIMEOUT_MS") || "60000", 10),
  };
}

// Validate and export config as a singleton
const env = loadEnvConfig();

export { env, loadEnvConfig };
export type { EnvConfig, ImageProviderName, McpTransportName };
