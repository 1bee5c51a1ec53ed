/**
 * Image generation service: factory and re-exports.
 *
 * Provides a factory function that returns the configured image generation
 * provider based on the IMAGE_PROVIDER env variable. The provider is built
 * once by the hosting process and handed to the request handler.
 */

import type { EnvConfig } from "../../config/env";
import { AzureImageProvider } from "./azureProvider";
import type { FetchFunction } from "./imagesApi";
import { MockImageProvider } from "./mockProvider";
import { OpenAIImageProvider } from "./openaiProvider";
import type { ImageGenerationProvider } from "./types";

export type {
  GeneratedImage,
  ImageGenerationOptions,
  ImageGenerationProvider,
  ImageGenerationResult,
  ProviderImageRequest,
} from "./types";
export { AzureImageProvider } from "./azureProvider";
export { MockImageProvider } from "./mockProvider";
export { OpenAIImageProvider } from "./openaiProvider";

/** The env settings the providers read. */
export type ProviderConfig = Pick<
  EnvConfig,
  | "AZURE_OPENAI_API_KEY"
  | "AZURE_OPENAI_ENDPOINT"
  | "AZURE_OPENAI_API_VERSION"
  | "AZURE_OPENAI_DALLE_DEPLOYMENT"
  | "AZURE_OPENAI_DALLE2_DEPLOYMENT"
  | "OPENAI_API_KEY"
>;

/**
 * Create an image generation provider by name.
 *
 * @param providerName - The provider to instantiate ("azure", "openai", "mock")
 * @param config - Credentials and deployment settings
 * @param fetchImpl - Custom fetch for the HTTP providers
 * @throws Error if the provider name is not recognized or its credentials are missing
 */
export function createImageProvider(
  providerName: string,
  config: ProviderConfig,
  fetchImpl?: FetchFunction
): ImageGenerationProvider {
  switch (providerName.toLowerCase()) {
    case "mock":
      return new MockImageProvider();

    case "openai":
      return new OpenAIImageProvider({ apiKey: config.OPENAI_API_KEY, fetch: fetchImpl });

    case "azure":
      return new AzureImageProvider({
        apiKey: config.AZURE_OPENAI_API_KEY,
        endpoint: config.AZURE_OPENAI_ENDPOINT,
        apiVersion: config.AZURE_OPENAI_API_VERSION,
        deployments: {
          dalle3: config.AZURE_OPENAI_DALLE_DEPLOYMENT,
          dalle2: config.AZURE_OPENAI_DALLE2_DEPLOYMENT,
        },
        fetch: fetchImpl,
      });

    default:
      throw new Error(
        `Unknown image provider: "${providerName}". ` +
          `Supported providers: azure, openai, mock. ` +
          `Set IMAGE_PROVIDER in your environment or .env file.`
      );
  }
}
