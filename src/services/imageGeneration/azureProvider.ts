/**
 * Azure OpenAI image generation provider.
 *
 * Calls the Azure OpenAI Images REST API directly via fetch. Azure routes
 * requests by deployment rather than by model id, so each model variant maps
 * to a configured deployment name.
 */

import { ProviderError } from "../../errors";
import type { ImageModel } from "../../models/generationRequest";
import { postImagesRequest, type FetchFunction } from "./imagesApi";
import type {
  ImageGenerationOptions,
  ImageGenerationProvider,
  ImageGenerationResult,
  ProviderImageRequest,
} from "./types";

export interface AzureImageProviderConfig {
  apiKey: string;
  /** Resource endpoint, e.g. https://my-resource.openai.azure.com */
  endpoint: string;
  apiVersion: string;
  /** Deployment name serving each model variant */
  deployments: Record<ImageModel, string>;
  /** Custom fetch implementation, e.g. for testing */
  fetch?: FetchFunction;
}

export class AzureImageProvider implements ImageGenerationProvider {
  readonly name = "azure";
  private readonly config: AzureImageProviderConfig;
  private readonly baseUrl: string;

  constructor(config: AzureImageProviderConfig) {
    if (config.apiKey.trim() === "" || config.endpoint.trim() === "") {
      throw new Error(
        "AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT are required when IMAGE_PROVIDER=azure. " +
          "Set them in your .env file or environment, " +
          "or use IMAGE_PROVIDER=mock for development."
      );
    }

    this.config = config;
    this.baseUrl = config.endpoint.trim().replace(/\/+$/, "");
  }

  /** Full generations URL for the deployment serving `model`. */
  buildUrl(model: ImageModel): string {
    const deployment = encodeURIComponent(this.config.deployments[model]);
    const apiVersion = encodeURIComponent(this.config.apiVersion);
    return `${this.baseUrl}/openai/deployments/${deployment}/images/generations?api-version=${apiVersion}`;
  }

  async generate(
    request: ProviderImageRequest,
    options?: ImageGenerationOptions
  ): Promise<ImageGenerationResult> {
    if (request.prompt.trim() === "") {
      throw new ProviderError("Image generation prompt must not be empty.");
    }

    const result = await postImagesRequest({
      apiName: "Azure OpenAI",
      url: this.buildUrl(request.model),
      headers: { "api-key": this.config.apiKey },
      request,
      fetch: this.config.fetch ?? fetch,
      signal: options?.signal,
    });

    return { ...result, provider: this.name };
  }
}
