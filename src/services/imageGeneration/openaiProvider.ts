/**
 * OpenAI image generation provider.
 *
 * Calls the OpenAI Images API directly via fetch (no SDK dependency).
 * Requires OPENAI_API_KEY to be set when IMAGE_PROVIDER=openai.
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

/** OpenAI Images API endpoint */
export const OPENAI_IMAGES_URL = "https://api.openai.com/v1/images/generations";

/** OpenAI model id for each model variant */
export const OPENAI_MODEL_IDS: Record<ImageModel, string> = {
  dalle3: "dall-e-3",
  dalle2: "dall-e-2",
};

export interface OpenAIImageProviderConfig {
  apiKey: string;
  /** Custom fetch implementation, e.g. for testing */
  fetch?: FetchFunction;
}

export class OpenAIImageProvider implements ImageGenerationProvider {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly fetchImpl?: FetchFunction;

  constructor(config: OpenAIImageProviderConfig) {
    if (config.apiKey.trim() === "") {
      throw new Error(
        "OPENAI_API_KEY is required when IMAGE_PROVIDER=openai. " +
          "Set OPENAI_API_KEY in your .env file or environment, " +
          "or use IMAGE_PROVIDER=mock for development."
      );
    }

    this.apiKey = config.apiKey;
    this.fetchImpl = config.fetch;
  }

  async generate(
    request: ProviderImageRequest,
    options?: ImageGenerationOptions
  ): Promise<ImageGenerationResult> {
    if (request.prompt.trim() === "") {
      throw new ProviderError("Image generation prompt must not be empty.");
    }

    const result = await postImagesRequest({
      apiName: "OpenAI API",
      url: OPENAI_IMAGES_URL,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      model: OPENAI_MODEL_IDS[request.model],
      request,
      fetch: this.fetchImpl ?? fetch,
      signal: options?.signal,
    });

    return { ...result, provider: this.name };
  }
}
