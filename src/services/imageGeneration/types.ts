/**
 * Provider-agnostic image generation interface.
 *
 * Image generation uses an adapter/strategy pattern so that the underlying
 * provider (Azure OpenAI, OpenAI, mock) can be swapped via configuration
 * without changing the request handler.
 */

import type { ImageModel, ImageQuality, ImageSize, ImageStyle } from "../../models/generationRequest";

/** Resolved parameters for one provider call. */
export interface ProviderImageRequest {
  /** Prompt text to send, already carrying any no-revision instruction */
  prompt: string;
  model: ImageModel;
  size: ImageSize;
  quality: ImageQuality;
  count: number;
  style?: ImageStyle;
}

export interface ImageGenerationOptions {
  /** Aborts the in-flight provider call */
  signal?: AbortSignal;
}

export interface ImageGenerationProvider {
  /** Human-readable name of this provider (e.g. "azure", "mock") */
  readonly name: string;

  /**
   * Generate one or more images from a text prompt.
   *
   * @throws ProviderError when the call fails or the response is unusable
   */
  generate(request: ProviderImageRequest, options?: ImageGenerationOptions): Promise<ImageGenerationResult>;
}

export interface GeneratedImage {
  /** Provider-hosted, time-limited URL of the image */
  url?: string;
  /** Base64-encoded image data, for providers that return bytes inline */
  imageBase64?: string;
  /** The provider's rewrite of the prompt, when it performed one */
  revisedPrompt?: string;
}

export interface ImageGenerationResult {
  /** Creation instant reported by the provider, in Unix seconds */
  created?: number;
  images: GeneratedImage[];
  /** Name of the provider that produced these images */
  provider: string;
}
