/**
 * Mock image generation provider.
 *
 * Returns an inline placeholder PNG for development and testing without
 * requiring external API keys or network access. The revised prompt is
 * derived deterministically from the prompt so the same prompt always
 * yields the same response.
 */

import { NO_REVISION_INSTRUCTION } from "../../models/generationRequest";
import type {
  ImageGenerationOptions,
  ImageGenerationProvider,
  ImageGenerationResult,
  ProviderImageRequest,
} from "./types";

/** A 1x1 transparent PNG. */
export const PLACEHOLDER_PNG_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";

/**
 * Simple string hash function that produces a positive integer.
 * Used to tag the revised prompt with a deterministic seed.
 */
export function hashPrompt(prompt: string): number {
  let hash = 0;
  for (let i = 0; i < prompt.length; i++) {
    const char = prompt.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash |= 0; // Convert to 32-bit integer
  }
  return Math.abs(hash);
}

export class MockImageProvider implements ImageGenerationProvider {
  readonly name = "mock";

  async generate(
    request: ProviderImageRequest,
    _options?: ImageGenerationOptions
  ): Promise<ImageGenerationResult> {
    // Honour the no-revision instruction the way the real providers are asked to
    const revisedPrompt = request.prompt.includes(NO_REVISION_INSTRUCTION)
      ? undefined
      : `${request.prompt} (mock render #${hashPrompt(request.prompt)})`;

    const images = Array.from({ length: request.count }, () => ({
      imageBase64: PLACEHOLDER_PNG_BASE64,
      ...(revisedPrompt ? { revisedPrompt } : {}),
    }));

    return {
      created: Math.floor(Date.now() / 1000),
      images,
      provider: this.name,
    };
  }
}
