/**
 * Image request handler.
 *
 * Runs one generate_image invocation end to end:
 *
 *   1. Validate and default the request (no side effects)
 *   2. Call the provider exactly once, with a timeout
 *   3. Persist every returned image, then metadata.json, into a fresh
 *      artifact directory
 *   4. Return a GenerationResult
 *
 * Nothing thrown inside crosses the handler boundary: every failure becomes
 * `{ success: false, errorMessage, errorKind }`. When persistence fails after
 * the artifact directory was created, the directory is removed so no
 * half-written artifact is left behind.
 *
 * The handler holds no state between invocations; the provider is injected
 * by the hosting process, which owns its lifecycle.
 */

import { logger } from "../config/logger";
import {
  ImageToolError,
  PersistenceError,
  ProviderError,
  errorMessage,
  type ImageToolErrorKind,
} from "../errors";
import {
  buildProviderPrompt,
  resolveGenerationRequest,
  type GenerationRequest,
  type GenerationRequestInput,
  type ImageModel,
  type ImageQuality,
  type ImageSize,
  type ImageStyle,
} from "../models/generationRequest";
import type { FetchFunction } from "./imageGeneration/imagesApi";
import type { ImageGenerationProvider, ImageGenerationResult } from "./imageGeneration/types";
import {
  createArtifactDirectory,
  loadImageBytes,
  removeArtifactDirectory,
  saveImage,
  saveMetadata,
  type ArtifactMetadata,
} from "./imageStorage";
import { monitoringService } from "./monitoringService";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StoredImage {
  url: string | null;
  revisedPrompt: string;
  localImagePath: string;
}

export interface GenerationSuccess {
  success: true;
  /** Provider rewrite of the prompt, or the original prompt when none was returned */
  revisedPrompt: string;
  /** Remote URL of the first image (provider-hosted, time-limited); null for inline data */
  url: string | null;
  prompt: string;
  model: ImageModel;
  size: ImageSize;
  quality: ImageQuality;
  style: ImageStyle | null;
  count: number;
  allowRevision: boolean;
  provider: string;
  /** Creation instant, Unix seconds */
  timestamp: number;
  createdAt: string;
  artifactDir: string;
  localImagePath: string;
  localMetadataPath: string;
  images: StoredImage[];
}

export interface GenerationFailure {
  success: false;
  errorMessage: string;
  errorKind: ImageToolErrorKind;
}

export type GenerationResult = GenerationSuccess | GenerationFailure;

export interface ImageRequestHandlerDeps {
  provider: ImageGenerationProvider;
  /** Root directory artifact directories are created under */
  imagesDir: string;
  /** Used to download provider-hosted images (default: global fetch) */
  fetch?: FetchFunction;
  /** Provider call timeout (default: 120s) */
  providerTimeoutMs?: number;
  /** Image download timeout (default: 60s) */
  downloadTimeoutMs?: number;
  /** Clock used when the provider reports no creation time */
  now?: () => Date;
}

const DEFAULT_PROVIDER_TIMEOUT_MS = 120_000;
const DEFAULT_DOWNLOAD_TIMEOUT_MS = 60_000;

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

export class ImageRequestHandler {
  private readonly provider: ImageGenerationProvider;
  private readonly imagesDir: string;
  private readonly fetchImpl: FetchFunction;
  private readonly providerTimeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly now: () => Date;

  constructor(deps: ImageRequestHandlerDeps) {
    this.provider = deps.provider;
    this.imagesDir = deps.imagesDir;
    this.fetchImpl = deps.fetch ?? fetch;
    this.providerTimeoutMs = deps.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.downloadTimeoutMs = deps.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
    this.now = deps.now ?? (() => new Date());
  }

  get providerName(): string {
    return this.provider.name;
  }

  get imagesRoot(): string {
    return this.imagesDir;
  }

  /**
   * Generate, persist and describe an image. Never throws.
   */
  async generateImage(input: GenerationRequestInput): Promise<GenerationResult> {
    const startedAt = Date.now();

    try {
      const request = resolveGenerationRequest(input);

      logger.info("imageTool", "Generating image", {
        provider: this.provider.name,
        model: request.model,
        size: request.size,
        quality: request.quality,
        n: request.count,
      });

      const generation = await this.callProvider(request);
      const result = await this.persist(request, generation);

      monitoringService.recordGeneration(true);
      logger.info("imageTool", "Image generated", {
        artifactDir: result.artifactDir,
        images: result.images.length,
        durationMs: Date.now() - startedAt,
      });

      return result;
    } catch (error: unknown) {
      const failure = toFailure(error);

      monitoringService.recordGeneration(false);
      logger.warn("imageTool", `Image generation failed: ${failure.errorMessage}`, {
        errorKind: failure.errorKind,
        durationMs: Date.now() - startedAt,
      });

      return failure;
    }
  }

  /** One provider call, no retries. Any failure becomes a ProviderError. */
  private async callProvider(request: GenerationRequest): Promise<ImageGenerationResult> {
    let generation: ImageGenerationResult;

    try {
      generation = await this.provider.generate(
        {
          prompt: buildProviderPrompt(request),
          model: request.model,
          size: request.size,
          quality: request.quality,
          count: request.count,
          ...(request.style ? { style: request.style } : {}),
        },
        { signal: AbortSignal.timeout(this.providerTimeoutMs) }
      );
    } catch (error: unknown) {
      if (error instanceof ImageToolError) throw error;
      throw new ProviderError(`Image provider failed: ${errorMessage(error)}`, { cause: error });
    }

    if (generation.images.length === 0) {
      throw new ProviderError("Image provider returned no images");
    }

    return generation;
  }

  /**
   * Write images then metadata into a fresh artifact directory.
   * On failure the directory is removed before the error propagates.
   */
  private async persist(
    request: GenerationRequest,
    generation: ImageGenerationResult
  ): Promise<GenerationSuccess> {
    const createdDate = this.creationDate(generation.created);
    const timestamp = Math.floor(createdDate.getTime() / 1000);
    const createdAt = createdDate.toISOString();

    const artifactDir = await createArtifactDirectory(this.imagesDir, createdDate);

    try {
      const images: StoredImage[] = [];
      for (const [index, image] of generation.images.entries()) {
        const bytes = await loadImageBytes(image, this.fetchImpl, this.downloadTimeoutMs);
        const localImagePath = await saveImage(artifactDir, index, bytes);
        images.push({
          url: image.url ?? null,
          revisedPrompt: image.revisedPrompt ?? request.prompt,
          localImagePath,
        });
      }

      const [first] = images;
      if (!first) {
        throw new PersistenceError("No images were written");
      }

      const metadata: ArtifactMetadata = {
        prompt: request.prompt,
        revised_prompt: first.revisedPrompt,
        url: first.url,
        model: request.model,
        size: request.size,
        quality: request.quality,
        style: request.style ?? null,
        n: request.count,
        revise_prompt: request.allowRevision,
        provider: generation.provider,
        timestamp,
        created_at: createdAt,
        image_path: first.localImagePath,
        images: images.map((image) => ({
          url: image.url,
          revised_prompt: image.revisedPrompt,
          image_path: image.localImagePath,
        })),
      };
      const localMetadataPath = await saveMetadata(artifactDir, metadata);

      return {
        success: true,
        revisedPrompt: first.revisedPrompt,
        url: first.url,
        prompt: request.prompt,
        model: request.model,
        size: request.size,
        quality: request.quality,
        style: request.style ?? null,
        count: request.count,
        allowRevision: request.allowRevision,
        provider: generation.provider,
        timestamp,
        createdAt,
        artifactDir,
        localImagePath: first.localImagePath,
        localMetadataPath,
        images,
      };
    } catch (error: unknown) {
      await removeArtifactDirectory(artifactDir);
      if (error instanceof ImageToolError) throw error;
      throw new PersistenceError(`Failed to save image: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** The provider's creation instant, or the handler clock when it is missing or unusable. */
  private creationDate(created: number | undefined): Date {
    if (created !== undefined) {
      const date = new Date(created * 1000);
      if (!Number.isNaN(date.getTime())) return date;

      logger.warn("imageTool", "Provider reported an invalid creation time, using the local clock", {
        created,
      });
    }
    return this.now();
  }
}

/** Convert anything thrown into the uniform failure shape. */
function toFailure(error: unknown): GenerationFailure {
  if (error instanceof ImageToolError) {
    return { success: false, errorMessage: error.message, errorKind: error.kind };
  }
  // Only the provider and persistence stages wrap unknown errors; anything
  // else reaching here escaped a provider implementation's own handling.
  return {
    success: false,
    errorMessage: errorMessage(error) || "Unknown error",
    errorKind: "provider",
  };
}
