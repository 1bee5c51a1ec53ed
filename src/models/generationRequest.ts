/**
 * Generation request model.
 *
 * Enumerates every option the generate_image tool recognizes, its default,
 * and which combinations each model accepts. `resolveGenerationRequest` is
 * the single validation step: it either returns a fully defaulted
 * GenerationRequest or throws a ValidationError listing every bad field.
 */

import { ValidationError, type FieldError } from "../errors";

export type ImageModel = "dalle3" | "dalle2";

export type ImageSize = "256x256" | "512x512" | "1024x1024" | "1792x1024" | "1024x1792";

export type ImageQuality = "standard" | "hd";

export type ImageStyle = "natural" | "vivid";

/** Raw tool arguments, before validation. Every field but the prompt is optional. */
export interface GenerationRequestInput {
  prompt: string;
  size?: string;
  quality?: string;
  count?: number;
  style?: string | null;
  model?: string;
  allowRevision?: boolean;
}

/** A validated, fully defaulted request. */
export interface GenerationRequest {
  prompt: string;
  size: ImageSize;
  quality: ImageQuality;
  count: number;
  /** Unset means the provider default. */
  style?: ImageStyle;
  model: ImageModel;
  allowRevision: boolean;
}

interface ModelCapabilities {
  sizes: readonly ImageSize[];
  qualities: readonly ImageQuality[];
  maxCount: number;
  supportsStyle: boolean;
}

export const MODELS: readonly ImageModel[] = ["dalle3", "dalle2"];

export const SIZES: readonly ImageSize[] = [
  "256x256",
  "512x512",
  "1024x1024",
  "1792x1024",
  "1024x1792",
];

export const QUALITIES: readonly ImageQuality[] = ["standard", "hd"];

export const STYLES: readonly ImageStyle[] = ["natural", "vivid"];

export const MIN_COUNT = 1;
export const MAX_COUNT = 10;

export const MODEL_CAPABILITIES: Record<ImageModel, ModelCapabilities> = {
  dalle3: {
    sizes: ["1024x1024", "1792x1024", "1024x1792"],
    qualities: ["standard", "hd"],
    maxCount: 1,
    supportsStyle: true,
  },
  dalle2: {
    sizes: ["256x256", "512x512", "1024x1024"],
    qualities: ["standard"],
    maxCount: 10,
    supportsStyle: false,
  },
};

export const DEFAULTS = {
  size: "1024x1024",
  quality: "standard",
  count: 1,
  model: "dalle3",
  allowRevision: true,
} as const satisfies Omit<GenerationRequest, "prompt" | "style">;

/** Accepted spellings that map onto a canonical quality. */
const QUALITY_ALIASES: ReadonlyMap<string, ImageQuality> = new Map<string, ImageQuality>([
  ["standard", "standard"],
  ["hd", "hd"],
  ["high", "hd"],
]);

/** Appended to the prompt when the caller disallows provider-side rewriting. */
export const NO_REVISION_INSTRUCTION =
  "Use this prompt exactly as written; do not rewrite or add detail to it.";

function pick<T extends string>(allowed: readonly T[], value: string): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === "";
}

/**
 * Validate raw tool arguments and apply defaults.
 *
 * Pure and deterministic. Model-dependent checks (size, quality, style,
 * count) only run when the model itself is valid.
 *
 * @throws ValidationError listing every rejected field
 */
export function resolveGenerationRequest(input: GenerationRequestInput): GenerationRequest {
  const errors: FieldError[] = [];

  // Prompt: required, non-empty
  const prompt = typeof input.prompt === "string" ? input.prompt.trim() : "";
  if (prompt === "") {
    errors.push({ field: "prompt", message: "Prompt is required" });
  }

  // Model
  let model: ImageModel | undefined = DEFAULTS.model;
  if (!isBlank(input.model)) {
    model = pick(MODELS, String(input.model).trim().toLowerCase());
    if (!model) {
      errors.push({
        field: "model",
        message: `Model must be one of: ${MODELS.join(", ")}`,
      });
    }
  }
  const capabilities = model ? MODEL_CAPABILITIES[model] : undefined;

  // Size
  let size: ImageSize | undefined = DEFAULTS.size;
  if (!isBlank(input.size)) {
    size = pick(SIZES, String(input.size).trim().toLowerCase());
    if (!size) {
      errors.push({
        field: "size",
        message: `Size must be one of: ${SIZES.join(", ")}`,
      });
    }
  }
  if (size && model && capabilities && !capabilities.sizes.includes(size)) {
    errors.push({
      field: "size",
      message: `Size ${size} is not supported by ${model} (supported: ${capabilities.sizes.join(", ")})`,
    });
  }

  // Quality
  let quality: ImageQuality | undefined = DEFAULTS.quality;
  if (!isBlank(input.quality)) {
    quality = QUALITY_ALIASES.get(String(input.quality).trim().toLowerCase());
    if (!quality) {
      errors.push({
        field: "quality",
        message: "Quality must be one of: standard, hd (or high)",
      });
    }
  }
  if (quality && model && capabilities && !capabilities.qualities.includes(quality)) {
    errors.push({
      field: "quality",
      message: `Quality ${quality} is not supported by ${model}`,
    });
  }

  // Count
  const count = input.count ?? DEFAULTS.count;
  if (!Number.isInteger(count) || count < MIN_COUNT || count > MAX_COUNT) {
    errors.push({
      field: "n",
      message: `Number of images must be an integer between ${MIN_COUNT} and ${MAX_COUNT}`,
    });
  } else if (model && capabilities && count > capabilities.maxCount) {
    errors.push({
      field: "n",
      message: `${model} generates at most ${capabilities.maxCount} image(s) per request`,
    });
  }

  // Style: optional
  let style: ImageStyle | undefined;
  if (!isBlank(input.style)) {
    style = pick(STYLES, String(input.style).trim().toLowerCase());
    if (!style) {
      errors.push({
        field: "style",
        message: `Style must be one of: ${STYLES.join(", ")}`,
      });
    } else if (model && capabilities && !capabilities.supportsStyle) {
      errors.push({
        field: "style",
        message: `Style is not supported by ${model}`,
      });
    }
  }

  const allowRevision = input.allowRevision ?? DEFAULTS.allowRevision;
  if (typeof allowRevision !== "boolean") {
    errors.push({ field: "revise_prompt", message: "revise_prompt must be a boolean" });
  }

  if (errors.length > 0 || !model || !size || !quality) {
    throw new ValidationError(errors);
  }

  return {
    prompt,
    size,
    quality,
    count,
    ...(style ? { style } : {}),
    model,
    allowRevision,
  };
}

/** The prompt text actually sent to the provider. */
export function buildProviderPrompt(request: GenerationRequest): string {
  if (request.allowRevision) return request.prompt;
  return `${request.prompt}\n\n${NO_REVISION_INSTRUCTION}`;
}
