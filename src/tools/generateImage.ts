/**
 * generate_image tool definition.
 *
 * The input schema is loose (plain strings and numbers): enum,
 * range and model-compatibility checks belong to the request handler, so a
 * bad value comes back as the uniform `{ success: false, error }` payload
 * instead of a protocol-level schema error.
 */

import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { GenerationRequestInput } from "../models/generationRequest";
import type { GenerationResult } from "../services/imageRequestHandler";

export const GENERATE_IMAGE_TOOL_NAME = "generate_image";

export const GENERATE_IMAGE_DESCRIPTION =
  "Generate an image from a text prompt with DALL-E, save it with its metadata under the " +
  "local images directory, and return the image URL, the revised prompt and the local paths.";

export const generateImageInputShape = {
  prompt: z.string().describe("The text prompt to generate the image from"),
  size: z
    .string()
    .optional()
    .describe(
      "Image size. dalle3: 1024x1024, 1792x1024 or 1024x1792. dalle2: 256x256, 512x512 or 1024x1024. Default 1024x1024"
    ),
  quality: z
    .string()
    .optional()
    .describe("Image quality: standard or hd (dalle3 only). Default standard"),
  n: z
    .number()
    .optional()
    .describe("Number of images to generate, 1-10. dalle3 only supports 1. Default 1"),
  style: z
    .string()
    .nullable()
    .optional()
    .describe("Image style: natural or vivid (dalle3 only). Omit for the provider default"),
  model: z.string().optional().describe("DALL-E model: dalle3 or dalle2. Default dalle3"),
  revise_prompt: z
    .boolean()
    .optional()
    .describe("Whether DALL-E may rewrite the prompt before generating. Default true"),
};

export type GenerateImageToolArgs = z.infer<z.ZodObject<typeof generateImageInputShape>>;

/** Anything that can serve the tool; the request handler in production. */
export interface GenerateImageCapability {
  generateImage(input: GenerationRequestInput): Promise<GenerationResult>;
}

export interface GenerateImageSuccessPayload {
  success: true;
  revised_prompt: string;
  url: string | null;
  model: string;
  size: string;
  quality: string;
  style: string | null;
  n: number;
  revise_prompt: boolean;
  provider: string;
  timestamp: number;
  created_at: string;
  local_image_path: string;
  local_metadata_path: string;
  images: Array<{ url: string | null; revised_prompt: string; local_image_path: string }>;
}

export interface GenerateImageFailurePayload {
  success: false;
  error: string;
  error_kind: string;
}

export type GenerateImagePayload = GenerateImageSuccessPayload | GenerateImageFailurePayload;

/** Map wire argument names onto the request model. */
export function toGenerationInput(args: GenerateImageToolArgs): GenerationRequestInput {
  return {
    prompt: args.prompt,
    size: args.size,
    quality: args.quality,
    count: args.n,
    style: args.style,
    model: args.model,
    allowRevision: args.revise_prompt,
  };
}

/** Serialize a GenerationResult into the snake_case tool payload. */
export function toToolPayload(result: GenerationResult): GenerateImagePayload {
  if (!result.success) {
    return { success: false, error: result.errorMessage, error_kind: result.errorKind };
  }

  return {
    success: true,
    revised_prompt: result.revisedPrompt,
    url: result.url,
    model: result.model,
    size: result.size,
    quality: result.quality,
    style: result.style,
    n: result.count,
    revise_prompt: result.allowRevision,
    provider: result.provider,
    timestamp: result.timestamp,
    created_at: result.createdAt,
    local_image_path: result.localImagePath,
    local_metadata_path: result.localMetadataPath,
    images: result.images.map((image) => ({
      url: image.url,
      revised_prompt: image.revisedPrompt,
      local_image_path: image.localImagePath,
    })),
  };
}

/** Run the tool and wrap the payload as MCP text content. */
export async function runGenerateImageTool(
  handler: GenerateImageCapability,
  args: GenerateImageToolArgs
): Promise<CallToolResult> {
  const result = await handler.generateImage(toGenerationInput(args));
  const payload = toToolPayload(result);

  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    ...(payload.success ? {} : { isError: true }),
  };
}
