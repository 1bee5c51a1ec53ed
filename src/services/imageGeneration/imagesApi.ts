/**
 * Shared HTTP plumbing for the OpenAI-compatible Images API.
 *
 * Azure OpenAI and OpenAI expose the same `images/generations` request and
 * response shapes; only the URL and the auth header differ. Responses are
 * validated with zod before anything reads them.
 */

import { z } from "zod";
import { ProviderError, errorMessage } from "../../errors";
import type { ImageGenerationResult, ProviderImageRequest } from "./types";

/**
 * Response schema for the Images API.
 *
 * Kept minimal so additive API changes do not break parsing.
 */
export const imagesResponseSchema = z.object({
  created: z.number().int().nonnegative().optional(),
  data: z.array(
    z.object({
      url: z.string().optional(),
      b64_json: z.string().optional(),
      revised_prompt: z.string().optional(),
    })
  ),
});

export type ImagesResponse = z.infer<typeof imagesResponseSchema>;

const imagesErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullable().optional(),
    code: z.string().nullable().optional(),
  }),
});

export type FetchFunction = typeof fetch;

export interface ImagesRequestOptions {
  /** Display name used in error messages, e.g. "Azure OpenAI" */
  apiName: string;
  url: string;
  headers: Record<string, string>;
  /** Model id sent in the body; Azure routes by deployment and omits it */
  model?: string;
  request: ProviderImageRequest;
  fetch: FetchFunction;
  signal?: AbortSignal;
}

/** Build the JSON body for an images/generations call. */
export function buildImagesRequestBody(
  request: ProviderImageRequest,
  model?: string
): Record<string, unknown> {
  return {
    ...(model ? { model } : {}),
    prompt: request.prompt,
    n: request.count,
    size: request.size,
    quality: request.quality,
    ...(request.style ? { style: request.style } : {}),
    response_format: "url",
  };
}

/**
 * POST an images/generations request and map the response.
 *
 * @throws ProviderError on network failure, a non-OK status, an unparseable
 *         body, or a response with no images
 */
export async function postImagesRequest(
  options: ImagesRequestOptions
): Promise<Omit<ImageGenerationResult, "provider">> {
  const { apiName } = options;
  let response: Response;

  try {
    response = await options.fetch(options.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify(buildImagesRequestBody(options.request, options.model)),
      signal: options.signal,
    });
  } catch (error: unknown) {
    throw new ProviderError(
      `${apiName} request failed (network error): ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (!response.ok) {
    await throwForErrorResponse(apiName, response);
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch (error: unknown) {
    throw new ProviderError(`${apiName} returned a response that is not valid JSON.`, {
      cause: error,
    });
  }

  const parsed = imagesResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(
      `${apiName} returned an unexpected response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`
    );
  }

  const images = parsed.data.data
    .filter((item) => item.url || item.b64_json)
    .map((item) => ({
      ...(item.url ? { url: item.url } : {}),
      ...(item.b64_json ? { imageBase64: item.b64_json } : {}),
      ...(item.revised_prompt ? { revisedPrompt: item.revised_prompt } : {}),
    }));

  if (images.length === 0) {
    throw new ProviderError(`${apiName} returned no images.`);
  }

  return {
    ...(parsed.data.created !== undefined ? { created: parsed.data.created } : {}),
    images,
  };
}

/**
 * Parse and throw a descriptive error from a non-OK Images API response.
 */
async function throwForErrorResponse(apiName: string, response: Response): Promise<never> {
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    body = null;
  }

  const parsed = imagesErrorSchema.safeParse(body);
  const detail = parsed.success
    ? parsed.data.error.message.trim().replace(/\.+$/, "")
    : `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`;

  const providerStatus = response.status;

  switch (response.status) {
    case 401:
      throw new ProviderError(
        `${apiName} authentication failed: ${detail}. Check that your API key is valid.`,
        { providerStatus }
      );
    case 404:
      throw new ProviderError(
        `${apiName} model or deployment not found: ${detail}.`,
        { providerStatus }
      );
    case 429:
      throw new ProviderError(
        `${apiName} rate limit exceeded: ${detail}. Wait before retrying or check your usage limits.`,
        { providerStatus }
      );
    case 400:
      throw new ProviderError(
        `${apiName} request rejected: ${detail}. This may be a content policy violation or invalid parameters.`,
        { providerStatus }
      );
    default:
      throw new ProviderError(`${apiName} error (HTTP ${response.status}): ${detail}`, {
        providerStatus,
      });
  }
}
