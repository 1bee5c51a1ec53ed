/**
 * Image storage service.
 *
 * Persists generated images and their metadata under the images root:
 *
 *   images/
 *     20250102_030405/
 *       generated_image.png
 *       generated_image_2.png   (only when n > 1)
 *       metadata.json
 *
 * Artifact directories are named after the generation timestamp in local
 * time. A directory is only ever created exclusively; when the name is taken
 * (two generations within the same second) a `_1`, `_2`, ... suffix is added.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { logger } from "../config/logger";
import { PersistenceError, errorMessage } from "../errors";
import type { FetchFunction } from "./imageGeneration/imagesApi";
import type { GeneratedImage } from "./imageGeneration/types";

export const METADATA_FILENAME = "metadata.json";

/** Give up allocating a directory after this many suffixes. */
const MAX_DIRECTORY_ATTEMPTS = 1000;

/** Generated images larger than this are rejected (DALL-E PNGs are a few MB). */
const MAX_IMAGE_BYTES = 50 * 1024 * 1024;

/** On-disk metadata document, stored as 2-space indented JSON. */
export interface ArtifactMetadata {
  prompt: string;
  revised_prompt: string;
  url: string | null;
  model: string;
  size: string;
  quality: string;
  style: string | null;
  n: number;
  revise_prompt: boolean;
  provider: string;
  /** Provider creation instant, Unix seconds */
  timestamp: number;
  created_at: string;
  image_path: string;
  images: Array<{ url: string | null; revised_prompt: string; image_path: string }>;
}

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Format a date as YYYYMMDD_HHMMSS in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** File name for the image at `index` (0-based). */
export function imageFileName(index: number, extension: string): string {
  return index === 0
    ? `generated_image.${extension}`
    : `generated_image_${index + 1}.${extension}`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

// ---------------------------------------------------------------------------
// Format sniffing
// ---------------------------------------------------------------------------

const MAGIC: Array<{ bytes: number[]; extension: string }> = [
  { bytes: [0x89, 0x50, 0x4e, 0x47], extension: "png" },
  { bytes: [0xff, 0xd8, 0xff], extension: "jpg" },
  { bytes: [0x47, 0x49, 0x46], extension: "gif" },
];

/** File extension for image bytes, from their magic bytes. Defaults to png. */
export function detectImageExtension(buf: Uint8Array): string {
  for (const { bytes, extension } of MAGIC) {
    if (bytes.every((b, i) => buf[i] === b)) return extension;
  }
  // RIFF....WEBP
  if (
    buf.length >= 12 &&
    String.fromCharCode(buf[0], buf[1], buf[2], buf[3]) === "RIFF" &&
    String.fromCharCode(buf[8], buf[9], buf[10], buf[11]) === "WEBP"
  ) {
    return "webp";
  }
  return "png";
}

// ---------------------------------------------------------------------------
// Directory lifecycle
// ---------------------------------------------------------------------------

/**
 * Create a fresh artifact directory for a generation at `date`.
 *
 * @returns Absolute path of the created directory
 * @throws PersistenceError when the directory cannot be created
 */
export async function createArtifactDirectory(imagesDir: string, date: Date): Promise<string> {
  const root = path.resolve(imagesDir);
  const base = formatTimestamp(date);

  try {
    await fs.mkdir(root, { recursive: true });
  } catch (error: unknown) {
    throw new PersistenceError(
      `Failed to create images directory ${root}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  for (let attempt = 0; attempt < MAX_DIRECTORY_ATTEMPTS; attempt++) {
    const candidate = path.join(root, attempt === 0 ? base : `${base}_${attempt}`);
    try {
      // Non-recursive mkdir fails with EEXIST instead of reusing a directory
      await fs.mkdir(candidate);
      return candidate;
    } catch (error: unknown) {
      if (hasErrorCode(error, "EEXIST")) continue;
      throw new PersistenceError(
        `Failed to create artifact directory ${candidate}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  throw new PersistenceError(
    `Failed to allocate an artifact directory for ${base}: ${MAX_DIRECTORY_ATTEMPTS} names already taken`
  );
}

/**
 * Remove a partially written artifact directory.
 * Failures are logged, never thrown, so the original error stays the one reported.
 */
export async function removeArtifactDirectory(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
    logger.info("imageStorage", "Removed partial artifact directory", { dir });
  } catch (error: unknown) {
    logger.warn("imageStorage", "Failed to remove partial artifact directory", {
      dir,
      error: errorMessage(error),
    });
  }
}

// ---------------------------------------------------------------------------
// Image bytes
// ---------------------------------------------------------------------------

/**
 * Download an image from a provider-hosted URL.
 *
 * @throws PersistenceError on network failure, timeout, non-OK status or an oversized body
 */
export async function downloadImage(
  url: string,
  fetchImpl: FetchFunction,
  timeoutMs: number
): Promise<Buffer> {
  let response: Response;

  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error: unknown) {
    throw new PersistenceError(`Failed to download image: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new PersistenceError(
      `Failed to download image: HTTP ${response.status} ${response.statusText}`
    );
  }

  let buffer: Buffer;
  try {
    buffer = Buffer.from(await response.arrayBuffer());
  } catch (error: unknown) {
    throw new PersistenceError(`Failed to read image body: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (buffer.length === 0) {
    throw new PersistenceError("Failed to download image: response body was empty");
  }
  if (buffer.length > MAX_IMAGE_BYTES) {
    throw new PersistenceError(
      `Failed to download image: ${buffer.length} bytes exceeds limit of ${MAX_IMAGE_BYTES} bytes`
    );
  }

  return buffer;
}

/**
 * Resolve the bytes of one generated image, decoding inline base64 when the
 * provider supplied it and downloading the URL otherwise.
 */
export async function loadImageBytes(
  image: GeneratedImage,
  fetchImpl: FetchFunction,
  timeoutMs: number
): Promise<Buffer> {
  if (image.imageBase64) {
    const buffer = Buffer.from(image.imageBase64, "base64");
    if (buffer.length === 0) {
      throw new PersistenceError("Provider returned empty base64 image data");
    }
    return buffer;
  }

  if (image.url) {
    return downloadImage(image.url, fetchImpl, timeoutMs);
  }

  throw new PersistenceError("Provider returned an image with neither a URL nor inline data");
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Write image bytes into the artifact directory.
 *
 * @returns Absolute path of the written file
 */
export async function saveImage(dir: string, index: number, bytes: Buffer): Promise<string> {
  const filepath = path.join(dir, imageFileName(index, detectImageExtension(bytes)));

  try {
    // "wx" refuses to overwrite; every artifact directory starts empty
    await fs.writeFile(filepath, bytes, { flag: "wx" });
  } catch (error: unknown) {
    throw new PersistenceError(`Failed to write image ${filepath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  logger.info("imageStorage", `Image saved to ${filepath}`, { bytes: bytes.length });
  return filepath;
}

/**
 * Write metadata.json into the artifact directory.
 *
 * @returns Absolute path of the written file
 */
export async function saveMetadata(dir: string, metadata: ArtifactMetadata): Promise<string> {
  const filepath = path.join(dir, METADATA_FILENAME);

  try {
    await fs.writeFile(filepath, JSON.stringify(metadata, null, 2) + "\n", {
      encoding: "utf8",
      flag: "wx",
    });
  } catch (error: unknown) {
    throw new PersistenceError(`Failed to write metadata ${filepath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  logger.info("imageStorage", `Metadata saved to ${filepath}`);
  return filepath;
}

