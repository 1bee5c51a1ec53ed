/**
 * Shared test helpers: temp directories, stub providers and fetch stubs.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import type { FetchFunction } from "../services/imageGeneration/imagesApi";
import type {
  ImageGenerationProvider,
  ImageGenerationResult,
} from "../services/imageGeneration/types";

/** Minimal PNG: signature plus padding. */
export const PNG_BYTES = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, ...new Array<number>(16).fill(0),
]);

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "dalle-mcp-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Names of the artifact directories under an images root ([] when it does not exist). */
export async function listArtifacts(imagesDir: string): Promise<string[]> {
  try {
    return (await fs.readdir(imagesDir)).sort();
  } catch {
    return [];
  }
}

/** A provider whose generate() resolves with `result`, or rejects with `error`. */
export function stubProvider(outcome: ImageGenerationResult | Error) {
  const generate = vi.fn<ImageGenerationProvider["generate"]>(async () => {
    if (outcome instanceof Error) throw outcome;
    return outcome;
  });
  const provider: ImageGenerationProvider = { name: "stub", generate };
  return { provider, generate };
}

/** A fetch that always answers with `body` and `status`. */
export function stubFetch(body: Buffer | string, status = 200, headers: Record<string, string> = {}) {
  return vi.fn<FetchFunction>(async () => new Response(body, { status, headers }));
}

/** A fetch that answers with a JSON body. */
export function jsonFetch(body: unknown, status = 200) {
  return stubFetch(JSON.stringify(body), status, { "Content-Type": "application/json" });
}
