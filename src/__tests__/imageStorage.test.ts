import * as fs from "fs/promises";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { PersistenceError } from "../errors";
import {
  createArtifactDirectory,
  detectImageExtension,
  downloadImage,
  formatTimestamp,
  imageFileName,
  loadImageBytes,
  removeArtifactDirectory,
  saveImage,
  saveMetadata,
  type ArtifactMetadata,
} from "../services/imageStorage";
import { PNG_BYTES, listArtifacts, makeTempDir, removeDir, stubFetch } from "./helpers";

let tmp: string;

beforeEach(async () => {
  tmp = await makeTempDir();
});

afterEach(async () => {
  await removeDir(tmp);
});

// ===========================================================================
// Naming
// ===========================================================================

describe("formatTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe("20250102_030405");
  });

  it("zero-pads every component", () => {
    expect(formatTimestamp(new Date(2024, 11, 31, 23, 59, 9))).toBe("20241231_235909");
  });
});

describe("imageFileName", () => {
  it("names the first image generated_image", () => {
    expect(imageFileName(0, "png")).toBe("generated_image.png");
  });

  it("numbers later images from 2", () => {
    expect(imageFileName(1, "png")).toBe("generated_image_2.png");
    expect(imageFileName(2, "jpg")).toBe("generated_image_3.jpg");
  });
});

describe("detectImageExtension", () => {
  it("detects png, jpeg, gif and webp from magic bytes", () => {
    expect(detectImageExtension(PNG_BYTES)).toBe("png");
    expect(detectImageExtension(Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0, 0]))).toBe("jpg");
    expect(detectImageExtension(Buffer.from("GIF89a"))).toBe("gif");
    expect(detectImageExtension(Buffer.from("RIFF\u0000\u0000\u0000\u0000WEBPVP8 "))).toBe("webp");
  });

  it("falls back to png for unknown bytes", () => {
    expect(detectImageExtension(Buffer.from([1, 2, 3, 4]))).toBe("png");
  });
});

// ===========================================================================
// Directory allocation
// ===========================================================================

describe("createArtifactDirectory", () => {
  const at = new Date(2025, 5, 15, 12, 30, 45);

  it("creates the images root and a timestamp-named directory", async () => {
    const imagesDir = path.join(tmp, "images");
    const dir = await createArtifactDirectory(imagesDir, at);

    expect(dir).toBe(path.join(imagesDir, "20250615_123045"));
    expect((await fs.stat(dir)).isDirectory()).toBe(true);
  });

  it("adds a numeric suffix instead of reusing a taken name", async () => {
    const first = await createArtifactDirectory(tmp, at);
    const second = await createArtifactDirectory(tmp, at);
    const third = await createArtifactDirectory(tmp, at);

    expect(path.basename(first)).toBe("20250615_123045");
    expect(path.basename(second)).toBe("20250615_123045_1");
    expect(path.basename(third)).toBe("20250615_123045_2");
  });

  it("allocates distinct directories for concurrent calls", async () => {
    const dirs = await Promise.all([
      createArtifactDirectory(tmp, at),
      createArtifactDirectory(tmp, at),
      createArtifactDirectory(tmp, at),
    ]);

    expect(new Set(dirs).size).toBe(3);
    expect(await listArtifacts(tmp)).toEqual([
      "20250615_123045",
      "20250615_123045_1",
      "20250615_123045_2",
    ]);
  });

  it("fails with a PersistenceError when the root is a file", async () => {
    const blocker = path.join(tmp, "not-a-dir");
    await fs.writeFile(blocker, "x");

    await expect(createArtifactDirectory(blocker, at)).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe("removeArtifactDirectory", () => {
  it("removes the directory and its contents", async () => {
    const dir = await createArtifactDirectory(tmp, new Date(2025, 0, 1, 0, 0, 0));
    await saveImage(dir, 0, PNG_BYTES);

    await removeArtifactDirectory(dir);

    expect(await listArtifacts(tmp)).toEqual([]);
  });
});

// ===========================================================================
// Image bytes
// ===========================================================================

describe("downloadImage", () => {
  it("returns the response bytes", async () => {
    const fetchImpl = stubFetch(PNG_BYTES);

    const bytes = await downloadImage("https://images.example.test/a.png", fetchImpl, 1000);

    expect(bytes.equals(PNG_BYTES)).toBe(true);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://images.example.test/a.png");
  });

  it("throws a PersistenceError on a non-OK status", async () => {
    const fetchImpl = stubFetch("gone", 404);

    await expect(
      downloadImage("https://images.example.test/a.png", fetchImpl, 1000)
    ).rejects.toThrow("Failed to download image: HTTP 404");
  });

  it("throws a PersistenceError when the body is empty", async () => {
    const fetchImpl = stubFetch("");

    await expect(
      downloadImage("https://images.example.test/a.png", fetchImpl, 1000)
    ).rejects.toThrow("response body was empty");
  });

  it("wraps network failures", async () => {
    const fetchImpl = stubFetch(PNG_BYTES);
    fetchImpl.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    await expect(
      downloadImage("https://images.example.test/a.png", fetchImpl, 1000)
    ).rejects.toThrow("Failed to download image: connect ECONNREFUSED");
  });
});

describe("loadImageBytes", () => {
  it("decodes inline base64 without fetching", async () => {
    const fetchImpl = stubFetch(PNG_BYTES);

    const bytes = await loadImageBytes(
      { imageBase64: PNG_BYTES.toString("base64") },
      fetchImpl,
      1000
    );

    expect(bytes.equals(PNG_BYTES)).toBe(true);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("rejects an image with neither url nor data", async () => {
    await expect(loadImageBytes({}, stubFetch(PNG_BYTES), 1000)).rejects.toThrow(
      "Provider returned an image with neither a URL nor inline data"
    );
  });
});

describe("saveImage", () => {
  it("writes the bytes with a sniffed extension", async () => {
    const filepath = await saveImage(tmp, 0, PNG_BYTES);

    expect(filepath).toBe(path.join(tmp, "generated_image.png"));
    expect((await fs.readFile(filepath)).equals(PNG_BYTES)).toBe(true);
  });

  it("refuses to overwrite an existing image", async () => {
    await saveImage(tmp, 0, PNG_BYTES);

    await expect(saveImage(tmp, 0, PNG_BYTES)).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe("saveMetadata", () => {
  const metadata: ArtifactMetadata = {
    prompt: "a red fox in snow",
    revised_prompt: "A red fox curled up in fresh snow",
    url: "https://images.example.test/a.png",
    model: "dalle3",
    size: "1024x1024",
    quality: "standard",
    style: null,
    n: 1,
    revise_prompt: true,
    provider: "stub",
    timestamp: 1_700_000_000,
    created_at: "2023-11-14T22:13:20.000Z",
    image_path: "/images/20231114_221320/generated_image.png",
    images: [
      {
        url: "https://images.example.test/a.png",
        revised_prompt: "A red fox curled up in fresh snow",
        image_path: "/images/20231114_221320/generated_image.png",
      },
    ],
  };

  it("writes metadata.json as indented JSON with a trailing newline", async () => {
    const filepath = await saveMetadata(tmp, metadata);

    expect(filepath).toBe(path.join(tmp, "metadata.json"));
    expect(await fs.readFile(filepath, "utf8")).toBe(JSON.stringify(metadata, null, 2) + "\n");
  });

  it("refuses to overwrite existing metadata", async () => {
    await saveMetadata(tmp, metadata);

    await expect(saveMetadata(tmp, { ...metadata, prompt: "other" })).rejects.toThrow(
      `Failed to write metadata ${path.join(tmp, "metadata.json")}`
    );
    const stored: unknown = JSON.parse(await fs.readFile(path.join(tmp, "metadata.json"), "utf8"));
    expect(stored).toMatchObject({ prompt: "a red fox in snow" });
  });
});
