/**
 * Image downloads and the URL-to-file manifest shared by fetch and render
 */

import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import sharp from "sharp";
import type { ManualApi } from "./api.js";
import { HttpError, errorMessage } from "./errors.js";
import type { ImageManifest } from "./types.js";
import { delay, isRecord, writeOutputFile } from "./utils.js";

export const IMAGES_DIRNAME = "images";
export const MANIFEST_FILENAME = "images.json";

/** Extension used when neither the URL nor the file content reveal a format */
const DEFAULT_EXTENSION = ".png";

/** URL fragments checked in order; the first match decides the extension */
const URL_EXTENSIONS: ReadonlyArray<[string, string]> = [
  [".svg", ".svg"],
  [".png", ".png"],
  [".jpg", ".jpg"],
  [".jpeg", ".jpg"],
  [".gif", ".gif"],
  [".webp", ".webp"],
];

const FORMAT_EXTENSIONS: Record<string, string> = {
  png: ".png",
  jpeg: ".jpg",
  gif: ".gif",
  svg: ".svg",
  webp: ".webp",
};

const MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
};

/**
 * Guess an image extension from its URL.
 *
 * @returns The extension with leading dot, or null if the URL names no known format
 */
export function extensionFromUrl(url: string): string | null {
  const lower = url.toLowerCase();
  for (const [fragment, extension] of URL_EXTENSIONS) {
    if (lower.includes(fragment)) return extension;
  }
  return null;
}

/**
 * Derive a stable local filename from an image URL.
 * Uses the `key` query parameter when present, otherwise the URL's MD5 hash.
 *
 * @param url - Absolute image URL
 * @param extension - Extension to use when the URL does not name one
 *
 * @example
 * urlToFilename('https://example.com/api/image?key=abc/icon.svg') // 'abc_icon.svg'
 */
export function urlToFilename(url: string, extension?: string): string {
  let key: string | null = null;
  try {
    key = new URL(url).searchParams.get("key");
  } catch {
    key = null;
  }

  let filename = key ? key.replace(/[^\w.-]/g, "_") : createHash("md5").update(url).digest("hex");
  const ext = extensionFromUrl(url) ?? extension ?? DEFAULT_EXTENSION;
  if (!filename.endsWith(ext)) {
    filename += ext;
  }
  return filename;
}

/**
 * MIME type for an image filename, defaulting to PNG.
 */
export function mimeTypeFor(filename: string): string {
  return MIME_TYPES[path.extname(filename).toLowerCase()] ?? "image/png";
}

/**
 * Determine the extension of an image from its content.
 * Unreadable data gets the default extension.
 */
export async function detectExtension(buffer: Buffer): Promise<string> {
  try {
    const { format } = await sharp(buffer).metadata();
    return (format && FORMAT_EXTENSIONS[format]) || DEFAULT_EXTENSION;
  } catch {
    return DEFAULT_EXTENSION;
  }
}

/**
 * Resolve an image reference against the API origin.
 *
 * @returns Absolute URL, or null for inline data and unparseable references
 */
export function resolveImageUrl(src: string, baseUrl: string): string | null {
  if (!src || src.startsWith("data:")) return null;
  try {
    return new URL(src, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Read images.json from an output directory.
 * A missing file yields an empty manifest.
 */
export async function loadImageManifest(outputDir: string): Promise<ImageManifest> {
  let content: string;
  try {
    content = await fs.readFile(path.join(outputDir, MANIFEST_FILENAME), "utf-8");
  } catch {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    console.error(`Warning: ${MANIFEST_FILENAME} is not valid JSON, ignoring it.`);
    return {};
  }

  const manifest: ImageManifest = {};
  if (isRecord(data)) {
    for (const [url, filename] of Object.entries(data)) {
      if (typeof filename === "string") manifest[url] = filename;
    }
  }
  return manifest;
}

async function fileExists(filepath: string): Promise<boolean> {
  try {
    await fs.access(filepath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Downloads images once per URL and remembers where they were saved.
 * Files recorded in an earlier run's manifest are reused without a request.
 */
export class ImageStore {
  readonly manifest: ImageManifest;
  /** Images downloaded during this run */
  downloadedCount = 0;
  /** URLs that could not be downloaded */
  readonly failed: string[] = [];

  private readonly outputDir: string;
  private readonly api: Pick<ManualApi, "fetchBinary">;
  private readonly imageDelay: number;

  constructor(outputDir: string, api: Pick<ManualApi, "fetchBinary">, imageDelay: number, manifest: ImageManifest = {}) {
    this.outputDir = outputDir;
    this.api = api;
    this.imageDelay = imageDelay;
    this.manifest = manifest;
  }

  get imagesDir(): string {
    return path.join(this.outputDir, IMAGES_DIRNAME);
  }

  /**
   * Make sure an image is on disk.
   *
   * @param url - Absolute image URL
   * @returns Filename inside the images directory, or null if the download failed
   * @throws {WriteError} If the image could not be saved
   */
  async ensure(url: string): Promise<string | null> {
    const known = this.manifest[url];
    if (known && (await fileExists(path.join(this.imagesDir, known)))) {
      return known;
    }
    if (this.failed.includes(url)) return null;

    let buffer: Buffer;
    try {
      buffer = await this.api.fetchBinary(url);
    } catch (error) {
      if (!(error instanceof HttpError)) throw error;
      console.error(`\n  Warning: Failed to download image ${url}: ${errorMessage(error)}`);
      this.failed.push(url);
      return null;
    }

    const extension = extensionFromUrl(url) ?? (await detectExtension(buffer));
    const filename = urlToFilename(url, extension);
    const filepath = path.join(this.imagesDir, filename);
    await writeOutputFile(filepath, buffer);

    this.manifest[url] = filename;
    this.downloadedCount++;
    await delay(this.imageDelay);
    return filename;
  }

  /**
   * Write the manifest with sorted keys so unchanged runs produce the same file.
   */
  async save(): Promise<void> {
    const sorted: ImageManifest = {};
    for (const url of Object.keys(this.manifest).sort()) {
      sorted[url] = this.manifest[url];
    }
    await writeOutputFile(path.join(this.outputDir, MANIFEST_FILENAME), `${JSON.stringify(sorted, null, 2)}\n`);
  }
}
