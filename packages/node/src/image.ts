/**
 * packages/node/src/image.ts — File-backed image loading.
 *
 * Loaded images are kept in a small LRU keyed by resolved path, so a slide
 * that is re-rendered on every key press reads its images once.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  type ImageDimensions,
  type ImageHandle,
  type ResourceLoader,
  ResourceLoadError,
  describeError,
} from "@termdeck/core";

const DEFAULT_IMAGE_CACHE_MAX_ENTRIES = 100;
const IMAGE_CACHE = new Map<string, ImageHandle>();
let imageCacheMaxEntries = DEFAULT_IMAGE_CACHE_MAX_ENTRIES;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] as const;
// Signature, chunk length, "IHDR", width, height.
const PNG_HEADER_LENGTH = 24;

function normalizeCacheMaxEntries(maxEntries: number): number {
  if (!Number.isFinite(maxEntries) || !Number.isInteger(maxEntries) || maxEntries < 0) {
    throw new TypeError("setImageCacheMaxEntries(maxEntries): maxEntries must be a non-negative integer");
  }
  return maxEntries;
}

function evictOverflowEntries(): void {
  while (IMAGE_CACHE.size > imageCacheMaxEntries) {
    const oldest = IMAGE_CACHE.keys().next();
    if (oldest.done) return;
    IMAGE_CACHE.delete(oldest.value);
  }
}

export function setImageCacheMaxEntries(maxEntries: number): void {
  imageCacheMaxEntries = normalizeCacheMaxEntries(maxEntries);
  evictOverflowEntries();
}

export function clearImageCache(): void {
  IMAGE_CACHE.clear();
}

function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((value, index) => bytes[index] === value);
}

/** Width and height from a PNG IHDR chunk, or undefined for anything else. */
export function readPngDimensions(bytes: Uint8Array): ImageDimensions | undefined {
  if (!isPng(bytes) || bytes.length < PNG_HEADER_LENGTH) return undefined;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chunkType = String.fromCharCode(bytes[12] ?? 0, bytes[13] ?? 0, bytes[14] ?? 0, bytes[15] ?? 0);
  if (chunkType !== "IHDR") return undefined;
  const width = view.getUint32(16);
  const height = view.getUint32(20);
  if (width === 0 || height === 0) return undefined;
  return { width, height };
}

export function loadImage(path: string): ImageHandle {
  if (path.length === 0) {
    throw new ResourceLoadError(path, "image path must be a non-empty string");
  }
  const resolvedPath = resolve(path);
  const cached = IMAGE_CACHE.get(resolvedPath);
  if (cached) {
    IMAGE_CACHE.delete(resolvedPath);
    IMAGE_CACHE.set(resolvedPath, cached);
    return cached;
  }

  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(readFileSync(resolvedPath));
  } catch (error: unknown) {
    throw new ResourceLoadError(path, `${path}: ${describeError(error)}`, { cause: error });
  }
  const dimensions = readPngDimensions(bytes);
  const handle: ImageHandle = Object.freeze({
    path: resolvedPath,
    bytes,
    format: isPng(bytes) ? "png" : "unknown",
    ...(dimensions === undefined ? {} : { dimensions }),
  });
  IMAGE_CACHE.set(resolvedPath, handle);
  evictOverflowEntries();
  return handle;
}

/** Resolves relative image paths against the presentation's directory. */
export function createFileResourceLoader(baseDir: string): ResourceLoader {
  return {
    loadImage(path) {
      if (path.length === 0) return loadImage(path);
      return loadImage(resolve(baseDir, path));
    },
  };
}
