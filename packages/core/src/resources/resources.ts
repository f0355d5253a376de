/**
 * packages/core/src/resources/resources.ts — Image loading contract.
 */

export type ImageFormat = "png" | "unknown";

export type ImageDimensions = Readonly<{ width: number; height: number }>;

/** Loaded image bytes plus what the header told us about them. */
export type ImageHandle = Readonly<{
  path: string;
  bytes: Uint8Array;
  format: ImageFormat;
  /** Pixel size, when the format header carries it. */
  dimensions?: ImageDimensions;
}>;

export interface ResourceLoader {
  /** Throws ResourceLoadError when the image cannot be read. */
  loadImage(path: string): ImageHandle;
}
