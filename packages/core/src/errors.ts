/**
 * packages/core/src/errors.ts — Error types for building and drawing.
 *
 * Build failures are returned as values (see BuildResult); draw-time failures
 * are thrown as DeckError instances.
 */

/**
 * Deterministic error codes for draw-time and usage violations.
 *
 *   - DECK_IO: terminal backend write/query failed
 *   - DECK_UNSUPPORTED_STRUCTURE: an IR structure the operator cannot satisfy
 *   - DECK_OTHER: opaque failure from a backend dependency (e.g. image output)
 *   - DECK_INVALID_STATE: API used out of order (e.g. footer read before finalize)
 */
export type DeckErrorCode =
  | "DECK_IO"
  | "DECK_UNSUPPORTED_STRUCTURE"
  | "DECK_OTHER"
  | "DECK_INVALID_STATE";

export class DeckError extends Error {
  override readonly name = "DeckError";
  readonly code: DeckErrorCode;

  constructor(code: DeckErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DeckError);
    }
  }
}

/** Thrown by ThemeProvider implementations when a theme cannot be loaded. */
export class ThemeLoadError extends Error {
  override readonly name = "ThemeLoadError";
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
  }
}

/** Thrown by ResourceLoader implementations when an image cannot be loaded. */
export class ResourceLoadError extends Error {
  override readonly name = "ResourceLoadError";
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
  }
}

export type BuildErrorCode = "INVALID_METADATA" | "INVALID_THEME" | "LOAD_IMAGE";

/** Structured build error with diagnostic context. */
export type BuildError = Readonly<{ code: BuildErrorCode; detail: string }>;

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatBuildError(error: BuildError): string {
  switch (error.code) {
    case "INVALID_METADATA":
      return `invalid presentation metadata: ${error.detail}`;
    case "INVALID_THEME":
      return `invalid theme: ${error.detail}`;
    case "LOAD_IMAGE":
      return `loading image: ${error.detail}`;
  }
}
