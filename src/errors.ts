/**
 * Error types for the image tool.
 *
 * Every error raised inside the request handler is one of these kinds and is
 * converted to a `{ success: false }` result at the handler boundary. The
 * `statusCode` / `code` pair matches the `AppError` shape the Express error
 * handler renders.
 */

export type ImageToolErrorKind = "validation" | "provider" | "persistence";

export class ImageToolError extends Error {
  readonly kind: ImageToolErrorKind;
  readonly code: string;
  readonly statusCode: number;

  constructor(
    kind: ImageToolErrorKind,
    code: string,
    statusCode: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** A single rejected request field. */
export interface FieldError {
  field: string;
  message: string;
}

/** Malformed or out-of-range request parameters. Raised before any remote call. */
export class ValidationError extends ImageToolError {
  readonly details: FieldError[];

  constructor(details: FieldError[]) {
    const summary = details.map((d) => `${d.field}: ${d.message}`).join("; ");
    super("validation", "VALIDATION_ERROR", 400, `Invalid request: ${summary}`);
    this.details = details;
  }
}

/** The image provider failed, timed out, or returned an unusable response. */
export class ProviderError extends ImageToolError {
  /** HTTP status returned by the provider, when there was one. */
  readonly providerStatus?: number;

  constructor(message: string, options?: { cause?: unknown; providerStatus?: number }) {
    super("provider", "PROVIDER_ERROR", 502, message, options);
    this.providerStatus = options?.providerStatus;
  }
}

/** Creating the artifact directory, fetching/writing the image, or writing metadata failed. */
export class PersistenceError extends ImageToolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("persistence", "PERSISTENCE_ERROR", 500, message, options);
  }
}

/** Extract a human-readable message from anything thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
