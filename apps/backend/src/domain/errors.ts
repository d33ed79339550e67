/**
 * Error taxonomy for the product pipeline.
 *
 * Lower layers raise their specific kind; ProductCreator folds the AI and
 * image kinds into ProductCreationError, and the routes map that onto HTTP.
 */

/** A caller-supplied parameter is outside its contract. Raised before any side effect. */
export class InvalidArgumentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidArgumentError";
  }
}

/** A referenced input resource (e.g. a source image file) does not exist. */
export class NotFoundError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** The generative backend failed, returned nothing, or the transport broke. */
export class BackendError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BackendError";
  }
}

/** Backend text could not be read as product metadata. */
export class ExtractionFailedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExtractionFailedError";
  }
}

/** Raster decode or re-encode failed. */
export class ConversionFailedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConversionFailedError";
  }
}

/** The record store failed to answer a read query. */
export class RetrievalFailedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RetrievalFailedError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export type ProductCreationErrorKind =
  | "AI_GENERATION_FAILED"
  | "IMAGE_CONVERSION_FAILED"
  | "UNCLASSIFIED";

const KIND_PREFIX: Record<ProductCreationErrorKind, string> = {
  AI_GENERATION_FAILED: "AI generation failed",
  IMAGE_CONVERSION_FAILED: "Image conversion failed",
  UNCLASSIFIED: "Product creation failed",
};

/**
 * Umbrella error surfaced by ProductCreator. The transaction has already been
 * rolled back by the time this is thrown.
 */
export class ProductCreationError extends Error {
  readonly kind: ProductCreationErrorKind;

  constructor(kind: ProductCreationErrorKind, cause: unknown) {
    super(`${KIND_PREFIX[kind]}: ${errorMessage(cause)}`, { cause });
    this.name = "ProductCreationError";
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
