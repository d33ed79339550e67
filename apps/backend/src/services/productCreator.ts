/**
 * Product Creator
 *
 * Turns a one-line product idea into a committed product:
 *
 *   description → image prompt → metadata → reserve row (id) →
 *   image (PNG) → JPEG → finalize + commit → reload
 *
 * Steps run strictly in sequence with no retries. The write transaction is
 * opened only once metadata is known and stays open across image generation
 * and conversion; any failure after that point rolls it back, so readers never
 * see a partial row. Image files already written are left on disk, and the
 * PNG is kept beside the served JPEG on success.
 */

import path from "node:path";
import type { Logger } from "pino";
import { finalizeProduct, type Product } from "../domain/product";
import {
  BackendError,
  ConversionFailedError,
  ExtractionFailedError,
  InvalidArgumentError,
  ProductCreationError,
  type ProductCreationErrorKind,
} from "../domain/errors";
import type { ProductRepository, ProductTransaction } from "../repositories/productRepository";
import type { GenerativeBackend } from "./geminiClient";
import type { MetadataExtractor } from "./metadataExtractor";
import { DEFAULT_JPEG_QUALITY, type ImageConverter } from "./imageConverter";

export type CreationStage =
  | "start"
  | "description_generated"
  | "image_prompt_generated"
  | "metadata_extracted"
  | "record_reserved"
  | "image_generated"
  | "image_converted"
  | "committed";

export interface ProductCreatorDeps {
  backend: GenerativeBackend;
  extractor: Pick<MetadataExtractor, "extract">;
  convertImage: ImageConverter;
  imageDir: string;
  logger: Logger;
  jpegQuality?: number;
  /** Injected for tests; defaults to the system clock */
  now?: () => Date;
}

export interface ImageFileNames {
  png: string;
  jpg: string;
}

const pad = (value: number) => String(value).padStart(2, "0");

/** `{id}_{YYYYMMDD_HHMMSS}` in UTC, with .png and .jpg extensions. */
export function imageFileNames(productId: number, at: Date): ImageFileNames {
  const stamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `_${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  const base = `${productId}_${stamp}`;
  return { png: `${base}.png`, jpg: `${base}.jpg` };
}

export function classifyCreationFailure(error: unknown): ProductCreationErrorKind {
  if (error instanceof BackendError || error instanceof ExtractionFailedError) {
    return "AI_GENERATION_FAILED";
  }
  if (error instanceof ConversionFailedError) {
    return "IMAGE_CONVERSION_FAILED";
  }
  return "UNCLASSIFIED";
}

export class ProductCreator {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly jpegQuality: number;

  constructor(private readonly deps: ProductCreatorDeps) {
    this.log = deps.logger.child({ module: "product-creator" });
    this.now = deps.now ?? (() => new Date());
    this.jpegQuality = deps.jpegQuality ?? DEFAULT_JPEG_QUALITY;
  }

  /**
   * Run the full creation pipeline against the given store.
   *
   * @throws InvalidArgumentError productIdea is blank (nothing is called)
   * @throws ProductCreationError any step failed; the transaction is rolled back
   */
  async create(productIdea: string, store: ProductRepository): Promise<Product> {
    const idea = productIdea.trim();
    if (!idea) {
      throw new InvalidArgumentError("Product idea must not be empty");
    }

    const { backend, extractor, convertImage, imageDir } = this.deps;
    let stage: CreationStage = "start";
    let transaction: ProductTransaction | undefined;
    let productId: number | undefined;

    this.log.info({ idea }, "Creating product from idea");

    try {
      const description = await backend.generateDescription(idea);
      stage = "description_generated";
      this.log.info({ stage, chars: description.length }, "product.create.stage");

      const imagePrompt = await backend.generateImagePrompt(description);
      stage = "image_prompt_generated";
      this.log.info({ stage, chars: imagePrompt.length }, "product.create.stage");

      const metadata = await extractor.extract(description);
      stage = "metadata_extracted";
      this.log.info({ stage, name: metadata.name }, "product.create.stage");

      transaction = store.begin();
      const reserved = transaction.reserve({ ...metadata, description }, this.now().getTime());
      productId = reserved.id;
      stage = "record_reserved";
      this.log.info({ stage, productId }, "product.create.stage");

      const files = imageFileNames(reserved.id, this.now());
      const pngPath = path.join(imageDir, files.png);
      const jpgPath = path.join(imageDir, files.jpg);

      await backend.generateImage(imagePrompt, pngPath);
      stage = "image_generated";
      this.log.info({ stage, productId, pngPath }, "product.create.stage");

      await convertImage(pngPath, jpgPath, this.jpegQuality);
      stage = "image_converted";
      this.log.info({ stage, productId, jpgPath }, "product.create.stage");

      transaction.commit(finalizeProduct(reserved, `/images/${files.jpg}`));
      transaction = undefined;
      stage = "committed";
      this.log.info({ stage, productId }, "product.create.stage");

      const stored = store.getById(reserved.id);
      if (!stored) {
        throw new Error(`Product ${reserved.id} missing after commit`);
      }
      return stored;
    } catch (error) {
      this.rollback(transaction, productId);
      const kind = classifyCreationFailure(error);
      const failure = new ProductCreationError(kind, error);
      this.log.error({ err: error, stage, productId, kind }, failure.message);
      throw failure;
    }
  }

  private rollback(transaction: ProductTransaction | undefined, productId: number | undefined): void {
    if (!transaction?.isOpen) return;
    try {
      transaction.rollback();
      this.log.warn({ productId }, "product.create.rolled_back");
    } catch (rollbackError) {
      this.log.error({ err: rollbackError, productId }, "product.create.rollback_failed");
    }
  }
}
