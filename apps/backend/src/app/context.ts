/**
 * AppContext: composition root for the emporium backend.
 *
 * createContext() wires the logger, the reader connection, the Gemini client
 * and the product pipeline from a RuntimeConfig that was loaded once at
 * startup. Routes receive the context; nothing below reads process.env.
 */

import pino, { type Logger } from "pino";
import type { Database } from "better-sqlite3";
import fs from "node:fs";

import type { LogLevel, RuntimeConfig } from "../config";
import { openDatabase, openWriteConnection } from "../db/connection";
import { runMigrations } from "../migrate";
import { ProductRepository } from "../repositories/productRepository";
import { GeminiClient, type GenerativeBackend } from "../services/geminiClient";
import { MetadataExtractor } from "../services/metadataExtractor";
import { createImageConverter } from "../services/imageConverter";
import { ProductCreator } from "../services/productCreator";

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  /** Reader connection shared by all GET routes */
  db: Database;
  productRepo: ProductRepository;
  productCreator: ProductCreator;
  /**
   * Open a dedicated connection for one creation run. The caller closes it via
   * the returned release().
   */
  openWriteStore: () => { store: ProductRepository; release: () => void };
}

export interface ContextOverrides {
  logger?: Logger;
  backend?: GenerativeBackend;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(level: LogLevel = "info"): Logger {
  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level }, destination);
}

// -----------------------------------------------------------------------------
// Context factory
// -----------------------------------------------------------------------------

export function createContext(config: RuntimeConfig, overrides: ContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(config.logLevel);

  fs.mkdirSync(config.imageDir, { recursive: true });

  const db = openDatabase(config.sqlitePath);
  const applied = runMigrations(db, logger.child({ module: "migrate" }));
  logger.info({ sqlitePath: config.sqlitePath, applied }, "Database ready");

  const productRepo = new ProductRepository(db, logger.child({ module: "product-repository" }));

  const backend =
    overrides.backend ??
    GeminiClient.fromApiKey(config.geminiApiKey, {
      systemPrompts: config.systemPrompts,
      textModel: config.geminiTextModel,
      imageModel: config.geminiImageModel,
      imageSize: config.geminiImageSize,
      logger,
    });

  const productCreator = new ProductCreator({
    backend,
    extractor: new MetadataExtractor(backend, logger),
    convertImage: createImageConverter(logger),
    imageDir: config.imageDir,
    jpegQuality: config.jpegQuality,
    logger,
  });

  const openWriteStore = () => {
    const connection = openWriteConnection(config.sqlitePath);
    return {
      store: new ProductRepository(connection, logger.child({ module: "product-repository", writer: true })),
      release: () => connection.close(),
    };
  };

  logger.info({ imageDir: config.imageDir }, "Application context created");

  return {
    config,
    logger,
    db,
    productRepo,
    productCreator,
    openWriteStore,
  };
}
