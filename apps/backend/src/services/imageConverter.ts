/**
 * Image Converter
 *
 * Turns the backend's raster output (PNG, possibly with alpha or a palette)
 * into a baseline JPEG for serving. Alpha is flattened onto white; every other
 * colour model is normalized to three-channel sRGB.
 *
 * Encoding happens in memory and the file is written only after it succeeds,
 * so a failed conversion never leaves a partial destination file.
 */

import sharp from "sharp";
import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import {
  ConversionFailedError,
  InvalidArgumentError,
  NotFoundError,
  errorMessage,
} from "../domain/errors";

export const DEFAULT_JPEG_QUALITY = 85;

const WHITE = { r: 255, g: 255, b: 255 };

export type ImageConverter = (
  sourcePath: string,
  destinationPath: string,
  quality?: number,
) => Promise<string>;

/**
 * Convert sourcePath into a JPEG at destinationPath.
 *
 * @throws InvalidArgumentError quality is not an integer in 1..100 (checked before any I/O)
 * @throws NotFoundError sourcePath does not exist
 * @throws ConversionFailedError decode or encode failed
 */
export async function convertToJpeg(
  sourcePath: string,
  destinationPath: string,
  quality: number = DEFAULT_JPEG_QUALITY,
  logger?: Logger,
): Promise<string> {
  if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
    throw new InvalidArgumentError(`Quality must be between 1 and 100, got ${quality}`);
  }

  try {
    await fs.access(sourcePath);
  } catch (error) {
    throw new NotFoundError(`Source image not found: ${sourcePath}`, { cause: error });
  }

  try {
    await fs.mkdir(path.dirname(destinationPath), { recursive: true });

    const source = sharp(sourcePath);
    const metadata = await source.metadata();
    logger?.debug(
      {
        sourcePath,
        format: metadata.format,
        space: metadata.space,
        channels: metadata.channels,
        hasAlpha: metadata.hasAlpha,
        width: metadata.width,
        height: metadata.height,
      },
      "image.convert.source"
    );

    const encoded = await source
      .flatten({ background: WHITE })
      .toColourspace("srgb")
      .jpeg({ quality, mozjpeg: false })
      .toBuffer();

    await fs.writeFile(destinationPath, encoded);
    logger?.info({ sourcePath, destinationPath, quality, bytes: encoded.length }, "image.convert.done");
    return destinationPath;
  } catch (error) {
    logger?.error({ err: error, sourcePath, destinationPath }, "image.convert.failed");
    throw new ConversionFailedError(`Failed to convert ${path.basename(sourcePath)} to JPEG: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/** Bind a logger so ProductCreator can call the converter with the plain contract. */
export function createImageConverter(logger: Logger): ImageConverter {
  const log = logger.child({ module: "image-converter" });
  return (sourcePath, destinationPath, quality) =>
    convertToJpeg(sourcePath, destinationPath, quality, log);
}
