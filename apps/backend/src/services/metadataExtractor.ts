/**
 * Metadata Extractor
 *
 * Asks the text model to turn a generated description into the five
 * structured product fields, then validates and normalizes what comes back.
 * Category and rarity are accepted as given; the recommended vocabularies only
 * appear in the instruction prompt.
 */

import type { Logger } from "pino";
import {
  FIELD_LIMITS,
  RECOMMENDED_CATEGORIES,
  RECOMMENDED_RARITIES,
  normalizeTags,
  type ProductMetadata,
} from "../domain/product";
import { ExtractionFailedError, errorMessage } from "../domain/errors";
import type { TextCompletion } from "./geminiClient";

const REQUIRED_FIELDS = ["name", "category", "tags", "rarity", "price"] as const;

export function buildMetadataPrompt(description: string): string {
  return `Analyze this magical product description and extract structured metadata.
Return ONLY a valid JSON object with these exact fields (no markdown, no code blocks, just the JSON):

{
  "name": "A concise product name (max ${FIELD_LIMITS.name} chars)",
  "category": "One of: ${RECOMMENDED_CATEGORIES.join(", ")}",
  "tags": ["2-5 relevant tags as strings"],
  "rarity": "One of: ${RECOMMENDED_RARITIES.join(", ")}",
  "price": "Price with currency (e.g., '500 Gold Coins', '1000 Silver Pieces')"
}

Description to analyze:
${description}

Return only the JSON object:`;
}

/**
 * Drop a surrounding ``` fence: when the first line opens one, the first and
 * last lines are removed.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) {
    return trimmed;
  }
  const lines = trimmed.split("\n");
  return lines.slice(1, -1).join("\n").trim();
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asText = (value: unknown, limit: number): string => {
  const text = typeof value === "string" ? value : value == null ? "" : String(value);
  return text.trim().slice(0, limit);
};

export class MetadataExtractor {
  private readonly log: Logger;

  constructor(
    private readonly backend: TextCompletion,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "metadata-extractor" });
  }

  /**
   * @throws ExtractionFailedError the reply was empty, not JSON, or missing/mistyped a field
   * @throws BackendError the completion request itself failed
   */
  async extract(description: string): Promise<ProductMetadata> {
    this.log.info({ descriptionChars: description.length }, "Extracting metadata from description");

    const responseText = await this.backend.complete(buildMetadataPrompt(description));
    if (!responseText) {
      throw new ExtractionFailedError("empty response");
    }

    const jsonText = stripCodeFence(responseText);
    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonText);
    } catch (error) {
      this.log.error({ responseText }, "Metadata response was not valid JSON");
      throw new ExtractionFailedError(`Failed to parse metadata JSON: ${errorMessage(error)}`, { cause: error });
    }

    if (!isRecord(parsed)) {
      this.log.error({ responseText }, "Metadata response was not a JSON object");
      throw new ExtractionFailedError("metadata must be a JSON object");
    }

    for (const field of REQUIRED_FIELDS) {
      if (!(field in parsed)) {
        throw new ExtractionFailedError(`missing field: ${field}`);
      }
    }

    const rawTags = parsed.tags;
    if (!Array.isArray(rawTags)) {
      throw new ExtractionFailedError("tags must be a list");
    }
    const tags = rawTags.map((tag) => asText(tag, Number.MAX_SAFE_INTEGER)).filter(Boolean);
    if (tags.length === 0) {
      throw new ExtractionFailedError("tags must not be empty");
    }

    const name = asText(parsed.name, FIELD_LIMITS.name);
    if (!name) {
      throw new ExtractionFailedError("name must not be empty");
    }

    const metadata: ProductMetadata = {
      name,
      category: asText(parsed.category, FIELD_LIMITS.category),
      tags: normalizeTags(tags),
      rarity: asText(parsed.rarity, FIELD_LIMITS.rarity),
      price: asText(parsed.price, FIELD_LIMITS.price),
    };

    this.log.info(
      { name: metadata.name, category: metadata.category, rarity: metadata.rarity, tagCount: metadata.tags.length },
      "Extracted metadata",
    );
    return metadata;
  }
}
