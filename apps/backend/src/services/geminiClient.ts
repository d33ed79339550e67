/**
 * Gemini client
 *
 * Thin adapter over @google/genai for the three calls the product pipeline
 * makes: plain text completion, system-prompted text generation, and streamed
 * image generation. Every failure surfaces as BackendError.
 */

import { GoogleGenAI, Modality, type GenerateContentParameters } from "@google/genai";
import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import type { ImageSize, SystemPrompts } from "../config";
import { BackendError, errorMessage } from "../domain/errors";

export interface GenerationPart {
  text?: string;
  inlineData?: {
    data?: string;
    mimeType?: string;
  };
}

export interface GenerationChunk {
  candidates?: Array<{
    content?: {
      parts?: GenerationPart[];
    };
  }>;
}

/**
 * The slice of GoogleGenAI["models"] used here. Tests supply a fake.
 */
export interface GenerativeModels {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
  generateContentStream(params: GenerateContentParameters): Promise<AsyncGenerator<GenerationChunk>>;
}

/** Plain completion, as consumed by MetadataExtractor. */
export interface TextCompletion {
  /** Resolves to "" when the backend answered with no text. */
  complete(prompt: string): Promise<string>;
}

export interface GenerativeBackend extends TextCompletion {
  generateText(systemPrompt: string, contextLabel: string, userContent: string): Promise<string>;
  generateDescription(productIdea: string): Promise<string>;
  generateImagePrompt(description: string): Promise<string>;
  generateImage(prompt: string, destinationPath: string): Promise<string>;
}

export interface GeminiClientOptions {
  systemPrompts: SystemPrompts;
  textModel: string;
  imageModel: string;
  imageSize: ImageSize;
  logger: Logger;
}

export const DESCRIPTION_CONTEXT_LABEL = "Product idea";
export const IMAGE_PROMPT_CONTEXT_LABEL = "Description";

/**
 * The whole prompt-construction contract: system prompt, blank line, labelled user content.
 */
export function buildPrompt(systemPrompt: string, contextLabel: string, userContent: string): string {
  return `${systemPrompt}\n\n${contextLabel}: ${userContent}`;
}

/** First part of the first candidate that carries inline binary data, if any. */
export function findInlineImage(chunk: GenerationChunk): { data: string; mimeType?: string } | undefined {
  const parts = chunk.candidates?.[0]?.content?.parts ?? [];
  for (const part of parts) {
    if (part.inlineData?.data) {
      return { data: part.inlineData.data, mimeType: part.inlineData.mimeType };
    }
  }
  return undefined;
}

function chunkText(chunk: GenerationChunk): string {
  const parts = chunk.candidates?.[0]?.content?.parts ?? [];
  return parts.map((part) => part.text ?? "").join("");
}

export class GeminiClient implements GenerativeBackend {
  private readonly log: Logger;

  constructor(
    private readonly models: GenerativeModels,
    private readonly options: GeminiClientOptions,
  ) {
    this.log = options.logger.child({ module: "gemini-client" });
    this.log.info(
      { textModel: options.textModel, imageModel: options.imageModel, imageSize: options.imageSize },
      "Gemini client initialized",
    );
  }

  static fromApiKey(apiKey: string, options: GeminiClientOptions): GeminiClient {
    const ai = new GoogleGenAI({ apiKey });
    return new GeminiClient(ai.models, options);
  }

  async complete(prompt: string): Promise<string> {
    this.log.debug({ promptChars: prompt.length, excerpt: prompt.slice(0, 100) }, "gemini.text.request");
    try {
      const response = await this.models.generateContent({
        model: this.options.textModel,
        contents: prompt,
      });
      return response.text?.trim() ?? "";
    } catch (error) {
      this.log.error({ err: error }, "gemini.text.failed");
      throw new BackendError(`Gemini text request failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async generateText(systemPrompt: string, contextLabel: string, userContent: string): Promise<string> {
    const text = await this.complete(buildPrompt(systemPrompt, contextLabel, userContent));
    if (!text) {
      throw new BackendError(`Empty response from Gemini for ${contextLabel.toLowerCase()}`);
    }
    this.log.info({ contextLabel, chars: text.length }, "gemini.text.generated");
    return text;
  }

  generateDescription(productIdea: string): Promise<string> {
    return this.generateText(
      this.options.systemPrompts.description_generation,
      DESCRIPTION_CONTEXT_LABEL,
      productIdea,
    );
  }

  generateImagePrompt(description: string): Promise<string> {
    return this.generateText(
      this.options.systemPrompts.image_prompt_generation,
      IMAGE_PROMPT_CONTEXT_LABEL,
      description,
    );
  }

  /**
   * Stream an image generation request and write the first inline image to
   * destinationPath. Consumption stops at that chunk and the request is
   * aborted, which cancels the response body. Text-only chunks are logged and
   * skipped.
   */
  async generateImage(prompt: string, destinationPath: string): Promise<string> {
    this.log.info({ promptChars: prompt.length, destinationPath }, "gemini.image.request");
    const controller = new AbortController();

    try {
      await fs.mkdir(path.dirname(destinationPath), { recursive: true });

      const stream = await this.models.generateContentStream({
        model: this.options.imageModel,
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        config: {
          responseModalities: [Modality.IMAGE, Modality.TEXT],
          imageConfig: { imageSize: this.options.imageSize },
          abortSignal: controller.signal,
        },
      });

      for await (const chunk of stream) {
        const image = findInlineImage(chunk);
        if (image) {
          const bytes = Buffer.from(image.data, "base64");
          await fs.writeFile(destinationPath, bytes);
          this.log.info({ destinationPath, bytes: bytes.length, mimeType: image.mimeType }, "gemini.image.saved");
          return destinationPath;
        }

        const text = chunkText(chunk);
        if (text) {
          this.log.debug({ text: text.slice(0, 200) }, "gemini.image.text_chunk");
        }
      }
    } catch (error) {
      this.log.error({ err: error, destinationPath }, "gemini.image.failed");
      throw new BackendError(`Failed to generate image: ${errorMessage(error)}`, { cause: error });
    } finally {
      controller.abort();
    }

    this.log.error({ destinationPath }, "gemini.image.empty");
    throw new BackendError("Failed to generate image: no image data in response stream");
  }
}
