/// <reference types="vitest" />
/**
 * Gemini client test suite
 *
 * Runs the adapter against a scripted GenerativeModels; no network.
 */

import fs from "node:fs";
import path from "node:path";
import { Modality, type GenerateContentParameters } from "@google/genai";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  GeminiClient,
  buildPrompt,
  findInlineImage,
  type GenerationChunk,
  type GenerativeModels,
} from "../geminiClient";
import { BackendError } from "../../domain/errors";
import { makeTempDir, silentLogger } from "../../test/fakes";

const PROMPTS = {
  description_generation: "Write a shop description.",
  image_prompt_generation: "Write an image prompt.",
};

const textChunk = (text: string): GenerationChunk => ({
  candidates: [{ content: { parts: [{ text }] } }],
});

const imageChunk = (bytes: string): GenerationChunk => ({
  candidates: [
    {
      content: {
        parts: [{ inlineData: { data: Buffer.from(bytes).toString("base64"), mimeType: "image/png" } }],
      },
    },
  ],
});

interface Script {
  text?: string | Error;
  chunks?: GenerationChunk[];
  streamError?: Error;
}

class FakeModels implements GenerativeModels {
  readonly textRequests: GenerateContentParameters[] = [];
  readonly streamRequests: GenerateContentParameters[] = [];
  consumed = 0;
  closed = false;

  constructor(private readonly script: Script = {}) {}

  async generateContent(params: GenerateContentParameters): Promise<{ text?: string }> {
    this.textRequests.push(params);
    if (this.script.text instanceof Error) {
      throw this.script.text;
    }
    return { text: this.script.text };
  }

  async generateContentStream(params: GenerateContentParameters): Promise<AsyncGenerator<GenerationChunk>> {
    this.streamRequests.push(params);
    return this.stream();
  }

  private async *stream(): AsyncGenerator<GenerationChunk> {
    try {
      for (const chunk of this.script.chunks ?? []) {
        this.consumed += 1;
        yield chunk;
      }
      if (this.script.streamError) {
        throw this.script.streamError;
      }
    } finally {
      this.closed = true;
    }
  }
}

const makeClient = (models: GenerativeModels) =>
  new GeminiClient(models, {
    systemPrompts: PROMPTS,
    textModel: "text-model",
    imageModel: "image-model",
    imageSize: "2K",
    logger: silentLogger(),
  });

describe("buildPrompt", () => {
  it("joins system prompt and labelled content with a blank line", () => {
    expect(buildPrompt("System.", "Product idea", "a teapot")).toBe("System.\n\nProduct idea: a teapot");
  });
});

describe("findInlineImage", () => {
  it("skips text parts and returns the first inline data", () => {
    const chunk: GenerationChunk = {
      candidates: [{ content: { parts: [{ text: "here you go" }, { inlineData: { data: "AAAA", mimeType: "image/png" } }] } }],
    };
    expect(findInlineImage(chunk)).toEqual({ data: "AAAA", mimeType: "image/png" });
  });

  it("returns undefined for chunks without candidates", () => {
    expect(findInlineImage({})).toBeUndefined();
  });
});

describe("GeminiClient text generation", () => {
  it("sends the description prompt to the text model", async () => {
    const models = new FakeModels({ text: "  A teapot that hums lullabies.  " });
    const client = makeClient(models);

    await expect(client.generateDescription("a singing teapot")).resolves.toBe("A teapot that hums lullabies.");
    expect(models.textRequests).toHaveLength(1);
    expect(models.textRequests[0]?.model).toBe("text-model");
    expect(models.textRequests[0]?.contents).toBe("Write a shop description.\n\nProduct idea: a singing teapot");
  });

  it("labels the image prompt request with the description", async () => {
    const models = new FakeModels({ text: "studio shot of a teapot" });
    const client = makeClient(models);

    await client.generateImagePrompt("A teapot that hums.");
    expect(models.textRequests[0]?.contents).toBe("Write an image prompt.\n\nDescription: A teapot that hums.");
  });

  it("complete() returns an empty string for an empty reply", async () => {
    const client = makeClient(new FakeModels({}));
    await expect(client.complete("anything")).resolves.toBe("");
  });

  it("rejects an empty generated text", async () => {
    const client = makeClient(new FakeModels({ text: "   " }));
    await expect(client.generateDescription("a teapot")).rejects.toThrow(
      new BackendError("Empty response from Gemini for product idea"),
    );
  });

  it("wraps transport failures", async () => {
    const client = makeClient(new FakeModels({ text: new Error("socket hang up") }));
    await expect(client.complete("anything")).rejects.toThrow(
      new BackendError("Gemini text request failed: socket hang up"),
    );
  });
});

describe("GeminiClient image generation", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("emporium-gemini-");
  });

  it("writes the first inline image and stops reading the stream", async () => {
    const models = new FakeModels({
      chunks: [textChunk("Here is your item"), imageChunk("first-image"), imageChunk("second-image")],
    });
    const destination = path.join(dir, "out", "7.png");

    await expect(makeClient(models).generateImage("a teapot", destination)).resolves.toBe(destination);

    expect(fs.readFileSync(destination, "utf8")).toBe("first-image");
    expect(models.consumed).toBe(2);
    expect(models.closed).toBe(true);
  });

  it("aborts the request once the image is written", async () => {
    const models = new FakeModels({ chunks: [imageChunk("img"), imageChunk("unused")] });

    await makeClient(models).generateImage("a teapot", path.join(dir, "abort.png"));

    const signal = models.streamRequests[0]?.config?.abortSignal;
    expect(signal).toBeDefined();
    expect(signal?.aborted).toBe(true);
  });

  it("requests image and text modalities at the configured size", async () => {
    const models = new FakeModels({ chunks: [imageChunk("img")] });

    await makeClient(models).generateImage("a teapot", path.join(dir, "1.png"));

    const request = models.streamRequests[0];
    expect(request?.model).toBe("image-model");
    expect(request?.contents).toEqual([{ role: "user", parts: [{ text: "a teapot" }] }]);
    expect(request?.config?.responseModalities).toEqual([Modality.IMAGE, Modality.TEXT]);
    expect(request?.config?.imageConfig?.imageSize).toBe("2K");
  });

  it("fails when the stream carries only text", async () => {
    const models = new FakeModels({ chunks: [textChunk("I cannot draw that")] });
    const destination = path.join(dir, "text-only.png");

    await expect(makeClient(models).generateImage("a teapot", destination)).rejects.toThrow(
      new BackendError("Failed to generate image: no image data in response stream"),
    );
    expect(fs.existsSync(destination)).toBe(false);
  });

  it("fails on an empty stream", async () => {
    const destination = path.join(dir, "empty.png");

    await expect(makeClient(new FakeModels({ chunks: [] })).generateImage("a teapot", destination)).rejects.toBeInstanceOf(
      BackendError,
    );
    expect(fs.existsSync(destination)).toBe(false);
  });

  it("wraps errors raised mid-stream", async () => {
    const models = new FakeModels({ chunks: [textChunk("thinking")], streamError: new Error("stream reset") });

    await expect(makeClient(models).generateImage("a teapot", path.join(dir, "x.png"))).rejects.toThrow(
      new BackendError("Failed to generate image: stream reset"),
    );
  });
});

describe("GeminiClient over the SDK transport", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("emporium-gemini-sdk-");
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("cancels the response body after the first image", async () => {
    const event = {
      candidates: [
        {
          content: {
            parts: [{ inlineData: { data: Buffer.from("sdk-image").toString("base64"), mimeType: "image/png" } }],
          },
        },
      ],
    };
    let cancelled = false;
    // One image event, then the connection stays open.
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode(`data: ${JSON.stringify(event)}\n\n`));
      },
      cancel() {
        cancelled = true;
      },
    });
    const fetchStub = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
      init?.signal?.addEventListener("abort", () => {
        if (!body.locked) void body.cancel();
      });
      return new Response(body, { status: 200, headers: { "Content-Type": "text/event-stream" } });
    });
    vi.stubGlobal("fetch", fetchStub);

    const client = GeminiClient.fromApiKey("test-key", {
      systemPrompts: PROMPTS,
      textModel: "text-model",
      imageModel: "image-model",
      imageSize: "1K",
      logger: silentLogger(),
    });
    const destination = path.join(dir, "sdk.png");

    await expect(client.generateImage("a teapot", destination)).resolves.toBe(destination);

    expect(fs.readFileSync(destination, "utf8")).toBe("sdk-image");
    expect(fetchStub).toHaveBeenCalledTimes(1);
    await vi.waitFor(() => expect(cancelled).toBe(true));
  });
});
