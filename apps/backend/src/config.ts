import { config as loadEnv } from "dotenv";
import { z } from "zod";
import fs from "node:fs";
import path from "path";
import { fileURLToPath } from "url";
import { ConfigurationError } from "./domain/errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** apps/backend, regardless of process.cwd() */
export const BACKEND_ROOT = path.resolve(__dirname, "..");

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} environment variable is not set` })
    .trim()
    .min(1, `${name} environment variable is not set`);

const envSchema = z.object({
  PORT: z.coerce.number().int().default(8000),
  BIND_HOST: z.string().default("0.0.0.0"),
  DATA_DIR: z.string().default("data"),
  SQLITE_DB: z.string().optional(),
  GEMINI_API_KEY: requiredString("GEMINI_API_KEY"),
  ADMIN_PASSWORD: requiredString("ADMIN_PASSWORD"),
  GEMINI_TEXT_MODEL: z.string().default("gemini-2.0-flash"),
  GEMINI_IMAGE_MODEL: z.string().default("gemini-2.5-flash-image"),
  GEMINI_IMAGE_SIZE: z.enum(["1K", "2K", "4K"]).default("1K"),
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(85),
  PROMPTS_PATH: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().default(10000),
});

const promptFileSchema = z.object({
  system_prompts: z.object({
    description_generation: z.string().trim().min(1),
    image_prompt_generation: z.string().trim().min(1),
  }),
});

export type SystemPrompts = z.infer<typeof promptFileSchema>["system_prompts"];
export type ImageSize = z.infer<typeof envSchema>["GEMINI_IMAGE_SIZE"];
export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface RuntimeConfig {
  port: number;
  bindHost: string;
  dataDir: string;
  sqlitePath: string;
  imageDir: string;
  geminiApiKey: string;
  adminPassword: string;
  geminiTextModel: string;
  geminiImageModel: string;
  geminiImageSize: ImageSize;
  jpegQuality: number;
  systemPrompts: SystemPrompts;
  logLevel: LogLevel;
  gracefulShutdownMs: number;
}

/**
 * Load .env from apps/backend. A missing file is fine; the process environment
 * may already carry everything.
 */
export function loadDotEnv(envPath: string = path.join(BACKEND_ROOT, ".env")): void {
  if (fs.existsSync(envPath)) {
    loadEnv({ path: envPath });
  }
}

/**
 * Read and validate the system prompt file.
 */
export function loadSystemPrompts(promptsPath: string): SystemPrompts {
  let raw: string;
  try {
    raw = fs.readFileSync(promptsPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Prompt file not found at ${promptsPath}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${promptsPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const parsed = promptFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || "system_prompts";
    throw new ConfigurationError(`Missing or empty '${key}' in ${promptsPath}`);
  }
  return parsed.data.system_prompts;
}

/**
 * Build the runtime configuration once, at process start. The result is passed
 * into createContext(); nothing reads process.env after this.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const messages = result.error.issues.map((issue) =>
      issue.message.includes("environment variable")
        ? issue.message
        : `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(messages.join("; "));
  }
  const parsed = result.data;

  const dataDir = path.resolve(parsed.DATA_DIR);
  const promptsPath = parsed.PROMPTS_PATH
    ? path.resolve(parsed.PROMPTS_PATH)
    : path.join(BACKEND_ROOT, "config/prompts.json");

  return {
    port: parsed.PORT,
    bindHost: parsed.BIND_HOST,
    dataDir,
    sqlitePath: parsed.SQLITE_DB ? path.resolve(parsed.SQLITE_DB) : path.join(dataDir, "store.db"),
    imageDir: path.join(dataDir, "images"),
    geminiApiKey: parsed.GEMINI_API_KEY,
    adminPassword: parsed.ADMIN_PASSWORD,
    geminiTextModel: parsed.GEMINI_TEXT_MODEL,
    geminiImageModel: parsed.GEMINI_IMAGE_MODEL,
    geminiImageSize: parsed.GEMINI_IMAGE_SIZE,
    jpegQuality: parsed.JPEG_QUALITY,
    systemPrompts: loadSystemPrompts(promptsPath),
    logLevel: parsed.LOG_LEVEL,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  };
}
