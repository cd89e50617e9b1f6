import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const optionalTrimmedString = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value !== "string") return value;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off", ""].includes(normalized)) return false;
  return value;
}, z.boolean());

const configDir = path.dirname(fileURLToPath(import.meta.url));
const backendRoot = path.resolve(configDir, "..", "..");
const configuredEnvPath = process.env.BACKEND_ENV_FILE?.trim();
const envFilePath = configuredEnvPath ? path.resolve(configuredEnvPath) : path.join(backendRoot, ".env");
dotenv.config({ path: envFilePath, override: true });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  FRONTEND_ORIGIN: z.string().default("http://localhost:5173"),
  LOG_DIRECTORY: z.string().default("./logs"),
  LOG_LEVEL: z.enum(["silent", "debug", "info", "warn", "error"]).optional(),
  DATABASE_PATH: z.string().min(1).default("./data/image_generator.db"),
  IMAGE_DIRECTORY: z.string().min(1).default("./generated_images"),
  HUGGING_FACE_API_TOKEN: optionalTrimmedString,
  INFERENCE_API_URL: z.string().url().default("https://api-inference.huggingface.co/models"),
  FALLBACK_MODE: booleanFromEnv.default(false),
  FALLBACK_DELAY_MS: z.coerce.number().int().min(0).default(3000),
  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(6).default(3),
  GENERATION_QUOTA_MAX: z.coerce.number().int().positive().default(5),
  GENERATION_QUOTA_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  HISTORY_CACHE_TTL_MS: z.coerce.number().int().min(0).max(60_000).default(60_000),
  SEED_SAMPLE_DATA: booleanFromEnv.default(true),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const formatted = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n");
  throw new Error(`Invalid environment variables:\n${formatted}`);
}

export const env = parsed.data;
export const isTest = env.NODE_ENV === "test";
export const resolvedEnvFilePath = envFilePath;
