import sharp from "sharp";
import { setTimeout as delay } from "timers/promises";
import { styleModels, type ImageStyle } from "../constants/styles.js";
import { logger as defaultLogger, type Logger } from "../observability/logger.js";
import type { GeneratedImage } from "../types/models.js";
import { GenerationError } from "../utils/errors.js";

export const PLACEHOLDER_SIZE = 512;
export const PLACEHOLDER_COLOR = { r: 73, g: 109, b: 137 };

export type InferenceResponse = {
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
  text(): Promise<string>;
};

export type InferenceFetch = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string }
) => Promise<InferenceResponse>;

export type GenerationClientOptions = {
  apiToken?: string;
  fallbackMode?: boolean;
  endpoint: string;
  maxAttempts?: number;
  fallbackDelayMs?: number;
  fetchImpl?: InferenceFetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export type GenerationClient = {
  readonly mode: GeneratedImage["mode"];
  generate(prompt: string, style: ImageStyle): Promise<GeneratedImage>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const modelForStyle = (style: ImageStyle) => styleModels[style];

export const backoffDelayMs = (attempt: number) => 2 ** attempt * 1000;

export const renderPlaceholderImage = async (): Promise<Buffer> =>
  sharp({
    create: {
      width: PLACEHOLDER_SIZE,
      height: PLACEHOLDER_SIZE,
      channels: 3,
      background: PLACEHOLDER_COLOR
    }
  })
    .png()
    .toBuffer();

// Decodes the whole body, not only its header, so truncated data fails here.
const decodeImage = async (body: Buffer) => {
  const { data, info } = await sharp(body)
    .png()
    .toBuffer({ resolveWithObject: true })
    .catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : "unknown format";
      throw new GenerationError(200, `Inference service returned an undecodable image: ${reason}`);
    });

  if (!info.width || !info.height) {
    throw new GenerationError(200, "Inference service returned an image without dimensions");
  }
  return { buffer: data, width: info.width, height: info.height };
};

/**
 * Resolves the error message carried by a failed inference response: the
 * `error` field of a JSON object body, "Unknown error" when such an object
 * has none, or a generic message naming the status when the body is not a
 * JSON object.
 */
export const readErrorMessage = async (response: InferenceResponse) => {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return `API error (status code ${response.status})`;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return `API error (status code ${response.status})`;
  }

  if (!isRecord(parsed)) {
    return `API error (status code ${response.status})`;
  }

  return typeof parsed.error === "string" ? parsed.error : "Unknown error";
};

export const createGenerationClient = ({
  apiToken,
  fallbackMode = false,
  endpoint,
  maxAttempts = 3,
  fallbackDelayMs = 3000,
  fetchImpl = fetch,
  sleep = (ms) => delay(ms),
  logger = defaultLogger
}: GenerationClientOptions): GenerationClient => {
  const useFallback = fallbackMode || !apiToken;
  const baseUrl = endpoint.replace(/\/+$/, "");

  if (useFallback) {
    logger.warn("generation_client_fallback_mode", {
      reason: apiToken ? "fallback_flag" : "missing_api_token",
      fallbackDelayMs
    });
  }

  const generateFallback = async (prompt: string, style: ImageStyle): Promise<GeneratedImage> => {
    await sleep(fallbackDelayMs);
    logger.info("generation_fallback_placeholder", { prompt, style });
    return {
      buffer: await renderPlaceholderImage(),
      width: PLACEHOLDER_SIZE,
      height: PLACEHOLDER_SIZE,
      format: "png",
      modelId: null,
      mode: "fallback"
    };
  };

  const post = async (url: string, prompt: string) => {
    try {
      return await fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiToken ?? ""}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({ inputs: prompt })
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "request failed";
      logger.error("generation_request_failed", { url, message });
      throw new GenerationError(0, `Inference request failed: ${message}`);
    }
  };

  const generateLive = async (prompt: string, style: ImageStyle): Promise<GeneratedImage> => {
    const modelId = modelForStyle(style);
    const url = `${baseUrl}/${modelId}`;
    logger.info("generation_started", { prompt, style, modelId });

    let lastResponse: InferenceResponse | null = null;
    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const response = await post(url, prompt);

      if (response.status === 200) {
        const decoded = await decodeImage(Buffer.from(await response.arrayBuffer()));
        logger.info("generation_succeeded", { prompt, modelId, attempt: attempt + 1 });
        return { ...decoded, format: "png", modelId, mode: "live" };
      }

      lastResponse = response;
      if (response.status !== 429) break;

      logger.warn("generation_rate_limited", { modelId, attempt: attempt + 1, maxAttempts });
      await sleep(backoffDelayMs(attempt));
    }

    if (!lastResponse) {
      throw new GenerationError(0, "Inference service was not called");
    }

    const message = await readErrorMessage(lastResponse);
    logger.error("generation_failed", { modelId, statusCode: lastResponse.status, message });
    throw new GenerationError(lastResponse.status, message);
  };

  return {
    mode: useFallback ? "fallback" : "live",
    generate: useFallback ? generateFallback : generateLive
  };
};
