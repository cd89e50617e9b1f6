import type { ImageStyle } from "../constants/styles.js";
import { logger as defaultLogger, type Logger } from "../observability/logger.js";
import type { GenerationRecord } from "../types/models.js";
import { RateLimitExceededError, RecordNotFoundError } from "../utils/errors.js";
import type { GenerationClient } from "./generation-client.js";
import { validatePrompt } from "./prompt-validator.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { RecordStore } from "./record-store.js";

export type GenerationRequest = {
  prompt: string;
  style: ImageStyle;
};

export type GenerationServiceDeps = {
  limiter: RateLimiter;
  client: GenerationClient;
  store: Pick<RecordStore, "create" | "get">;
  now?: () => number;
  logger?: Logger;
};

/**
 * Runs one generation request end to end: validate, take a quota slot,
 * generate, persist. Nothing is stored unless generation succeeded.
 */
export class GenerationService {
  private readonly limiter: RateLimiter;
  private readonly client: GenerationClient;
  private readonly store: Pick<RecordStore, "create" | "get">;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor({ limiter, client, store, now = () => Date.now(), logger = defaultLogger }: GenerationServiceDeps) {
    this.limiter = limiter;
    this.client = client;
    this.store = store;
    this.now = now;
    this.logger = logger;
  }

  get mode() {
    return this.client.mode;
  }

  async submit({ prompt, style }: GenerationRequest): Promise<GenerationRecord> {
    const normalizedPrompt = validatePrompt(prompt);

    const requestedAt = this.now();
    if (!this.limiter.tryAcquire(requestedAt)) {
      const retryAfterMs = this.limiter.retryAfterMs(requestedAt);
      this.logger.warn("generation_quota_exceeded", { style, retryAfterMs, ...this.limiter.snapshot() });
      throw new RateLimitExceededError(retryAfterMs);
    }

    const image = await this.client.generate(normalizedPrompt, style);
    const recordId = await this.store.create(normalizedPrompt, style, image);

    const record = this.store.get(recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    return record;
  }
}
