import { createApp } from "./app.js";
import { env, resolvedEnvFilePath } from "./config/env.js";
import { openDatabase } from "./db/database.js";
import { LocalBlobStore } from "./lib/blob-store.js";
import { logger, logSession } from "./observability/logger.js";
import { EvaluationAggregator } from "./services/evaluation-aggregator.js";
import { createGenerationClient } from "./services/generation-client.js";
import { GenerationService } from "./services/generation.service.js";
import { RateLimiter } from "./services/rate-limiter.js";
import { RecordStore } from "./services/record-store.js";
import { seedSampleData } from "./services/sample-data.js";

const db = openDatabase(env.DATABASE_PATH);
const blobStore = new LocalBlobStore(env.IMAGE_DIRECTORY);
const store = new RecordStore({ db, blobStore, cacheTtlMs: env.HISTORY_CACHE_TTL_MS });

const client = createGenerationClient({
  apiToken: env.HUGGING_FACE_API_TOKEN,
  fallbackMode: env.FALLBACK_MODE,
  endpoint: env.INFERENCE_API_URL,
  maxAttempts: env.GENERATION_MAX_ATTEMPTS,
  fallbackDelayMs: env.FALLBACK_DELAY_MS
});

const service = new GenerationService({
  limiter: new RateLimiter({
    windowMs: env.GENERATION_QUOTA_WINDOW_MS,
    maxRequests: env.GENERATION_QUOTA_MAX
  }),
  client,
  store
});

const aggregator = new EvaluationAggregator(store);

if (env.SEED_SAMPLE_DATA) {
  try {
    await seedSampleData({
      store,
      client: createGenerationClient({
        fallbackMode: true,
        endpoint: env.INFERENCE_API_URL,
        fallbackDelayMs: 0
      })
    });
  } catch (error) {
    logger.error("sample_data_seed_failed", { error });
  }
}

const app = createApp({ service, store, aggregator });

const server = app.listen(env.PORT, () => {
  logger.info("api_server_started", {
    port: env.PORT,
    generationMode: service.mode,
    envFilePath: resolvedEnvFilePath,
    databasePath: env.DATABASE_PATH,
    imageDirectory: blobStore.root,
    logSessionId: logSession.id,
    logDirectory: logSession.directory,
    appLogPath: logSession.appLogPath,
    errorLogPath: logSession.errorLogPath
  });
});

let shuttingDown = false;

const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("shutdown_requested", { signal });

  server.close(async () => {
    try {
      db.close();
      logger.info("shutdown_completed");
    } catch (error) {
      logger.error("shutdown_error", { error });
    } finally {
      await logger.close();
      process.exit(0);
    }
  });
};

server.on("error", (error) => {
  logger.error("api_server_error", { error });
});

process.on("unhandledRejection", (reason) => {
  logger.error("process_unhandled_rejection", { reason });
});

process.on("uncaughtException", (error) => {
  logger.error("process_uncaught_exception", { error });
  void shutdown("uncaughtException");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
