import * as assert from "assert";
import fs from "fs";
import type { Server } from "http";
import sharp from "sharp";
import { z } from "zod";
import { createApp } from "../../src/app.js";
import { EvaluationAggregator } from "../../src/services/evaluation-aggregator.js";
import { createGenerationClient, type GenerationClient } from "../../src/services/generation-client.js";
import { GenerationService } from "../../src/services/generation.service.js";
import { RateLimiter } from "../../src/services/rate-limiter.js";
import { GenerationError } from "../../src/utils/errors.js";
import { createStoreFixture, fakeImage, recordingSleep, type StoreFixture } from "../helpers.js";

const generationSchema = z.object({
  id: z.number(),
  prompt: z.string(),
  style: z.string(),
  imageUrl: z.string(),
  evaluated: z.boolean(),
  score: z.number().nullable(),
  feedback: z.string().nullable()
});
const createdSchema = z.object({ mode: z.string(), generation: generationSchema });
const singleSchema = z.object({ generation: generationSchema });
const pageSchema = z.object({
  items: z.array(generationSchema),
  totalItems: z.number(),
  totalPages: z.number()
});
const reportSchema = z.object({
  totalRecords: z.number(),
  overallAverage: z.number().nullable(),
  averageByStyle: z.record(z.number()),
  evaluations: z.array(generationSchema)
});
const errorSchema = z.object({ message: z.string(), details: z.unknown().optional() });

const listen = (app: ReturnType<typeof createApp>) =>
  new Promise<{ server: Server; baseUrl: string }>((resolve, reject) => {
    const server = app.listen(0, () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Server did not bind to a TCP port"));
        return;
      }
      resolve({ server, baseUrl: `http://127.0.0.1:${address.port}` });
    });
  });

const close = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

suite("HTTP API", () => {
  let fixture: StoreFixture;
  let server: Server;
  let baseUrl: string;

  setup(async () => {
    fixture = createStoreFixture();
    const client = createGenerationClient({
      endpoint: "http://inference.test/models",
      fallbackDelayMs: 0,
      sleep: recordingSleep().sleep
    });
    const service = new GenerationService({ limiter: new RateLimiter(), client, store: fixture.store });
    const app = createApp({ service, store: fixture.store, aggregator: new EvaluationAggregator(fixture.store) });
    ({ server, baseUrl } = await listen(app));
  });

  teardown(async () => {
    await close(server);
    fixture.cleanup();
  });

  const postJson = (path: string, body: unknown, method = "POST") =>
    fetch(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body)
    });

  const generate = async (prompt: string, style: string) => {
    const response = await postJson("/api/generations", { prompt, style });
    assert.strictEqual(response.status, 201);
    return createdSchema.parse(await response.json()).generation.id;
  };

  test("reports health and the generation mode", async () => {
    const response = await fetch(`${baseUrl}/health`);
    assert.strictEqual(response.status, 200);
    assert.deepStrictEqual(await response.json(), { status: "ok", generationMode: "fallback" });
  });

  test("generates, serves, rates and reports an image", async () => {
    const created = await postJson("/api/generations", { prompt: "  a   red fox ", style: "cartoon" });
    assert.strictEqual(created.status, 201);
    const { mode, generation } = createdSchema.parse(await created.json());
    assert.strictEqual(mode, "fallback");
    assert.strictEqual(generation.prompt, "a red fox");
    assert.strictEqual(generation.style, "cartoon");
    assert.strictEqual(generation.evaluated, false);
    assert.strictEqual(generation.imageUrl, `/api/generations/${generation.id}/image`);

    const image = await fetch(`${baseUrl}${generation.imageUrl}`);
    assert.strictEqual(image.status, 200);
    assert.strictEqual(image.headers.get("content-type"), "image/png");
    const metadata = await sharp(Buffer.from(await image.arrayBuffer())).metadata();
    assert.strictEqual(metadata.width, 512);

    const rated = await postJson(`/api/generations/${generation.id}/evaluation`, { score: 9, feedback: "sharp" }, "PUT");
    assert.strictEqual(rated.status, 200);
    const ratedBody = singleSchema.parse(await rated.json());
    assert.strictEqual(ratedBody.generation.score, 9);
    assert.strictEqual(ratedBody.generation.feedback, "sharp");
    assert.strictEqual(ratedBody.generation.evaluated, true);

    const report = reportSchema.parse(await (await fetch(`${baseUrl}/api/evaluations/report`)).json());
    assert.strictEqual(report.totalRecords, 1);
    assert.strictEqual(report.overallAverage, 9);
    assert.deepStrictEqual(report.averageByStyle, { cartoon: 9 });
    assert.strictEqual(report.evaluations[0].id, generation.id);
  });

  test("lists the gallery newest first with a style filter", async () => {
    const first = await generate("castle", "realistic");
    const second = await generate("panda", "cartoon");
    const third = await generate("tower", "realistic");

    const all = pageSchema.parse(await (await fetch(`${baseUrl}/api/generations`)).json());
    assert.deepStrictEqual(
      all.items.map((item) => item.id),
      [third, second, first]
    );

    const realistic = pageSchema.parse(
      await (await fetch(`${baseUrl}/api/generations?style=realistic&pageSize=1&page=2`)).json()
    );
    assert.strictEqual(realistic.totalItems, 2);
    assert.strictEqual(realistic.totalPages, 2);
    assert.deepStrictEqual(
      realistic.items.map((item) => item.id),
      [first]
    );
  });

  test("rejects empty prompts with the validation code", async () => {
    const response = await postJson("/api/generations", { prompt: "   ", style: "realistic" });
    assert.strictEqual(response.status, 400);
    const body = errorSchema.parse(await response.json());
    assert.strictEqual(body.message, "Prompt cannot be empty.");
    assert.deepStrictEqual(body.details, { code: "EMPTY_PROMPT" });
  });

  test("rejects unknown styles", async () => {
    const response = await postJson("/api/generations", { prompt: "a fox", style: "watercolor" });
    assert.strictEqual(response.status, 400);
    assert.strictEqual(errorSchema.parse(await response.json()).message, "Validation failed");
  });

  test("answers 429 once the generation quota is spent", async () => {
    for (let i = 0; i < 5; i += 1) {
      await generate(`prompt ${i}`, "cartoon");
    }

    const response = await postJson("/api/generations", { prompt: "one more", style: "cartoon" });
    assert.strictEqual(response.status, 429);
    assert.strictEqual(
      errorSchema.parse(await response.json()).message,
      "Rate limit exceeded. Please wait a minute before generating another image."
    );
  });

  test("rejects out-of-range scores and unknown records", async () => {
    const id = await generate("castle", "realistic");

    const badScore = await postJson(`/api/generations/${id}/evaluation`, { score: 11 }, "PUT");
    assert.strictEqual(badScore.status, 400);

    const missing = await postJson("/api/generations/999/evaluation", { score: 5 }, "PUT");
    assert.strictEqual(missing.status, 404);

    const badId = await fetch(`${baseUrl}/api/generations/abc`);
    assert.strictEqual(badId.status, 400);
  });

  test("deletes a generation and its image", async () => {
    const id = await generate("castle", "realistic");

    const deleted = await fetch(`${baseUrl}/api/generations/${id}`, { method: "DELETE" });
    assert.strictEqual(deleted.status, 200);
    assert.deepStrictEqual(await deleted.json(), { success: true });

    assert.strictEqual((await fetch(`${baseUrl}/api/generations/${id}`)).status, 404);
    assert.strictEqual((await fetch(`${baseUrl}/api/generations/${id}/image`)).status, 404);
  });
});

suite("HTTP API generation failures", () => {
  let fixture: StoreFixture;
  let server: Server | null;

  setup(() => {
    fixture = createStoreFixture();
    server = null;
  });

  teardown(async () => {
    if (server) await close(server);
    fixture.cleanup();
  });

  const serve = async (client: GenerationClient) => {
    const service = new GenerationService({ limiter: new RateLimiter(), client, store: fixture.store });
    const app = createApp({ service, store: fixture.store, aggregator: new EvaluationAggregator(fixture.store) });
    const listening = await listen(app);
    server = listening.server;
    return (body: unknown) =>
      fetch(`${listening.baseUrl}/api/generations`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body)
      });
  };

  test("maps upstream failures to 502 and stores nothing", async () => {
    const post = await serve({
      mode: "live",
      generate: async () => {
        throw new GenerationError(503, "Model is loading");
      }
    });

    const response = await post({ prompt: "a lighthouse", style: "realistic" });
    assert.strictEqual(response.status, 502);
    const body = errorSchema.parse(await response.json());
    assert.strictEqual(body.message, "Failed to generate image: Model is loading (Status code: 503)");
    assert.deepStrictEqual(body.details, { upstreamStatus: 503 });
    assert.strictEqual(fixture.store.count(), 0);
    assert.deepStrictEqual(fs.readdirSync(fixture.blobDir), []);
  });

  test("rejects oversized images with 422", async () => {
    const post = await serve({
      mode: "live",
      generate: async () => fakeImage({ width: 5000, height: 5000, mode: "live" })
    });

    const response = await post({ prompt: "a huge mural", style: "cartoon" });
    assert.strictEqual(response.status, 422);
    const body = errorSchema.parse(await response.json());
    assert.strictEqual(body.message, "Image dimensions are too large.");
    assert.deepStrictEqual(body.details, { width: 5000, height: 5000, maxDimension: 4096 });
    assert.strictEqual(fixture.store.count(), 0);
    assert.deepStrictEqual(fs.readdirSync(fixture.blobDir), []);
  });
});
