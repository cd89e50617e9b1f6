import fs from "fs";
import os from "os";
import path from "path";
import type { ImageStyle } from "../src/constants/styles.js";
import { openDatabase, type SqliteDatabase } from "../src/db/database.js";
import { LocalBlobStore } from "../src/lib/blob-store.js";
import type { InferenceFetch, InferenceResponse } from "../src/services/generation-client.js";
import { RecordStore } from "../src/services/record-store.js";
import type { GeneratedImage, GenerationRecord } from "../src/types/models.js";

export const makeTempDir = (prefix: string) => fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));

export const removeDir = (dir: string) => {
  fs.rmSync(dir, { recursive: true, force: true });
};

// One second per call, starting at 2026-01-01T12:00:00Z.
export const steppingClock = () => {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 12, 0, tick++));
};

export const fakeImage = (overrides: Partial<GeneratedImage> = {}): GeneratedImage => ({
  buffer: Buffer.from("image-bytes"),
  width: 512,
  height: 512,
  format: "png",
  modelId: null,
  mode: "fallback",
  ...overrides
});

export type StoreFixture = {
  db: SqliteDatabase;
  blobDir: string;
  blobStore: LocalBlobStore;
  store: RecordStore;
  cleanup: () => void;
};

export const createStoreFixture = ({ cacheTtlMs = 60_000 }: { cacheTtlMs?: number } = {}): StoreFixture => {
  const db = openDatabase(":memory:");
  const blobDir = makeTempDir("blobs");
  const blobStore = new LocalBlobStore(blobDir);
  const store = new RecordStore({ db, blobStore, cacheTtlMs, clock: steppingClock() });
  return {
    db,
    blobDir,
    blobStore,
    store,
    cleanup: () => {
      db.close();
      removeDir(blobDir);
    }
  };
};

export const makeRecord = (
  id: number,
  expectedStyle: ImageStyle,
  score: number | null,
  overrides: Partial<GenerationRecord> = {}
): GenerationRecord => ({
  id,
  prompt: `prompt ${id}`,
  expectedStyle,
  imageRef: `image_${id}.png`,
  createdAt: new Date(Date.UTC(2026, 0, 1, 0, 0, id)),
  score,
  feedback: null,
  ...overrides
});

const toArrayBuffer = (bytes: Buffer) => {
  const copy = new ArrayBuffer(bytes.length);
  new Uint8Array(copy).set(bytes);
  return copy;
};

export const respond = (status: number, body: Buffer | string = ""): InferenceResponse => {
  const bytes = typeof body === "string" ? Buffer.from(body, "utf8") : body;
  return {
    status,
    arrayBuffer: async () => toArrayBuffer(bytes),
    text: async () => bytes.toString("utf8")
  };
};

export type RecordedRequest = {
  url: string;
  init: Parameters<InferenceFetch>[1];
};

export const scriptedFetch = (responses: InferenceResponse[]) => {
  const queue = [...responses];
  const calls: RecordedRequest[] = [];
  const fetchImpl: InferenceFetch = async (url, init) => {
    calls.push({ url, init });
    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return next;
  };
  return { calls, fetchImpl };
};

export const recordingSleep = () => {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
};
