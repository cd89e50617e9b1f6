import { randomUUID } from "crypto";
import type Database from "better-sqlite3";
import { LRUCache } from "lru-cache";
import { isImageStyle, type ImageStyle } from "../constants/styles.js";
import type { SqliteDatabase } from "../db/database.js";
import type { BlobStore } from "../lib/blob-store.js";
import { logger as defaultLogger, type Logger } from "../observability/logger.js";
import type { GeneratedImage, GenerationRecord } from "../types/models.js";
import { ApiError, ImageTooLargeError, RecordNotFoundError } from "../utils/errors.js";

export const MAX_IMAGE_DIMENSION = 4096;
export const MIN_SCORE = 1;
export const MAX_SCORE = 10;

type PromptRow = {
  id: number;
  prompt: string;
  expected_style: string;
  filename: string;
  created_at: string;
  score: number | null;
  feedback: string | null;
};

export type RecordStoreOptions = {
  db: SqliteDatabase;
  blobStore: BlobStore;
  cacheTtlMs?: number;
  clock?: () => Date;
  logger?: Logger;
};

const LIST_CACHE_KEY = "all";

const formatBlobTimestamp = (date: Date) => {
  const pad = (value: number) => value.toString().padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(
    date.getMinutes()
  )}${pad(date.getSeconds())}`;
};

export const blobNameFor = (createdAt: Date) => `image_${formatBlobTimestamp(createdAt)}_${randomUUID()}.png`;

const toRecord = (row: PromptRow): GenerationRecord => {
  if (!isImageStyle(row.expected_style)) {
    throw new Error(`Stored record ${row.id} has unknown style "${row.expected_style}"`);
  }

  return {
    id: row.id,
    prompt: row.prompt,
    expectedStyle: row.expected_style,
    imageRef: row.filename,
    createdAt: new Date(row.created_at),
    score: row.score,
    feedback: row.feedback
  };
};

const normalizeFeedback = (feedback: string | null | undefined) => {
  const trimmed = feedback?.trim();
  return trimmed ? trimmed : null;
};

/**
 * System of record for generations. Blob and row are written in that order
 * with no shared transaction: a failed insert leaves an orphan blob, which is
 * logged and not reconciled.
 */
export class RecordStore {
  private readonly blobStore: BlobStore;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly cache: LRUCache<string, GenerationRecord[]> | null;

  private readonly insertStatement: Database.Statement<[string, ImageStyle, string, string]>;
  private readonly selectAllStatement: Database.Statement<[], PromptRow>;
  private readonly selectByIdStatement: Database.Statement<[number], PromptRow>;
  private readonly updateEvaluationStatement: Database.Statement<[number, string | null, number]>;
  private readonly deleteStatement: Database.Statement<[number]>;
  private readonly countStatement: Database.Statement<[], { total: number }>;

  constructor({ db, blobStore, cacheTtlMs = 60_000, clock = () => new Date(), logger = defaultLogger }: RecordStoreOptions) {
    this.blobStore = blobStore;
    this.clock = clock;
    this.logger = logger;
    this.cache = cacheTtlMs > 0 ? new LRUCache<string, GenerationRecord[]>({ max: 1, ttl: cacheTtlMs }) : null;

    this.insertStatement = db.prepare<[string, ImageStyle, string, string]>(
      "INSERT INTO prompts (prompt, expected_style, filename, created_at) VALUES (?, ?, ?, ?)"
    );
    this.selectAllStatement = db.prepare<[], PromptRow>("SELECT * FROM prompts ORDER BY created_at DESC, id DESC");
    this.selectByIdStatement = db.prepare<[number], PromptRow>("SELECT * FROM prompts WHERE id = ?");
    this.updateEvaluationStatement = db.prepare<[number, string | null, number]>(
      "UPDATE prompts SET score = ?, feedback = ? WHERE id = ?"
    );
    this.deleteStatement = db.prepare<[number]>("DELETE FROM prompts WHERE id = ?");
    this.countStatement = db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM prompts");
  }

  private invalidate() {
    this.cache?.clear();
  }

  async create(prompt: string, style: ImageStyle, image: GeneratedImage) {
    if (image.width > MAX_IMAGE_DIMENSION || image.height > MAX_IMAGE_DIMENSION) {
      throw new ImageTooLargeError(image.width, image.height, MAX_IMAGE_DIMENSION);
    }

    const createdAt = this.clock();
    const imageRef = await this.blobStore.write(blobNameFor(createdAt), image.buffer);

    let recordId: number;
    try {
      const result = this.insertStatement.run(prompt, style, imageRef, createdAt.toISOString());
      recordId = Number(result.lastInsertRowid);
    } catch (error) {
      this.logger.error("record_insert_failed_orphan_blob", { imageRef, style, error });
      throw error;
    }

    this.invalidate();
    this.logger.info("record_created", { recordId, style, imageRef, mode: image.mode });
    return recordId;
  }

  async delete(recordId: number, imageRef: string) {
    const blobRemoved = await this.blobStore.remove(imageRef);
    const { changes } = this.deleteStatement.run(recordId);
    this.invalidate();
    this.logger.info("record_deleted", { recordId, imageRef, blobRemoved, rowRemoved: changes > 0 });
    return changes > 0;
  }

  listAll(): GenerationRecord[] {
    const cached = this.cache?.get(LIST_CACHE_KEY);
    if (cached) return [...cached];

    const records = this.selectAllStatement.all().map(toRecord);
    this.cache?.set(LIST_CACHE_KEY, records);
    return [...records];
  }

  get(recordId: number) {
    const row = this.selectByIdStatement.get(recordId);
    return row ? toRecord(row) : null;
  }

  count() {
    return this.countStatement.get()?.total ?? 0;
  }

  updateEvaluation(recordId: number, score: number, feedback?: string | null) {
    if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
      throw new ApiError(400, `Score must be an integer between ${MIN_SCORE} and ${MAX_SCORE}`, { score });
    }

    const { changes } = this.updateEvaluationStatement.run(score, normalizeFeedback(feedback), recordId);
    if (changes === 0) {
      throw new RecordNotFoundError(recordId);
    }

    this.invalidate();
    this.logger.info("record_evaluated", { recordId, score });

    const record = this.get(recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    return record;
  }

  readImage(imageRef: string) {
    return this.blobStore.read(imageRef);
  }
}
