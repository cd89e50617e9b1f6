import { z } from "zod";
import { IMAGE_STYLES } from "../constants/styles.js";
import { MAX_SCORE, MIN_SCORE } from "../services/record-store.js";

export const imageStyleSchema = z.enum(IMAGE_STYLES);

// Length and emptiness are checked by the prompt validator, which reports them as typed errors.
export const createGenerationSchema = z.object({
  prompt: z.string(),
  style: imageStyleSchema
});

export const evaluationSchema = z.object({
  score: z.number().int().min(MIN_SCORE).max(MAX_SCORE),
  feedback: z.string().max(1000).nullish()
});

export const galleryQuerySchema = z.object({
  style: z.union([imageStyleSchema, z.literal("all")]).default("all"),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(50).default(9)
});

export const recordIdSchema = z.coerce.number().int().positive();
