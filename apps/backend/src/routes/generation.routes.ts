import { Router } from "express";
import type { GenerationService } from "../services/generation.service.js";
import { buildGalleryPage } from "../services/gallery.js";
import type { RecordStore } from "../services/record-store.js";
import type { GenerationRecord } from "../types/models.js";
import { RecordNotFoundError } from "../utils/errors.js";
import { createGenerationSchema, evaluationSchema, galleryQuerySchema, recordIdSchema } from "./generation.schemas.js";

export type PublicGeneration = {
  id: number;
  prompt: string;
  style: GenerationRecord["expectedStyle"];
  imageUrl: string;
  createdAt: string;
  evaluated: boolean;
  score: number | null;
  feedback: string | null;
};

export const toPublicGeneration = (record: GenerationRecord): PublicGeneration => ({
  id: record.id,
  prompt: record.prompt,
  style: record.expectedStyle,
  imageUrl: `/api/generations/${record.id}/image`,
  createdAt: record.createdAt.toISOString(),
  evaluated: record.score !== null,
  score: record.score,
  feedback: record.feedback
});

export const createGenerationRouter = ({
  service,
  store
}: {
  service: GenerationService;
  store: RecordStore;
}) => {
  const router = Router();

  const requireRecord = (rawId: string) => {
    const recordId = recordIdSchema.parse(rawId);
    const record = store.get(recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    return record;
  };

  router.post("/", async (req, res) => {
    const input = createGenerationSchema.parse(req.body);
    const record = await service.submit(input);
    res.status(201).json({
      mode: service.mode,
      generation: toPublicGeneration(record)
    });
  });

  router.get("/", (req, res) => {
    const query = galleryQuerySchema.parse(req.query);
    const gallery = buildGalleryPage(store.listAll(), query);
    res.json({
      ...gallery,
      items: gallery.items.map(toPublicGeneration)
    });
  });

  router.get("/:id", (req, res) => {
    res.json({
      generation: toPublicGeneration(requireRecord(req.params.id))
    });
  });

  router.get("/:id/image", async (req, res) => {
    const record = requireRecord(req.params.id);
    const image = await store.readImage(record.imageRef);
    if (!image) {
      throw new RecordNotFoundError(record.id);
    }
    res.type("png").send(image);
  });

  router.put("/:id/evaluation", (req, res) => {
    const recordId = recordIdSchema.parse(req.params.id);
    const { score, feedback } = evaluationSchema.parse(req.body);
    const record = store.updateEvaluation(recordId, score, feedback);
    res.json({
      generation: toPublicGeneration(record)
    });
  });

  router.delete("/:id", async (req, res) => {
    const record = requireRecord(req.params.id);
    await store.delete(record.id, record.imageRef);
    res.json({
      success: true
    });
  });

  return router;
};
