import { Router } from "express";
import type { EvaluationAggregator } from "../services/evaluation-aggregator.js";
import type { GenerationService } from "../services/generation.service.js";
import type { RecordStore } from "../services/record-store.js";
import { createEvaluationRouter } from "./evaluation.routes.js";
import { createGenerationRouter } from "./generation.routes.js";

export type ApiDependencies = {
  service: GenerationService;
  store: RecordStore;
  aggregator: EvaluationAggregator;
};

export const createApiRouter = ({ service, store, aggregator }: ApiDependencies) => {
  const apiRouter = Router();

  apiRouter.use("/generations", createGenerationRouter({ service, store }));
  apiRouter.use("/evaluations", createEvaluationRouter({ aggregator }));

  return apiRouter;
};
