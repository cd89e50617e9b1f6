import { Router } from "express";
import type { EvaluationAggregator } from "../services/evaluation-aggregator.js";
import { toPublicGeneration } from "./generation.routes.js";

export const createEvaluationRouter = ({ aggregator }: { aggregator: EvaluationAggregator }) => {
  const router = Router();

  router.get("/report", (_req, res) => {
    const report = aggregator.report();
    res.json({
      ...report,
      evaluations: report.evaluations.map(toPublicGeneration)
    });
  });

  return router;
};
