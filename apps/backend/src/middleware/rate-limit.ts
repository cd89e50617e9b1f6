import rateLimit from "express-rate-limit";
import { env } from "../config/env.js";

// Coarse per-IP HTTP throttle; the generation quota itself lives in services/rate-limiter.ts.
export const apiRateLimit = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  limit: env.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.method === "GET"
});
