import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { logger } from "../observability/logger.js";
import { ApiError, GenerationError, RateLimitExceededError } from "../utils/errors.js";

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(new ApiError(404, "Route not found"));
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  void _next;
  const requestId = res.getHeader("x-request-id");
  const requestMeta = {
    requestId: typeof requestId === "string" ? requestId : null,
    method: req.method,
    path: req.originalUrl,
    ip: req.ip
  };

  if (err instanceof ZodError) {
    logger.warn("request_validation_error", {
      ...requestMeta,
      issues: err.issues
    });
    res.status(400).json({
      message: "Validation failed",
      errors: err.flatten()
    });
    return;
  }

  if (err instanceof ApiError) {
    const logFn = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    logFn("request_api_error", {
      ...requestMeta,
      statusCode: err.statusCode,
      message: err.message,
      details: err.details
    });
    if (err instanceof RateLimitExceededError) {
      res.setHeader("Retry-After", String(Math.ceil(err.retryAfterMs / 1000)));
    }
    res.status(err.statusCode).json({
      message: err.message,
      details: err.details
    });
    return;
  }

  if (err instanceof GenerationError) {
    logger.warn("request_generation_error", {
      ...requestMeta,
      upstreamStatus: err.statusCode,
      message: err.message
    });
    res.status(502).json({
      message: `Failed to generate image: ${err.message} (Status code: ${err.statusCode})`,
      details: { upstreamStatus: err.statusCode }
    });
    return;
  }

  const message = err instanceof Error ? err.message : "Unexpected error";
  logger.error("request_unhandled_error", {
    ...requestMeta,
    message,
    error: err
  });

  res.status(500).json({
    message
  });
};
