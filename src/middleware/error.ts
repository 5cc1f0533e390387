import type { NextFunction, Request, Response } from "express";
import type { HttpError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export const errorHandler = (
  error: HttpError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const status = typeof error.status === "number" && error.status >= 400 ? error.status : 500;

  logger.error("http.error", {
    status,
    path: req.originalUrl,
    message: error.message,
    details: error.details,
  });

  const responseBody: { detail: string; issues?: unknown } = {
    detail: status >= 500 && !error.expose ? "Internal server error" : error.message || "Internal server error",
  };

  if (error.expose && error.details) {
    responseBody.issues = error.details;
  }

  res.status(status).json(responseBody);
};
