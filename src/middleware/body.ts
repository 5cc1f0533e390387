import express, { type RequestHandler } from "express";
import { errorMeta, logger } from "../lib/logger.js";

const jsonParser = express.json({ limit: "1mb", type: () => true });
const formParser = express.urlencoded({ extended: false, limit: "1mb" });

/**
 * Parses form-encoded or JSON bodies and never fails the request: an
 * unreadable body becomes `{}`.
 */
export const lenientBody: RequestHandler = (req, res, next) => {
  const parser = req.is("application/x-www-form-urlencoded") ? formParser : jsonParser;

  parser(req, res, (error?: unknown) => {
    if (error) {
      logger.warn("http.body_unparsed", { path: req.originalUrl, ...errorMeta(error) });
      req.body = {};
    }
    next();
  });
};
