import { NextFunction, Request, Response, Router } from "express";
import { z } from "zod";
import { ValidationError } from "../lib/errors.js";
import type { HistoryService } from "../services/history.service.js";

const TRUTHY = new Set(["true", "1", "yes", "on"]);
const DECIMAL_INTEGER = /^-?\d+$/;

const toInteger = (value: string | undefined) => {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  return DECIMAL_INTEGER.test(value) ? Number(value) : Number.NaN;
};

const integerQuery = (name: string, min: number, max?: number) => {
  const message = max === undefined ? `${name} must be non-negative` : `${name} must be between ${min} and ${max}`;
  const bounded = z
    .number({ invalid_type_error: `${name} must be an integer` })
    .int(`${name} must be an integer`)
    .min(min, message)
    .max(max ?? Number.MAX_SAFE_INTEGER, message);

  return z
    .string()
    .optional()
    .transform(toInteger)
    .pipe(bounded.optional());
};

const booleanQuery = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]).optional())
  .transform((value) => (value ? TRUTHY.has(value) : false));

const userParamsSchema = z.object({
  user_id: z.string().trim().min(1, "user_id is required"),
});

const historyQuerySchema = z.object({
  limit: integerQuery("limit", 1, 100),
  skip: integerQuery("skip", 0),
});

const usersQuerySchema = z.object({
  limit: integerQuery("limit", 1, 100),
  skip: integerQuery("skip", 0),
  include_summary: booleanQuery,
});

const summaryQuerySchema = z.object({
  limit: integerQuery("limit", 1, 50),
});

const parseOrThrow = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> => {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const [firstIssue] = parsed.error.issues;
    throw new ValidationError(firstIssue?.message ?? "Invalid request parameters", {
      details: parsed.error.format(),
    });
  }
  return parsed.data;
};

export const createHistoryRouter = (history: HistoryService): Router => {
  const router = Router();

  router.get("/history/:user_id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id: userId } = parseOrThrow(userParamsSchema, req.params);
      const query = parseOrThrow(historyQuerySchema, req.query);
      const limit = query.limit ?? 50;
      const skip = query.skip ?? 0;

      const messages = await history.getHistory(userId, limit, skip);

      return res.status(200).json({
        user_id: userId,
        messages,
        total_messages: messages.length,
        limit,
        skip,
      });
    } catch (error) {
      return next(error);
    }
  });

  router.get("/users", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseOrThrow(usersQuerySchema, req.query);
      const limit = query.limit ?? 20;
      const skip = query.skip ?? 0;
      const includeSummary = query.include_summary;

      const users = await history.listUsers({ limit, skip, includeSummary });

      return res.status(200).json({
        users,
        total_users: users.length,
        limit,
        skip,
        include_summary: includeSummary,
      });
    } catch (error) {
      return next(error);
    }
  });

  router.get("/users/:user_id/summary", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id: userId } = parseOrThrow(userParamsSchema, req.params);
      const query = parseOrThrow(summaryQuerySchema, req.query);

      const summary = await history.getUserSummary(userId, query.limit ?? 10);

      return res.status(200).json(summary);
    } catch (error) {
      return next(error);
    }
  });

  return router;
};
