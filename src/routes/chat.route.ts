import { NextFunction, Request, Response, Router } from "express";
import { z } from "zod";
import { ValidationError } from "../lib/errors.js";
import type { ChatService } from "../services/chat.service.js";

const REQUIRED_FIELDS = "user_id and message are required";

const chatBodySchema = z.object({
  user_id: z.string({ required_error: REQUIRED_FIELDS }).trim().min(1, REQUIRED_FIELDS),
  message: z.string({ required_error: REQUIRED_FIELDS }).trim().min(1, REQUIRED_FIELDS),
});

export const createChatRouter = (chat: ChatService): Router => {
  const router = Router();

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatBodySchema.safeParse(req.body ?? {});

      if (!parsed.success) {
        throw new ValidationError(REQUIRED_FIELDS, { details: parsed.error.format() });
      }

      const payload = await chat.chat(parsed.data.user_id, parsed.data.message);

      return res.status(200).json(payload);
    } catch (error) {
      return next(error);
    }
  });

  return router;
};
