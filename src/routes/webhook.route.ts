import { Request, Response, Router } from "express";
import { lenientBody } from "../middleware/body.js";
import type { WebhookService } from "../services/webhook.service.js";

/** Channel provider callbacks. Every request gets a 2xx reply. */
export const createWebhookRouter = (webhook: WebhookService): Router => {
  const router = Router();

  router.post("/", lenientBody, async (req: Request, res: Response) => {
    const reply = await webhook.handle(req.body);

    if (reply.status === 204) {
      return res.status(204).end();
    }

    return res
      .status(reply.status)
      .type(reply.contentType ?? "text/plain")
      .send(reply.body);
  });

  return router;
};
