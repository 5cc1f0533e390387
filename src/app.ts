import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { logger } from "./lib/logger.js";
import { errorHandler } from "./middleware/error.js";
import { createChatRouter } from "./routes/chat.route.js";
import { createHistoryRouter } from "./routes/history.route.js";
import { createWebhookRouter } from "./routes/webhook.route.js";
import type { ChatService } from "./services/chat.service.js";
import type { HistoryService } from "./services/history.service.js";
import type { WebhookService } from "./services/webhook.service.js";

export interface AppDependencies {
  chat: ChatService;
  history: HistoryService;
  webhook: WebhookService;
  health: {
    storeConfigured: boolean;
    channelConfigured: boolean;
  };
  /** Requests per minute per client on POST /api/chat; 0 or absent disables the limiter. */
  chatRateLimit?: number;
}

export const createApp = (deps: AppDependencies): Express => {
  const app = express();

  app.use(helmet());
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info("http.request", {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });
    next();
  });

  // The provider posts form bodies and must always get a reply, so the webhook
  // sits ahead of the strict parsers and the error handler.
  app.use("/webhook", createWebhookRouter(deps.webhook));

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true }));

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      store: deps.health.storeConfigured ? "configured" : "unconfigured",
      channel: deps.health.channelConfigured ? "configured" : "unconfigured",
    });
  });

  const chatRateLimit = deps.chatRateLimit ?? 0;
  if (chatRateLimit > 0) {
    app.post(
      "/api/chat",
      rateLimit({
        windowMs: 60_000,
        limit: chatRateLimit,
        standardHeaders: true,
        legacyHeaders: false,
      })
    );
  }

  app.use("/api/chat", createChatRouter(deps.chat));
  app.use("/api/chat", createHistoryRouter(deps.history));

  app.use(errorHandler);

  return app;
};
