import type { AppDependencies } from "./app.js";
import type { AppEnvironment } from "./config/env.js";
import { createMongoMessageRepository } from "./db/messages.repository.js";
import { createLazyAgent, createOpenRouterAgent } from "./lib/agent.js";
import { createTwilioChannel } from "./lib/channel.js";
import { logger } from "./lib/logger.js";
import { createMediaFetcher } from "./lib/media.js";
import { createChatService } from "./services/chat.service.js";
import { createConversationStore } from "./services/conversation.service.js";
import { createDeliveryService } from "./services/delivery.service.js";
import { createHistoryService } from "./services/history.service.js";
import { createWebhookService } from "./services/webhook.service.js";

/** Wires every collaborator once; handlers receive them by reference. */
export const createDependencies = (env: AppEnvironment): AppDependencies => {
  const repository = createMongoMessageRepository({
    uri: env.MONGODB_URI,
    dbName: env.MONGODB_DB,
    collection: env.MONGODB_COLLECTION,
  });
  const channel = createTwilioChannel({
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    phoneNumber: env.TWILIO_PHONE_NUMBER,
  });

  if (!repository.configured) {
    logger.warn("store.unconfigured");
  }
  if (!channel) {
    logger.warn("channel.unconfigured");
  }

  const agent = createLazyAgent(async () =>
    createOpenRouterAgent({
      apiKey: env.OPENROUTER_API_KEY,
      model: env.OPENROUTER_MODEL,
      maxTokens: env.OPENROUTER_MAX_TOKENS,
      topP: env.OPENROUTER_TOP_P,
    })
  );

  const media = createMediaFetcher({
    credentials:
      env.TWILIO_ACCOUNT_SID && env.TWILIO_AUTH_TOKEN
        ? { username: env.TWILIO_ACCOUNT_SID, password: env.TWILIO_AUTH_TOKEN }
        : undefined,
  });

  const store = createConversationStore(repository);
  const chat = createChatService({ store, agent, historyTurns: env.AGENT_HISTORY_TURNS });
  const delivery = createDeliveryService({ channel });

  return {
    chat,
    history: createHistoryService(repository),
    webhook: createWebhookService({ store, chat, media, delivery }),
    health: {
      storeConfigured: repository.configured,
      channelConfigured: channel !== null,
    },
    chatRateLimit: env.CHAT_RATE_LIMIT,
  };
};
