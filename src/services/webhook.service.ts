import { z } from "zod";
import { AUDIO_INSTRUCTION } from "../lib/agent.js";
import { normalizeSenderId } from "../lib/channel.js";
import { errorMeta, logger } from "../lib/logger.js";
import type { MediaFetcher } from "../lib/media.js";
import {
  APOLOGY_AUDIO_TURN,
  APOLOGY_MEDIA_FETCH,
  APOLOGY_TEXT_TURN,
  APOLOGY_UNEXPECTED,
  AUDIO_PLACEHOLDER,
  MISSING_FIELDS_ACK,
} from "../lib/replies.js";
import { sessionIdFor } from "../models/Message.js";
import type { ChatService } from "./chat.service.js";
import type { ConversationStore } from "./conversation.service.js";
import type { DeliveryService, OutboundReply } from "./delivery.service.js";

const optionalField = z.string().optional().catch(undefined);

const inboundSchema = z.object({
  From: optionalField,
  Body: optionalField,
  MediaUrl0: optionalField,
  MediaContentType0: optionalField,
});

export type InboundPayload = z.infer<typeof inboundSchema>;

export type InboundEvent =
  | { kind: "audio"; userId: string; mediaUrl: string; mediaType: string }
  | { kind: "text"; userId: string; text: string }
  | { kind: "empty" };

export const parseInbound = (body: unknown): InboundPayload => {
  const parsed = inboundSchema.safeParse(body);
  return parsed.success ? parsed.data : {};
};

export const classifyInbound = (payload: InboundPayload): InboundEvent => {
  // A missing sender still yields a turn, attributed to an empty user id.
  const userId = normalizeSenderId(payload.From ?? "");

  const mediaUrl = payload.MediaUrl0;
  const mediaType = payload.MediaContentType0 ?? "";
  if (mediaUrl && mediaType.startsWith("audio")) {
    return { kind: "audio", userId, mediaUrl, mediaType };
  }

  const text = payload.Body ?? "";
  if (text.trim()) {
    return { kind: "text", userId, text };
  }

  return { kind: "empty" };
};

export interface WebhookService {
  handle(body: unknown): Promise<OutboundReply>;
}

export interface WebhookDeps {
  store: ConversationStore;
  chat: ChatService;
  media: MediaFetcher;
  delivery: DeliveryService;
}

const EMPTY_ACK: OutboundReply = {
  status: 200,
  contentType: "text/plain",
  body: MISSING_FIELDS_ACK,
  tier: "text",
};

export const createWebhookService = ({ store, chat, media, delivery }: WebhookDeps): WebhookService => {
  const finish = async (userId: string, reply: string, answered: boolean) =>
    answered ? delivery.deliver(userId, reply) : delivery.respondWithText(reply);

  const handleText = async (event: Extract<InboundEvent, { kind: "text" }>) => {
    const { reply, answered } = await chat.runTurn({
      userId: event.userId,
      sessionId: sessionIdFor(event.userId),
      timestamp: new Date(),
      userMessage: { message: event.text },
      prompt: event.text,
      apology: APOLOGY_TEXT_TURN,
    });

    return finish(event.userId, reply, answered);
  };

  const handleAudio = async (event: Extract<InboundEvent, { kind: "audio" }>) => {
    const timestamp = new Date();
    const sessionId = sessionIdFor(event.userId);
    const userMessage = {
      message: AUDIO_PLACEHOLDER,
      audioUrl: event.mediaUrl,
      mediaType: event.mediaType,
    };

    const fetched = await media.fetch(event.mediaUrl);

    if (!fetched.ok) {
      logger.error("webhook.media_failed", {
        userId: event.userId,
        url: event.mediaUrl,
        ...errorMeta(fetched.error),
      });
      // The contact attempt is still recorded; there is no agent turn to store.
      await store.append({ userId: event.userId, sessionId, sender: "user", timestamp, ...userMessage });
      return delivery.respondWithText(APOLOGY_MEDIA_FETCH);
    }

    const { reply, answered } = await chat.runTurn({
      userId: event.userId,
      sessionId,
      timestamp,
      userMessage,
      prompt: AUDIO_INSTRUCTION,
      audio: { content: fetched.media.content, contentType: event.mediaType },
      apology: APOLOGY_AUDIO_TURN,
    });

    return finish(event.userId, reply, answered);
  };

  return {
    handle: async (body) => {
      try {
        const event = classifyInbound(parseInbound(body));
        logger.debug("webhook.classified", { kind: event.kind });

        switch (event.kind) {
          case "audio":
            return await handleAudio(event);
          case "text":
            return await handleText(event);
          case "empty":
            return EMPTY_ACK;
        }
      } catch (error) {
        logger.error("webhook.unhandled", errorMeta(error));
        return delivery.respondWithText(APOLOGY_UNEXPECTED);
      }
    },
  };
};
