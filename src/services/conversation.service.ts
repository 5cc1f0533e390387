import type { MessageRepository } from "../db/messages.repository.js";
import { errorMeta, logger } from "../lib/logger.js";
import {
  sessionIdFor,
  type MessageDocument,
  type Sender,
  type StoredMessage,
} from "../models/Message.js";

export interface AppendMessageInput {
  userId: string;
  message: string;
  sender: Sender;
  timestamp?: Date;
  sessionId?: string;
  audioUrl?: string;
  mediaType?: string;
}

export interface ConversationStore {
  /** Best effort: a missing store is a no-op and a failed write is logged, never thrown. */
  append(input: AppendMessageInput): Promise<void>;
  /** Last `count` messages of a session, oldest first. Empty on any failure. */
  recent(userId: string, sessionId: string, count: number): Promise<StoredMessage[]>;
}

export const buildMessageDocument = (input: AppendMessageInput): MessageDocument => {
  const document: MessageDocument = {
    user_id: input.userId,
    message: input.message,
    sender: input.sender,
    timestamp: input.timestamp ?? new Date(),
    session_id: input.sessionId ?? sessionIdFor(input.userId),
  };

  if (input.audioUrl) {
    document.audio_url = input.audioUrl;
  }
  if (input.mediaType) {
    document.media_type = input.mediaType;
  }

  return document;
};

export const createConversationStore = (repository: MessageRepository): ConversationStore => ({
  append: async (input) => {
    if (!repository.configured) {
      return;
    }

    const document = buildMessageDocument(input);

    try {
      await repository.insert(document);
    } catch (error) {
      logger.error("store.append_failed", {
        userId: document.user_id,
        sender: document.sender,
        ...errorMeta(error),
      });
    }
  },
  recent: async (userId, sessionId, count) => {
    if (!repository.configured || count <= 0) {
      return [];
    }

    try {
      const newestFirst = await repository.findByUser(userId, {
        order: "desc",
        sessionId,
        limit: count,
      });
      return newestFirst.reverse();
    } catch (error) {
      logger.warn("store.recent_failed", { userId, ...errorMeta(error) });
      return [];
    }
  },
});
