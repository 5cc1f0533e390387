import type { MessageRepository } from "../db/messages.repository.js";
import { ConfigurationError } from "../lib/errors.js";
import { errorMeta, logger } from "../lib/logger.js";
import { serializeMessage, toUtcString, type SerializedMessage } from "../models/Message.js";

export const SUMMARY_MESSAGES_PER_USER = 10;

export interface UserSummary {
  user_id: string;
  total_messages: number;
  recent_messages: SerializedMessage[];
  first_activity: string | null;
  last_activity: string | null;
}

export interface UserListing {
  user_id: string;
  latest_message: SerializedMessage;
  message_count: number;
  last_activity: string;
  conversation_summary?: UserSummary;
}

export interface ListUsersOptions {
  limit: number;
  skip: number;
  includeSummary: boolean;
}

export interface HistoryService {
  getHistory(userId: string, limit: number, skip: number): Promise<SerializedMessage[]>;
  listUsers(options: ListUsersOptions): Promise<UserListing[]>;
  getUserSummary(userId: string, limit: number): Promise<UserSummary>;
}

const emptySummary = (userId: string): UserSummary => ({
  user_id: userId,
  total_messages: 0,
  recent_messages: [],
  first_activity: null,
  last_activity: null,
});

export const createHistoryService = (repository: MessageRepository): HistoryService => {
  const ensureConfigured = () => {
    if (!repository.configured) {
      throw new ConfigurationError("Database not configured");
    }
  };

  const summarize = async (userId: string, limit: number): Promise<UserSummary> => {
    try {
      const totalMessages = await repository.countByUser(userId);
      const newestFirst = await repository.findByUser(userId, { order: "desc", limit });
      const [first] = await repository.findByUser(userId, { order: "asc", limit: 1 });
      const [last] = await repository.findByUser(userId, { order: "desc", limit: 1 });

      return {
        user_id: userId,
        total_messages: totalMessages,
        recent_messages: newestFirst.reverse().map(serializeMessage),
        first_activity: first ? toUtcString(first.timestamp) : null,
        last_activity: last ? toUtcString(last.timestamp) : null,
      };
    } catch (error) {
      logger.error("history.summary_failed", { userId, ...errorMeta(error) });
      return emptySummary(userId);
    }
  };

  return {
    getHistory: async (userId, limit, skip) => {
      ensureConfigured();

      try {
        // Newest-first so the window anchors on the latest message, then flip the page.
        const newestFirst = await repository.findByUser(userId, { order: "desc", skip, limit });
        return newestFirst.reverse().map(serializeMessage);
      } catch (error) {
        logger.error("history.fetch_failed", { userId, limit, skip, ...errorMeta(error) });
        return [];
      }
    },

    listUsers: async ({ limit, skip, includeSummary }) => {
      ensureConfigured();

      let userIds: string[];
      try {
        userIds = await repository.listUserIds({ skip, limit });
      } catch (error) {
        logger.error("history.users_failed", { limit, skip, ...errorMeta(error) });
        return [];
      }

      const listings: UserListing[] = [];

      for (const userId of userIds) {
        try {
          const [latest] = await repository.findByUser(userId, { order: "desc", limit: 1 });
          const messageCount = await repository.countByUser(userId);

          if (!latest) {
            continue;
          }

          const latestMessage = serializeMessage(latest);
          listings.push({
            user_id: userId,
            latest_message: latestMessage,
            message_count: messageCount,
            last_activity: latestMessage.timestamp,
          });
        } catch (error) {
          logger.warn("history.user_listing_failed", { userId, ...errorMeta(error) });
        }
      }

      if (includeSummary) {
        // One summary per user, sequentially.
        for (const listing of listings) {
          listing.conversation_summary = await summarize(listing.user_id, SUMMARY_MESSAGES_PER_USER);
        }
      }

      return listings;
    },

    getUserSummary: async (userId, limit) => {
      ensureConfigured();
      return summarize(userId, limit);
    },
  };
};
