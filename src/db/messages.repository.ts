import type { Connection, Model, Types } from "mongoose";
import { ConfigurationError, PersistenceError } from "../lib/errors.js";
import {
  messageSchema,
  type MessageDocument,
  type StoredMessage,
} from "../models/Message.js";
import { resolveMongoConfig, withMongoConnection, type MongoStoreConfig } from "./mongo.js";

export type SortOrder = "asc" | "desc";

export interface MessageQuery {
  order: SortOrder;
  sessionId?: string;
  skip?: number;
  limit?: number;
}

export interface Page {
  skip: number;
  limit: number;
}

/**
 * Append-only access to the chat message collection. Nothing here updates or
 * deletes a document.
 */
export interface MessageRepository {
  readonly configured: boolean;
  insert(document: MessageDocument): Promise<void>;
  findByUser(userId: string, query: MessageQuery): Promise<StoredMessage[]>;
  countByUser(userId: string): Promise<number>;
  listUserIds(page: Page): Promise<string[]>;
}

type LeanMessage = MessageDocument & { _id: Types.ObjectId };

const toStored = (document: LeanMessage): StoredMessage => ({
  ...document,
  _id: document._id.toString(),
});

const bindModel = (connection: Connection, collection: string): Model<MessageDocument> =>
  connection.model<MessageDocument>("Message", messageSchema, collection);

const unconfigured = (): never => {
  throw new ConfigurationError("Database not configured");
};

export const unconfiguredMessageRepository: MessageRepository = {
  configured: false,
  insert: async () => unconfigured(),
  findByUser: async () => unconfigured(),
  countByUser: async () => unconfigured(),
  listUserIds: async () => unconfigured(),
};

export const createMongoMessageRepository = (config: MongoStoreConfig): MessageRepository => {
  const resolved = resolveMongoConfig(config);
  if (!resolved) {
    return unconfiguredMessageRepository;
  }

  const run = async <T>(operation: string, work: (model: Model<MessageDocument>) => Promise<T>) => {
    try {
      return await withMongoConnection(resolved, (connection) =>
        work(bindModel(connection, resolved.collection))
      );
    } catch (error) {
      throw new PersistenceError(`Message store ${operation} failed`, { cause: error });
    }
  };

  return {
    configured: true,
    insert: (document) =>
      run("insert", async (model) => {
        await model.create(document);
      }),
    findByUser: (userId, { order, sessionId, skip = 0, limit }) =>
      run("find", async (model) => {
        const direction = order === "asc" ? 1 : -1;
        const filter = sessionId ? { user_id: userId, session_id: sessionId } : { user_id: userId };
        let query = model.find(filter).sort({ timestamp: direction, _id: direction }).skip(skip);
        if (limit !== undefined) {
          query = query.limit(limit);
        }

        const documents = await query.lean<LeanMessage[]>().exec();
        return documents.map(toStored);
      }),
    countByUser: (userId) =>
      run("count", (model) => model.countDocuments({ user_id: userId }).exec()),
    listUserIds: ({ skip, limit }) =>
      run("distinct_users", async (model) => {
        const groups = await model
          .aggregate<{ _id: string }>([
            { $group: { _id: "$user_id" } },
            { $sort: { _id: 1 } },
            { $skip: skip },
            { $limit: limit },
          ])
          .exec();
        return groups.map((group) => group._id);
      }),
  };
};
