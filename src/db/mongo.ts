import mongoose, { type Connection } from "mongoose";
import { errorMeta, logger } from "../lib/logger.js";

mongoose.set("strictQuery", true);

export interface MongoStoreConfig {
  uri?: string;
  dbName?: string;
  collection?: string;
}

export interface ResolvedMongoConfig {
  uri: string;
  dbName: string;
  collection: string;
}

export const resolveMongoConfig = (config: MongoStoreConfig): ResolvedMongoConfig | null => {
  const { uri, dbName, collection } = config;
  if (!uri || !dbName || !collection) {
    return null;
  }

  return { uri, dbName, collection };
};

/**
 * Opens a dedicated connection, hands it to `work` and closes it on every exit
 * path. Connections are never reused across operations.
 */
export const withMongoConnection = async <T>(
  config: ResolvedMongoConfig,
  work: (connection: Connection) => Promise<T>
): Promise<T> => {
  const connection = mongoose.createConnection(config.uri, {
    dbName: config.dbName,
    serverSelectionTimeoutMS: 5_000,
  });

  try {
    await connection.asPromise();
    return await work(connection);
  } finally {
    await connection.close().catch((error: unknown) => {
      logger.warn("mongo.close_failed", errorMeta(error));
    });
  }
};
