import mongoose, { type Connection } from "mongoose";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMongoMessageRepository } from "../src/db/messages.repository.js";
import { withMongoConnection } from "../src/db/mongo.js";
import { PersistenceError } from "../src/lib/errors.js";
import { messageSchema, type MessageDocument } from "../src/models/Message.js";

const config = { uri: "mongodb://store.test:27017", dbName: "support", collection: "chat_messages" };

const objectId = (suffix: string) => new mongoose.Types.ObjectId(suffix.padStart(24, "0"));

describe("mongo message repository", () => {
  let connection: Connection;

  beforeEach(() => {
    // An unopened connection; nothing here reaches a server.
    connection = mongoose.createConnection();
    vi.spyOn(mongoose, "createConnection").mockImplementation(() => connection);
    vi.spyOn(connection, "asPromise").mockResolvedValue(connection);
    vi.spyOn(connection, "close").mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("withMongoConnection", () => {
    it("opens a connection for the operation and closes it afterwards", async () => {
      const result = await withMongoConnection(config, async () => "done");

      expect(result).toBe("done");
      expect(mongoose.createConnection).toHaveBeenCalledWith(config.uri, {
        dbName: "support",
        serverSelectionTimeoutMS: 5_000,
      });
      expect(connection.close).toHaveBeenCalledTimes(1);
    });

    it("closes the connection when the operation rejects", async () => {
      await expect(
        withMongoConnection(config, async () => {
          throw new Error("write conflict");
        })
      ).rejects.toThrow("write conflict");

      expect(connection.close).toHaveBeenCalledTimes(1);
    });

    it("closes the connection when connecting fails", async () => {
      vi.spyOn(connection, "asPromise").mockRejectedValue(new Error("ECONNREFUSED"));
      const work = vi.fn(async () => "unreachable");

      await expect(withMongoConnection(config, work)).rejects.toThrow("ECONNREFUSED");

      expect(work).not.toHaveBeenCalled();
      expect(connection.close).toHaveBeenCalledTimes(1);
    });

    it("keeps the operation result when closing fails", async () => {
      vi.spyOn(connection, "close").mockRejectedValue(new Error("already closed"));

      await expect(withMongoConnection(config, async () => 7)).resolves.toBe(7);
    });
  });

  describe("createMongoMessageRepository", () => {
    it("reports itself unconfigured without a uri", () => {
      expect(createMongoMessageRepository({ ...config, uri: undefined }).configured).toBe(false);
    });

    it("wraps store failures in a persistence error", async () => {
      vi.spyOn(connection, "asPromise").mockRejectedValue(new Error("ECONNREFUSED"));
      const repository = createMongoMessageRepository(config);

      const failure = repository.countByUser("u-1");

      await expect(failure).rejects.toBeInstanceOf(PersistenceError);
      await expect(failure).rejects.toThrow("Message store count failed");
      expect(connection.close).toHaveBeenCalledTimes(1);
    });

    it("reads a session newest first with paging and serializes ids", async () => {
      const find = vi.spyOn(mongoose.Model, "find");
      const sort = vi.spyOn(mongoose.Query.prototype, "sort");
      const skip = vi.spyOn(mongoose.Query.prototype, "skip");
      const limit = vi.spyOn(mongoose.Query.prototype, "limit");
      vi.spyOn(mongoose.Query.prototype, "exec").mockResolvedValue([
        {
          _id: objectId("b2"),
          user_id: "u-1",
          message: "Bonjour !",
          sender: "agent",
          timestamp: new Date("2025-05-01T12:00:01.000Z"),
          session_id: "u-1_session",
        },
      ]);

      const messages = await createMongoMessageRepository(config).findByUser("u-1", {
        order: "desc",
        sessionId: "u-1_session",
        skip: 5,
        limit: 10,
      });

      expect(find).toHaveBeenCalledWith({ user_id: "u-1", session_id: "u-1_session" });
      expect(sort).toHaveBeenCalledWith({ timestamp: -1, _id: -1 });
      expect(skip).toHaveBeenCalledWith(5);
      expect(limit).toHaveBeenCalledWith(10);
      expect(messages).toEqual([
        {
          _id: "0000000000000000000000b2",
          user_id: "u-1",
          message: "Bonjour !",
          sender: "agent",
          timestamp: new Date("2025-05-01T12:00:01.000Z"),
          session_id: "u-1_session",
        },
      ]);
      expect(connection.close).toHaveBeenCalledTimes(1);
    });

    it("reads every message of a user oldest first without a limit", async () => {
      const find = vi.spyOn(mongoose.Model, "find");
      const sort = vi.spyOn(mongoose.Query.prototype, "sort");
      const limit = vi.spyOn(mongoose.Query.prototype, "limit");
      vi.spyOn(mongoose.Query.prototype, "exec").mockResolvedValue([]);

      await createMongoMessageRepository(config).findByUser("u-1", { order: "asc" });

      expect(find).toHaveBeenCalledWith({ user_id: "u-1" });
      expect(sort).toHaveBeenCalledWith({ timestamp: 1, _id: 1 });
      expect(limit).not.toHaveBeenCalled();
    });

    it("pages distinct users through a grouping pipeline", async () => {
      const aggregate = vi.spyOn(mongoose.Model, "aggregate");
      vi.spyOn(mongoose.Aggregate.prototype, "exec").mockResolvedValue([{ _id: "a-user" }, { _id: "b-user" }]);

      const users = await createMongoMessageRepository(config).listUserIds({ skip: 20, limit: 2 });

      expect(users).toEqual(["a-user", "b-user"]);
      expect(aggregate).toHaveBeenCalledWith([
        { $group: { _id: "$user_id" } },
        { $sort: { _id: 1 } },
        { $skip: 20 },
        { $limit: 2 },
      ]);
    });

    it("inserts the document as given", async () => {
      const create = vi.spyOn(mongoose.Model, "create").mockResolvedValue([]);
      const document: MessageDocument = {
        user_id: "u-1",
        message: "Bonjour",
        sender: "user",
        timestamp: new Date("2025-05-01T12:00:00.000Z"),
        session_id: "u-1_session",
      };

      await createMongoMessageRepository(config).insert(document);

      expect(create).toHaveBeenCalledWith(document);
      expect(connection.close).toHaveBeenCalledTimes(1);
    });
  });

  describe("messageSchema", () => {
    it("accepts a message whose sender is unknown", () => {
      const Message = mongoose.model("MessageValidation", messageSchema);
      const document = new Message({
        user_id: "",
        message: "Bonjour",
        sender: "user",
        timestamp: new Date("2025-05-01T12:00:00.000Z"),
        session_id: "_session",
      });

      expect(document.validateSync()?.errors).toBeUndefined();
    });
  });
});
