import { describe, expect, it } from "vitest";
import { parseEnv } from "../src/config/env.js";
import { createDependencies } from "../src/container.js";
import { createMongoMessageRepository } from "../src/db/messages.repository.js";
import { resolveMongoConfig } from "../src/db/mongo.js";
import { ConfigurationError } from "../src/lib/errors.js";

describe("container", () => {
  it("wires an unconfigured store and channel when the environment is empty", async () => {
    const deps = createDependencies(parseEnv({}));

    expect(deps.health).toEqual({ storeConfigured: false, channelConfigured: false });
    expect(deps.chatRateLimit).toBe(0);
    await expect(deps.history.getHistory("u-1", 10, 0)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("passes the configured chat rate limit to the app", () => {
    expect(createDependencies(parseEnv({ CHAT_RATE_LIMIT: "30" })).chatRateLimit).toBe(30);
  });

  it("marks the store configured once a connection target is given", () => {
    const deps = createDependencies(parseEnv({ MONGODB_URI: "mongodb://localhost:27017" }));

    expect(deps.health.storeConfigured).toBe(true);
  });
});

describe("mongo configuration", () => {
  it("requires a uri, database and collection", () => {
    expect(resolveMongoConfig({ dbName: "db", collection: "c" })).toBeNull();
    expect(resolveMongoConfig({ uri: "mongodb://localhost:27017", dbName: "db", collection: "" })).toBeNull();
    expect(resolveMongoConfig({ uri: "mongodb://localhost:27017", dbName: "db", collection: "c" })).toEqual({
      uri: "mongodb://localhost:27017",
      dbName: "db",
      collection: "c",
    });
  });

  it("refuses every operation without configuration", async () => {
    const repository = createMongoMessageRepository({});

    expect(repository.configured).toBe(false);
    await expect(repository.countByUser("u-1")).rejects.toBeInstanceOf(ConfigurationError);
  });
});
