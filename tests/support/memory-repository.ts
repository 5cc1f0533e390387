import type { MessageQuery, MessageRepository, Page } from "../../src/db/messages.repository.js";
import { ConfigurationError, PersistenceError } from "../../src/lib/errors.js";
import type { MessageDocument, StoredMessage } from "../../src/models/Message.js";

interface StoredEntry {
  seq: number;
  message: StoredMessage;
}

/** In-process stand-in for the Mongo collection, sorted the same way. */
export class MemoryMessageRepository implements MessageRepository {
  readonly configured: boolean;
  private entries: StoredEntry[] = [];
  private seq = 0;
  failReads = false;
  failWrites = false;

  constructor(options: { configured?: boolean } = {}) {
    this.configured = options.configured ?? true;
  }

  get messages(): StoredMessage[] {
    return this.entries.map((entry) => entry.message);
  }

  seed(documents: MessageDocument[]): void {
    documents.forEach((document) => this.push(document));
  }

  async insert(document: MessageDocument): Promise<void> {
    this.guard(this.failWrites);
    this.push(document);
  }

  async findByUser(userId: string, query: MessageQuery): Promise<StoredMessage[]> {
    this.guard(this.failReads);
    const direction = query.order === "asc" ? 1 : -1;
    const skip = query.skip ?? 0;

    const matching = this.entries
      .filter((entry) => entry.message.user_id === userId)
      .filter((entry) => !query.sessionId || entry.message.session_id === query.sessionId)
      .sort(
        (a, b) =>
          direction * (a.message.timestamp.getTime() - b.message.timestamp.getTime()) ||
          direction * (a.seq - b.seq)
      )
      .map((entry) => ({ ...entry.message }));

    return query.limit === undefined ? matching.slice(skip) : matching.slice(skip, skip + query.limit);
  }

  async countByUser(userId: string): Promise<number> {
    this.guard(this.failReads);
    return this.entries.filter((entry) => entry.message.user_id === userId).length;
  }

  async listUserIds({ skip, limit }: Page): Promise<string[]> {
    this.guard(this.failReads);
    const unique = [...new Set(this.entries.map((entry) => entry.message.user_id))].sort();
    return unique.slice(skip, skip + limit);
  }

  private push(document: MessageDocument): void {
    this.seq += 1;
    this.entries.push({ seq: this.seq, message: { ...document, _id: `m${this.seq}` } });
  }

  private guard(shouldFail: boolean): void {
    if (!this.configured) {
      throw new ConfigurationError("Database not configured");
    }
    if (shouldFail) {
      throw new PersistenceError("simulated store outage");
    }
  }
}

export const at = (iso: string): Date => new Date(iso);
