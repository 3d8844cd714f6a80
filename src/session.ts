import { MemorySessionStorage, type StorageAdapter } from "grammy";
import { ConversationSession } from "./types";

/**
 * Per-user conversation state. A missing entry means the user is idle.
 *
 * Backed by a grammY storage adapter, so any of the `@grammyjs/storage-*`
 * packages can replace the in-memory default.
 */
export class SessionStore {
  constructor(
    private readonly storage: StorageAdapter<ConversationSession> = new MemorySessionStorage<ConversationSession>(),
  ) {}

  async get(userId: number): Promise<ConversationSession | undefined> {
    return await this.storage.read(String(userId));
  }

  async set(userId: number, session: ConversationSession): Promise<void> {
    await this.storage.write(String(userId), session);
  }

  async clear(userId: number): Promise<void> {
    await this.storage.delete(String(userId));
  }
}
