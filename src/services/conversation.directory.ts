import type { AssistantClient } from '../types/assistant.types';
import { createLogger } from '../utils/relay.logger.utils';

const logger = createLogger('conversation-directory');

/**
 * Maps a chat user to the assistant thread that holds their history.
 */
export interface ConversationDirectory {
  resolve(userId: string): Promise<string>;
  size(): number;
}

export interface ConversationDirectoryOptions {
  /** Entries older than this are swept on every resolve and size. 0 disables. */
  ttlMs?: number;
  /** Least recently resolved entry is evicted past this size. 0 disables. */
  maxEntries?: number;
  now?: () => number;
}

interface ConversationEntry {
  threadId: string;
  createdAt: number;
}

/**
 * Process-local directory. The first message from a user creates a thread;
 * later messages reuse it. Entries live until the process exits unless a
 * TTL or size bound is configured.
 */
export class InMemoryConversationDirectory implements ConversationDirectory {
  // Map iteration order doubles as recency order
  private readonly entries = new Map<string, ConversationEntry>();
  // Insertion order is creation order, so expired entries sit at the front
  private readonly byCreation = new Map<string, ConversationEntry>();
  private readonly pending = new Map<string, Promise<string>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(
    private readonly assistant: Pick<AssistantClient, 'createConversation'>,
    options: ConversationDirectoryOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? 0;
    this.maxEntries = options.maxEntries ?? 0;
    this.now = options.now ?? Date.now;
  }

  async resolve(userId: string): Promise<string> {
    this.sweepExpired();

    const existing = this.lookup(userId);
    if (existing) {
      return existing;
    }

    const inFlight = this.pending.get(userId);
    if (inFlight) {
      return inFlight;
    }

    const creation = this.create(userId);
    this.pending.set(userId, creation);
    try {
      return await creation;
    } finally {
      this.pending.delete(userId);
    }
  }

  size(): number {
    this.sweepExpired();
    return this.entries.size;
  }

  private lookup(userId: string): string | undefined {
    const entry = this.entries.get(userId);
    if (!entry) {
      return undefined;
    }

    // refresh recency
    this.entries.delete(userId);
    this.entries.set(userId, entry);
    return entry.threadId;
  }

  private async create(userId: string): Promise<string> {
    const threadId = await this.assistant.createConversation();
    const entry: ConversationEntry = { threadId, createdAt: this.now() };

    this.entries.set(userId, entry);
    this.byCreation.delete(userId);
    this.byCreation.set(userId, entry);
    this.evictOverflow();

    logger.conversationCreated({ userId, threadId, trackedCount: this.entries.size });
    return threadId;
  }

  /**
   * Drop every entry older than the TTL. Stops at the first live entry.
   */
  private sweepExpired(): void {
    if (this.ttlMs <= 0) {
      return;
    }

    const now = this.now();
    for (const [userId, entry] of this.byCreation) {
      if (now - entry.createdAt < this.ttlMs) {
        return;
      }
      this.remove(userId, entry, 'ttl');
    }
  }

  private evictOverflow(): void {
    if (this.maxEntries <= 0) {
      return;
    }

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.entries().next();
      if (oldest.done) {
        return;
      }
      const [userId, entry] = oldest.value;
      this.remove(userId, entry, 'capacity');
    }
  }

  private remove(userId: string, entry: ConversationEntry, reason: 'ttl' | 'capacity'): void {
    this.entries.delete(userId);
    this.byCreation.delete(userId);
    logger.conversationEvicted({ userId, threadId: entry.threadId, reason });
  }
}
