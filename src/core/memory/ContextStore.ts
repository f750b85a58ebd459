import { logger as defaultLogger, type Logger } from '../../utils/logger';
import type { ConversationContext } from '../../types';
import { createConversationContext } from './conversationContext';

/**
 * Per-conversation memory, keyed by conversation id.
 * Reads hand out copies; a turn's changes land only through save().
 */
export interface ContextStore {
  get(conversationId: string): ConversationContext | null;
  getOrCreate(conversationId: string, now?: number): ConversationContext;
  save(context: ConversationContext, now?: number): void;
  reset(conversationId: string): void;
}

export interface InMemoryContextStoreOptions {
  /** Conversations idle longer than this are dropped (default: 12 hours) */
  maxAgeMs?: number;
  logger?: Logger;
}

/**
 * InMemoryContextStore - local conversation memory
 *
 * - In-memory storage only (no database)
 * - Idle conversations expire after maxAgeMs
 * - Copies in and out, so a half-finished turn never leaks into shared state
 */
export class InMemoryContextStore implements ContextStore {
  private memory = new Map<string, ConversationContext>();
  private readonly maxAgeMs: number;
  private readonly logger: Logger;

  constructor(options: InMemoryContextStoreOptions = {}) {
    this.maxAgeMs = options.maxAgeMs ?? 12 * 60 * 60 * 1000;
    this.logger = options.logger ?? defaultLogger;
  }

  get(conversationId: string): ConversationContext | null {
    const stored = this.memory.get(conversationId);
    return stored ? structuredClone(stored) : null;
  }

  getOrCreate(conversationId: string, now: number = Date.now()): ConversationContext {
    this.cleanup(now);
    const existing = this.get(conversationId);
    if (existing) {
      return existing;
    }
    this.logger.debug(`🧠 New conversation context: ${conversationId}`);
    return createConversationContext(conversationId, now);
  }

  save(context: ConversationContext, now: number = Date.now()): void {
    const copy = structuredClone(context);
    copy.updatedAt = now;
    this.memory.set(context.conversationId, copy);
  }

  reset(conversationId: string): void {
    if (this.memory.delete(conversationId)) {
      this.logger.info(`🧹 Conversation reset: ${conversationId}`);
    }
  }

  /** Number of live conversations */
  size(): number {
    return this.memory.size;
  }

  /**
   * Drop conversations idle longer than maxAgeMs
   */
  cleanup(now: number = Date.now()): number {
    let removed = 0;
    for (const [conversationId, context] of this.memory.entries()) {
      if (now - context.updatedAt > this.maxAgeMs) {
        this.memory.delete(conversationId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug(`🧹 Cleaned up ${removed} idle conversations`);
    }
    return removed;
  }
}
