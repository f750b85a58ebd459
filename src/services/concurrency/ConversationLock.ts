/**
 * Per-conversation lock: only one in-flight turn per conversation at a time.
 * A second turn for a busy conversation is rejected immediately; other
 * conversations are not blocked.
 */

export type RunExclusiveResult<T> =
  | { status: 'accepted'; result: T }
  | { status: 'rejected'; reason: 'busy' };

export class ConversationLock {
  private busy = new Set<string>();

  isBusy(conversationId: string): boolean {
    return this.busy.has(conversationId);
  }

  /**
   * Lock is always released in finally, including on thrown errors.
   */
  async runExclusive<T>(conversationId: string, fn: () => Promise<T>): Promise<RunExclusiveResult<T>> {
    if (this.busy.has(conversationId)) {
      return { status: 'rejected', reason: 'busy' };
    }
    this.busy.add(conversationId);
    try {
      const result = await fn();
      return { status: 'accepted', result };
    } finally {
      this.busy.delete(conversationId);
    }
  }
}
