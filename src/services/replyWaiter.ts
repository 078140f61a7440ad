interface PendingReply {
  resolve: (text: string | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * Lets a handler wait for the next message one user sends in one channel,
 * e.g. the reason after a `#nosale`. Waits resolve with null on timeout.
 * Messages rejected by `accepts` pass through and leave the wait open.
 */
export class ReplyWaiter {
  private pending = new Map<string, PendingReply>();
  private accepts: (text: string) => boolean;

  constructor(accepts: (text: string) => boolean = () => true) {
    this.accepts = accepts;
  }

  private static key(actorId: string, channelId: string): string {
    return `${channelId}:${actorId}`;
  }

  waitFor(actorId: string, channelId: string, timeoutMs: number): Promise<string | null> {
    const key = ReplyWaiter.key(actorId, channelId);
    this.settle(key, null);

    return new Promise(resolve => {
      const timer = setTimeout(() => this.settle(key, null), timeoutMs);
      this.pending.set(key, { resolve, timer });
    });
  }

  /**
   * Hand a message to a waiting handler. Returns true when it was consumed.
   */
  deliver(actorId: string, channelId: string, text: string): boolean {
    if (!this.accepts(text)) return false;
    return this.settle(ReplyWaiter.key(actorId, channelId), text);
  }

  isWaiting(actorId: string, channelId: string): boolean {
    return this.pending.has(ReplyWaiter.key(actorId, channelId));
  }

  /**
   * Resolve every outstanding wait with null
   */
  cancelAll(): void {
    for (const key of [...this.pending.keys()]) {
      this.settle(key, null);
    }
  }

  private settle(key: string, text: string | null): boolean {
    const entry = this.pending.get(key);
    if (!entry) return false;
    clearTimeout(entry.timer);
    this.pending.delete(key);
    entry.resolve(text);
    return true;
  }
}
