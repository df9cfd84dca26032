/**
 * Pending inbound subscription requests.
 *
 * Holds the bare JIDs that asked to see our presence and are waiting for
 * the user to approve or deny. Entries leave when the user answers, when
 * the peer settles it with subscribed/unsubscribed, or on session reset.
 *
 * @module Core/SubscriptionRequests
 */
export class SubscriptionRequests {
  private pending = new Set<string>()

  /** Record a request. A repeated request keeps a single entry. */
  recordRequest(bareJid: string): void {
    this.pending.add(bareJid)
  }

  /**
   * Remove a request.
   * @returns whether the JID was pending
   */
  resolve(bareJid: string): boolean {
    return this.pending.delete(bareJid)
  }

  has(bareJid: string): boolean {
    return this.pending.has(bareJid)
  }

  get size(): number {
    return this.pending.size
  }

  /**
   * Pending JIDs. The returned iterable can be walked any number of times;
   * each walk sees the set as it is at that moment. Order is unspecified.
   */
  listPending(): Iterable<string> {
    const pending = this.pending
    return {
      *[Symbol.iterator]() {
        yield* Array.from(pending)
      },
    }
  }

  clear(): void {
    this.pending.clear()
  }
}
