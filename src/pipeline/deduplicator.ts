/**
 * Suppresses repeat reads of the same tag inside a short window.
 *
 * A tag sitting on the antenna answers every poll; without this the
 * pipeline would see two reads per second per animal.
 */
export class Deduplicator {
  private readonly lastSeen = new Map<string, number>();

  constructor(private readonly dedupeMs: number) {
    if (!Number.isFinite(dedupeMs) || dedupeMs < 0) {
      throw new RangeError(`dedupeMs must be a non-negative number, got ${String(dedupeMs)}`);
    }
  }

  /**
   * True when `tagId` was seen less than `dedupeMs` before `now`.
   * The latest timestamp is recorded either way, so a tag that keeps
   * answering stays suppressed.
   */
  isDuplicate(tagId: string, now: number): boolean {
    const previous = this.lastSeen.get(tagId);
    this.lastSeen.set(tagId, now);
    return previous !== undefined && now - previous < this.dedupeMs;
  }

  /**
   * Drop entries older than the window. Returns how many were removed.
   */
  prune(now: number): number {
    let removed = 0;
    for (const [tagId, seenAt] of this.lastSeen) {
      if (now - seenAt >= this.dedupeMs) {
        this.lastSeen.delete(tagId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.lastSeen.size;
  }
}
