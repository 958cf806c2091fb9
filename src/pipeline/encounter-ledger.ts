import { z } from 'zod';
import type { EncounterStats } from '../types/index.js';

/**
 * Description of the photo chosen for one batch.
 */
export interface EncounterNote {
  tagId: string;
  timestamp: number;
  description: string;
}

/**
 * One retained read.
 */
export interface Encounter {
  tagId: string;
  timestamp: number;
}

/**
 * Plain-JSON form of the ledger, as persisted under the `encounters` key.
 */
export interface EncounterSnapshot {
  version: 1;
  tags: Record<string, number[]>;
  notes: EncounterNote[];
}

/** Notes kept, newest last */
export const MAX_NOTES = 200;

/**
 * Rolling per-tag encounter history.
 *
 * Timestamps per tag are kept non-decreasing: an out-of-order write is
 * clamped to the last recorded value. Entries older than `retentionMs`
 * are purged on every write and read, and empty tags are removed.
 */
export class EncounterLedger {
  private readonly history = new Map<string, number[]>();
  private notes: EncounterNote[] = [];

  constructor(private readonly retentionMs: number) {
    if (!Number.isFinite(retentionMs) || retentionMs <= 0) {
      throw new RangeError(`retentionMs must be positive, got ${String(retentionMs)}`);
    }
  }

  record(tagId: string, timestamp: number): void {
    let entries = this.history.get(tagId);
    if (!entries) {
      entries = [];
      this.history.set(tagId, entries);
    }

    const last = entries[entries.length - 1];
    entries.push(last !== undefined && timestamp < last ? last : timestamp);
    this.purge(tagId, entries, timestamp);
  }

  /**
   * Keep the classifier's description of a batch for digests.
   */
  addNote(tagId: string, timestamp: number, description: string): void {
    const text = description.trim();
    if (text.length === 0) {
      return;
    }
    this.notes.push({ tagId, timestamp, description: text });
    this.notes.sort((a, b) => a.timestamp - b.timestamp);
    this.purgeNotes(timestamp);
    if (this.notes.length > MAX_NOTES) {
      this.notes.splice(0, this.notes.length - MAX_NOTES);
    }
  }

  /**
   * Every retained read in `[from, to)`, oldest first.
   */
  encountersBetween(from: number, to: number): Encounter[] {
    const result: Encounter[] = [];
    for (const [tagId, entries] of this.history) {
      for (const timestamp of entries) {
        if (timestamp >= from && timestamp < to) {
          result.push({ tagId, timestamp });
        }
      }
    }
    return result.sort((a, b) => a.timestamp - b.timestamp || a.tagId.localeCompare(b.tagId));
  }

  /** Notes in `[from, to)`, oldest first */
  notesBetween(from: number, to: number): EncounterNote[] {
    return this.notes.filter((note) => note.timestamp >= from && note.timestamp < to);
  }

  stats(tagId: string, now: number, recentWindowMs: number): EncounterStats {
    const entries = this.history.get(tagId);
    if (!entries) {
      return { recentCount: 0, totalCount: 0 };
    }

    this.purge(tagId, entries, now);
    const windowStart = now - recentWindowMs;
    let recentCount = 0;
    for (const ts of entries) {
      if (ts >= windowStart && ts <= now) {
        recentCount++;
      }
    }
    return { recentCount, totalCount: entries.length };
  }

  /** Number of tags with retained history */
  get tagCount(): number {
    return this.history.size;
  }

  snapshot(): EncounterSnapshot {
    const tags: Record<string, number[]> = {};
    for (const [tagId, entries] of this.history) {
      tags[tagId] = [...entries];
    }
    return { version: 1, tags, notes: this.notes.map((note) => ({ ...note })) };
  }

  /**
   * Replace the ledger contents from persisted data.
   * Anything that is not a sorted list of finite numbers is dropped.
   */
  restore(snapshot: unknown, now: number): number {
    this.history.clear();
    this.notes = [];
    if (!isSnapshot(snapshot)) {
      return 0;
    }

    const cutoff = now - this.retentionMs;
    for (const [tagId, value] of Object.entries(snapshot.tags)) {
      if (!Array.isArray(value)) continue;
      const entries: number[] = [];
      let sorted = true;
      for (const ts of value) {
        if (typeof ts !== 'number' || !Number.isFinite(ts)) {
          sorted = false;
          break;
        }
        const last = entries[entries.length - 1];
        if (last !== undefined && ts < last) {
          sorted = false;
          break;
        }
        entries.push(ts);
      }
      if (!sorted) continue;

      const kept = entries.filter((ts) => ts >= cutoff);
      if (kept.length > 0) {
        this.history.set(tagId, kept);
      }
    }

    if ('notes' in snapshot && Array.isArray(snapshot.notes)) {
      const notes: EncounterNote[] = [];
      for (const entry of snapshot.notes) {
        const parsed = noteSchema.safeParse(entry);
        if (parsed.success && parsed.data.timestamp >= cutoff) {
          notes.push(parsed.data);
        }
      }
      this.notes = notes
        .sort((a, b) => a.timestamp - b.timestamp)
        .slice(-MAX_NOTES);
    }
    return this.history.size;
  }

  private purgeNotes(now: number): void {
    const cutoff = now - this.retentionMs;
    const firstKept = this.notes.findIndex((note) => note.timestamp >= cutoff);
    if (firstKept === -1) {
      this.notes = [];
    } else if (firstKept > 0) {
      this.notes.splice(0, firstKept);
    }
  }

  private purge(tagId: string, entries: number[], now: number): void {
    const cutoff = now - this.retentionMs;
    let drop = 0;
    while (drop < entries.length) {
      const ts = entries[drop];
      if (ts === undefined || ts >= cutoff) break;
      drop++;
    }
    if (drop > 0) {
      entries.splice(0, drop);
    }
    if (entries.length === 0) {
      this.history.delete(tagId);
    }
  }
}

const noteSchema = z.object({
  tagId: z.string(),
  timestamp: z.number().finite(),
  description: z.string(),
});

function isSnapshot(value: unknown): value is { tags: Record<string, unknown> } {
  if (typeof value !== 'object' || value === null || !('tags' in value)) {
    return false;
  }
  const tags = value.tags;
  return typeof tags === 'object' && tags !== null && !Array.isArray(tags);
}
