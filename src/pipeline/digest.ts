import { DateTime, type Zone } from 'luxon';
import type { NotificationItem } from '../types/index.js';
import type { Encounter, EncounterLedger, EncounterNote } from './encounter-ledger.js';

/** Descriptions quoted in a daily digest */
export const DIGEST_NOTE_LIMIT = 10;

export interface TagCount {
  tagId: string;
  count: number;
}

/**
 * Activity over one period, as shown in the daily digest.
 */
export interface ActivitySummary {
  total: number;
  uniqueTags: number;
  /** Most active first; ties keep first-seen order */
  perTag: TagCount[];
  first: number | null;
  last: number | null;
  /** Local hour with the most reads (earliest on a tie) */
  peakHour: number | null;
  /** Reads per local hour, index 0-23 */
  hourly: number[];
  notes: EncounterNote[];
}

/**
 * Backlog of queued notifications for one recipient.
 */
export interface BacklogSummary {
  total: number;
  uniqueTags: number;
  /** Whole hours between the oldest and newest item, at least 1 */
  spanHours: number;
  mostActive: TagCount | null;
}

export function summarizeActivity(
  encounters: readonly Encounter[],
  notes: readonly EncounterNote[],
  zone: string | Zone
): ActivitySummary {
  const hourly = new Array<number>(24).fill(0);
  const counts = new Map<string, number>();
  let first: number | null = null;
  let last: number | null = null;

  for (const { tagId, timestamp } of encounters) {
    counts.set(tagId, (counts.get(tagId) ?? 0) + 1);
    const hour = DateTime.fromMillis(timestamp, { zone }).hour;
    hourly[hour] = (hourly[hour] ?? 0) + 1;
    first = first === null ? timestamp : Math.min(first, timestamp);
    last = last === null ? timestamp : Math.max(last, timestamp);
  }

  let peakHour: number | null = null;
  let peakCount = 0;
  for (let hour = 0; hour < hourly.length; hour++) {
    const count = hourly[hour] ?? 0;
    if (count > peakCount) {
      peakCount = count;
      peakHour = hour;
    }
  }

  const perTag = [...counts].map(([tagId, count]) => ({ tagId, count }));
  perTag.sort((a, b) => b.count - a.count);

  return {
    total: encounters.length,
    uniqueTags: counts.size,
    perTag,
    first,
    last,
    peakHour,
    hourly,
    notes: notes.slice(0, DIGEST_NOTE_LIMIT),
  };
}

/**
 * Render the daily report. `day` carries the zone the times are shown in.
 */
export function formatDailyDigest(summary: ActivitySummary, day: DateTime): string {
  const zone = day.zone;
  const time = (ms: number): string => DateTime.fromMillis(ms, { zone }).toFormat('HH:mm');
  const lines: string[] = [
    '🐾 Daily pet report',
    `Date: ${day.setLocale('en-US').toFormat('cccc, LLLL d, yyyy')}`,
  ];

  if (summary.total === 0) {
    lines.push('No pet activity detected.');
    return lines.join('\n');
  }

  lines.push(`Detections: ${String(summary.total)}`, `Pets: ${String(summary.uniqueTags)}`);
  if (summary.first !== null && summary.last !== null) {
    lines.push(`First activity: ${time(summary.first)}`, `Last activity: ${time(summary.last)}`);
  }
  if (summary.peakHour !== null) {
    lines.push(`Peak hour: ${hourLabel(summary.peakHour)}`);
  }

  lines.push('', 'Per pet:');
  for (const { tagId, count } of summary.perTag) {
    lines.push(`• ${shortTag(tagId, 8)}: ${String(count)}`);
  }

  lines.push('', 'Timeline:');
  summary.hourly.forEach((count, hour) => {
    if (count > 0) {
      lines.push(`${hourLabel(hour)} ${'█'.repeat(Math.min(count, 20))} (${String(count)})`);
    }
  });

  if (summary.notes.length > 0) {
    lines.push('', 'Seen:');
    for (const note of summary.notes) {
      lines.push(`• ${time(note.timestamp)} ${shortTag(note.tagId, 6)}: ${note.description}`);
    }
  }

  return lines.join('\n');
}

/**
 * Start of the day to report on: `date` (YYYY-MM-DD) or today, in `timezone`.
 * Null when `date` is not a valid day.
 */
export function resolveDigestDay(
  date: string | undefined,
  timezone: string,
  now: number
): DateTime | null {
  const day =
    date === undefined
      ? DateTime.fromMillis(now, { zone: timezone })
      : DateTime.fromFormat(date, 'yyyy-MM-dd', { zone: timezone });
  return day.isValid ? day.startOf('day') : null;
}

/**
 * Daily report for the local day starting at `day`, from what the ledger holds.
 */
export function createDailyDigest(ledger: EncounterLedger, day: DateTime): string {
  const from = day.startOf('day');
  const to = from.plus({ days: 1 });
  const summary = summarizeActivity(
    ledger.encountersBetween(from.toMillis(), to.toMillis()),
    ledger.notesBetween(from.toMillis(), to.toMillis()),
    from.zone
  );
  return formatDailyDigest(summary, from);
}

export function summarizeBacklog(items: readonly NotificationItem[]): BacklogSummary {
  const counts = new Map<string, number>();
  let oldest = Infinity;
  let newest = -Infinity;
  for (const item of items) {
    counts.set(item.payload.tagId, (counts.get(item.payload.tagId) ?? 0) + 1);
    oldest = Math.min(oldest, item.createdAt);
    newest = Math.max(newest, item.createdAt);
  }

  let mostActive: TagCount | null = null;
  for (const [tagId, count] of counts) {
    if (mostActive === null || count > mostActive.count) {
      mostActive = { tagId, count };
    }
  }

  return {
    total: items.length,
    uniqueTags: counts.size,
    spanHours: items.length > 0 ? Math.max(1, Math.floor((newest - oldest) / 3_600_000)) : 0,
    mostActive,
  };
}

/**
 * One message standing in for a backlog of notifications.
 */
export function formatBacklogDigest(summary: BacklogSummary): string {
  const lines = [
    '🐾 Pet digest',
    `Detections: ${String(summary.total)} from ${String(summary.uniqueTags)} pets`,
  ];

  if (summary.spanHours > 0) {
    lines.push(`Period: ${formatSpan(summary.spanHours)}`);
  }
  if (summary.mostActive && summary.mostActive.count > 1) {
    lines.push(
      `Most active: ${shortTag(summary.mostActive.tagId, 6)} (${String(summary.mostActive.count)}x)`
    );
  }
  return lines.join('\n');
}

export function createBacklogDigest(items: readonly NotificationItem[]): string {
  return formatBacklogDigest(summarizeBacklog(items));
}

function formatSpan(hours: number): string {
  if (hours < 24) {
    return hours === 1 ? '1 hour' : `${String(hours)} hours`;
  }
  const days = Math.floor(hours / 24);
  const rest = hours % 24;
  return rest > 0 ? `${String(days)}d ${String(rest)}h` : `${String(days)} days`;
}

function hourLabel(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

function shortTag(tagId: string, digits: number): string {
  return tagId.length > digits ? `...${tagId.slice(-digits)}` : tagId;
}
