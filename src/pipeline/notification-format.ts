import { DateTime } from 'luxon';
import type { Detection, EncounterStats } from '../types/index.js';

export interface NotificationContext {
  /** Selected detection of the batch */
  detection: Detection;
  stats: EncounterStats;
  recentWindowMs: number;
  /** Detections in the batch */
  batchSize: number;
  /** Tag is on the lost list */
  lost: boolean;
  /** IANA zone or "local" */
  timezone: string;
}

/**
 * Render the plain-text notification for one batch.
 */
export function formatNotification(ctx: NotificationContext): string {
  const { detection, stats } = ctx;
  const at = DateTime.fromMillis(detection.timestamp, { zone: ctx.timezone }).setLocale('en-US');

  const lines: string[] = [ctx.lost ? '🚨 LOST PET DETECTED' : '🐾 Pet detected'];

  const description = detection.classification?.description.trim();
  if (description) {
    lines.push(`Animal: ${description}`);
  }

  lines.push(
    `Chip: ${detection.tagId}`,
    `Date: ${at.toFormat('cccc, LLLL d, yyyy')}`,
    `Time: ${at.toFormat('HH:mm')}`,
    `Recent visits: ${String(stats.recentCount)} in ${String(Math.round(ctx.recentWindowMs / 60_000))} min`,
    `Total visits: ${String(stats.totalCount)}`
  );

  if (ctx.batchSize > 1) {
    lines.push(`Detections in batch: ${String(ctx.batchSize)}`);
  }

  const link = detection.artifactLinks?.[0];
  if (link) {
    lines.push(`Photo: ${link}`);
  }

  return lines.join('\n');
}
