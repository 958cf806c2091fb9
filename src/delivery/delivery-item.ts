import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { DeliveryItem, DeliveryRequest, DeliveryStatus } from '../types/index.js';
import { InvalidTransitionError } from '../core/errors.js';

const ALLOWED_TRANSITIONS: Record<DeliveryStatus, readonly DeliveryStatus[]> = {
  pending: ['in_flight'],
  in_flight: ['delivered', 'failed_permanently'],
  delivered: [],
  failed_permanently: [],
};

/**
 * Move an item forward in its lifecycle.
 * @throws InvalidTransitionError for anything but pending -> in_flight -> terminal
 */
export function transition(item: DeliveryItem, to: DeliveryStatus): void {
  if (!ALLOWED_TRANSITIONS[item.status].includes(to)) {
    throw new InvalidTransitionError(item.id, item.status, to);
  }
  item.status = to;
}

export function isTerminal(status: DeliveryStatus): boolean {
  return status === 'delivered' || status === 'failed_permanently';
}

/**
 * Create a fresh `pending` item for a request.
 */
export function createDeliveryItem(
  request: DeliveryRequest,
  now: number,
  id: string = randomUUID()
): DeliveryItem {
  const base = {
    id,
    destination: request.destination,
    attemptCount: 0,
    status: 'pending' as const,
    createdAt: now,
    nextAttemptAt: now,
  };
  return request.kind === 'upload'
    ? { ...base, kind: 'upload', payload: { ...request.payload } }
    : { ...base, kind: 'notification', payload: { ...request.payload } };
}

const baseShape = {
  id: z.string().min(1),
  destination: z.string(),
  attemptCount: z.number().int().nonnegative(),
  status: z.enum(['pending', 'in_flight', 'delivered', 'failed_permanently']),
  createdAt: z.number(),
  nextAttemptAt: z.number(),
  lastError: z.string().optional(),
};

const deliveryItemSchema = z.discriminatedUnion('kind', [
  z.object({
    ...baseShape,
    kind: z.literal('upload'),
    payload: z.object({
      artifactPath: z.string().min(1),
      backupPath: z.string().optional(),
    }),
  }),
  z.object({
    ...baseShape,
    kind: z.literal('notification'),
    payload: z.object({
      tagId: z.string(),
      text: z.string(),
    }),
  }),
]);

/**
 * Validate persisted items. Entries that do not parse are returned
 * separately so the caller can log them.
 */
export function parseDeliveryItems(data: unknown): { items: DeliveryItem[]; invalid: number } {
  if (!Array.isArray(data)) {
    return { items: [], invalid: data === null ? 0 : 1 };
  }

  const items: DeliveryItem[] = [];
  let invalid = 0;
  for (const entry of data) {
    const parsed = deliveryItemSchema.safeParse(entry);
    if (parsed.success) {
      items.push(parsed.data);
    } else {
      invalid++;
    }
  }
  return { items, invalid };
}
