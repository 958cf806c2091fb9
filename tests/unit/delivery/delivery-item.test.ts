import { describe, it, expect } from 'vitest';
import {
  createDeliveryItem,
  isTerminal,
  parseDeliveryItems,
  transition,
} from '../../../src/delivery/delivery-item.js';
import { InvalidTransitionError } from '../../../src/core/errors.js';
import { createNotificationRequest, createUploadRequest } from '../../helpers/factories.js';

describe('delivery items', () => {
  it('creates a pending item due immediately', () => {
    const item = createDeliveryItem(createUploadRequest('/photos/a.jpg'), 1000, 'item-1');
    expect(item).toEqual({
      id: 'item-1',
      kind: 'upload',
      destination: 'remote:rfid_photos',
      payload: { artifactPath: '/photos/a.jpg' },
      attemptCount: 0,
      status: 'pending',
      createdAt: 1000,
      nextAttemptAt: 1000,
    });
  });

  it('moves forward through the lifecycle', () => {
    const item = createDeliveryItem(createNotificationRequest(), 0, 'item-1');
    transition(item, 'in_flight');
    transition(item, 'delivered');
    expect(item.status).toBe('delivered');
    expect(isTerminal(item.status)).toBe(true);
  });

  it.each([
    ['pending', 'delivered'],
    ['pending', 'failed_permanently'],
    ['in_flight', 'pending'],
    ['delivered', 'in_flight'],
    ['failed_permanently', 'in_flight'],
  ] as const)('refuses %s -> %s', (from, to) => {
    const item = createDeliveryItem(createNotificationRequest(), 0, 'item-1');
    item.status = from;
    expect(() => transition(item, to)).toThrow(InvalidTransitionError);
    expect(item.status).toBe(from);
  });

  describe('parseDeliveryItems', () => {
    it('keeps valid entries and counts the rest', () => {
      const valid = createDeliveryItem(createNotificationRequest(), 0, 'item-1');
      const result = parseDeliveryItems([valid, { id: 'x', kind: 'email' }, 42]);

      expect(result.items).toEqual([valid]);
      expect(result.invalid).toBe(2);
    });

    it('treats a missing manifest as empty', () => {
      expect(parseDeliveryItems(null)).toEqual({ items: [], invalid: 0 });
    });

    it('counts a non-array manifest as one invalid entry', () => {
      expect(parseDeliveryItems({ items: [] })).toEqual({ items: [], invalid: 1 });
    });
  });
});
