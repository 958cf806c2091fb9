import type { DeliveryItem, TransportResult } from '../types/index.js';

/**
 * Transport Port - moves one delivery item to its destination.
 *
 * Implementations report failures as values; a rejected promise is
 * treated as a retryable failure by the pipeline.
 */
export interface TransportPort {
  readonly name: string;
  send(item: DeliveryItem, signal: AbortSignal): Promise<TransportResult>;
}
