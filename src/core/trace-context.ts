/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based trace context. Each batch flush and each retry
 * pass runs under its own trace id, so every log line emitted while
 * selecting, uploading and notifying for one batch can be grepped out
 * together. The logger picks the context up through a pino mixin.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace ID, e.g. "batch_ab12cd34" */
  traceId: string;
  /** Tag the traced work belongs to, when there is one */
  tagId?: string;
  /** Current span ID for this operation */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit this context automatically.
 *
 * @example
 * ```ts
 * await withTraceContext(createTraceContext('batch', { tagId }), async () => {
 *   logger.info('Flushing batch'); // carries traceId and tagId
 * });
 * ```
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current trace context (if any).
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Create a new root trace context.
 *
 * @param prefix - Kind of work, becomes the trace id prefix ("batch", "retry")
 */
export function createTraceContext(
  prefix: string,
  options: { tagId?: string | undefined } = {}
): TraceContext {
  const id = randomUUID().slice(0, 8);
  const result: TraceContext = {
    traceId: `${prefix}_${id}`,
    spanId: `root_${id}`,
  };
  if (options.tagId !== undefined) {
    result.tagId = options.tagId;
  }
  return result;
}
