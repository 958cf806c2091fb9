/**
 * Pipeline Error Types
 *
 * Typed error classes for the reader, delivery and configuration paths.
 * The `retryable` flag drives backoff decisions: transient failures are
 * retried, terminal ones drop the event or the delivery item.
 */

/**
 * Error codes for classification in logs.
 */
export type PipelineErrorCode =
  | 'READER_IO'
  | 'FRAME_CODEC'
  | 'CLASSIFIER'
  | 'INVALID_TRANSITION'
  | 'AGGREGATOR_CLOSED'
  | 'CONFIG';

/**
 * Base pipeline error class.
 */
export class PipelineError extends Error {
  readonly retryable: boolean;

  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Serial link failure (port missing, write error, port closed under us).
 * Always retryable: the reader comes back when the cable does.
 */
export class ReaderError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'READER_IO', { retryable: true, cause });
    this.name = 'ReaderError';
  }
}

/**
 * Poll command could not be built from the configured address/format.
 */
export class FrameCodecError extends PipelineError {
  constructor(message: string) {
    super(message, 'FRAME_CODEC');
    this.name = 'FrameCodecError';
  }
}

/**
 * Classifier call failed. Callers degrade to "no description".
 */
export class ClassifierError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CLASSIFIER', { retryable: true, cause });
    this.name = 'ClassifierError';
  }
}

/**
 * A delivery item was asked to move backwards in its lifecycle.
 */
export class InvalidTransitionError extends PipelineError {
  constructor(
    public readonly itemId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Delivery item ${itemId}: invalid transition ${from} -> ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Detection offered after shutdown began.
 */
export class AggregatorClosedError extends PipelineError {
  constructor(tagId: string) {
    super(`Batch aggregator is closed, rejected detection for ${tagId}`, 'AGGREGATOR_CLOSED');
    this.name = 'AggregatorClosedError';
  }
}

/**
 * Configuration file or environment value is invalid.
 */
export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Render an unknown thrown value for logs.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
