export { Deduplicator } from './deduplicator.js';
export {
  BatchAggregator,
  createBatchAggregator,
  type BatchAggregatorConfig,
  type DiscardedBatch,
  type FlushHandler,
  type FlushReason,
} from './batch-aggregator.js';
export {
  BestOfBatchSelector,
  createBestOfBatchSelector,
  scoreClassification,
  type ScoredDetection,
  type SelectionResult,
  type SelectorConfig,
} from './selector.js';
export {
  EncounterLedger,
  type Encounter,
  type EncounterNote,
  type EncounterSnapshot,
} from './encounter-ledger.js';
export {
  summarizeActivity,
  formatDailyDigest,
  summarizeBacklog,
  formatBacklogDigest,
  createBacklogDigest,
  resolveDigestDay,
  createDailyDigest,
  type ActivitySummary,
  type BacklogSummary,
  type TagCount,
} from './digest.js';
export { formatNotification, type NotificationContext } from './notification-format.js';
export {
  BatchProcessor,
  createBatchProcessor,
  type BatchProcessorConfig,
  type BatchProcessorDeps,
  type BatchReport,
  type NotifyOn,
} from './batch-processor.js';
