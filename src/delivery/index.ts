export {
  DeliveryPipeline,
  createDeliveryPipeline,
  MANIFEST_KEY,
  DEAD_LETTER_KEY,
  DEFAULT_DELIVERY_CONFIG,
  type DeliveryPipelineConfig,
  type DeliveryPipelineDeps,
  type DeliveryTransports,
  type RetryPassResult,
  type RecoveryResult,
} from './delivery-pipeline.js';
export { RetryPolicy, createRetryPolicy, DEFAULT_RETRY_POLICY, type RetryPolicyConfig } from './retry-policy.js';
export { BackupStore, createBackupStore } from './backup-store.js';
export { createDeliveryItem, transition, isTerminal, parseDeliveryItems } from './delivery-item.js';
