/**
 * Delivery-side domain types.
 */

export type DeliveryKind = 'upload' | 'notification';

/**
 * Lifecycle of a delivery item. Transitions only move forward:
 * pending -> in_flight -> delivered | failed_permanently.
 * An item stays in_flight while it waits for a retry.
 */
export type DeliveryStatus = 'pending' | 'in_flight' | 'delivered' | 'failed_permanently';

export interface UploadPayload {
  /** Where the artifact was captured */
  artifactPath: string;
  /** Copy kept in the backup directory after a failed attempt */
  backupPath?: string | undefined;
}

export interface NotificationPayload {
  tagId: string;
  text: string;
}

interface DeliveryItemBase {
  id: string;
  /** Upload remote or notification recipient */
  destination: string;
  attemptCount: number;
  status: DeliveryStatus;
  /** Epoch ms */
  createdAt: number;
  /** Epoch ms of the next retry (meaningful while in_flight) */
  nextAttemptAt: number;
  lastError?: string | undefined;
}

export interface UploadItem extends DeliveryItemBase {
  kind: 'upload';
  payload: UploadPayload;
}

export interface NotificationItem extends DeliveryItemBase {
  kind: 'notification';
  payload: NotificationPayload;
}

export type DeliveryItem = UploadItem | NotificationItem;

/**
 * What a caller asks the pipeline to deliver.
 */
export type DeliveryRequest =
  | { kind: 'upload'; destination: string; payload: UploadPayload }
  | { kind: 'notification'; destination: string; payload: NotificationPayload };

/**
 * Transport outcome. Failures say whether another attempt can help.
 */
export type TransportResult =
  | { ok: true; link?: string | undefined }
  | { ok: false; retryable: boolean; error: string };

/**
 * What deliver() reports back to the caller.
 */
export type DeliveryOutcome =
  | { status: 'delivered'; itemId: string; link?: string | undefined }
  | { status: 'queued'; itemId: string; nextAttemptAt: number }
  | { status: 'failed_permanently'; itemId: string; error: string };
