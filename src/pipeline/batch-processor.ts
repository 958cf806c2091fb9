import type { Clock } from '../ports/index.js';
import type {
  Detection,
  DeliveryOutcome,
  DeliveryRequest,
  EncounterStats,
  Logger,
} from '../types/index.js';
import type { DeliveryPipeline } from '../delivery/index.js';
import type { BestOfBatchSelector } from './selector.js';
import type { EncounterLedger } from './encounter-ledger.js';
import type { FlushReason } from './batch-aggregator.js';
import { errorMessage } from '../core/errors.js';
import { formatNotification } from './notification-format.js';

export type NotifyOn = 'all' | 'lost_only';

export interface BatchProcessorConfig {
  recentWindowMs: number;
  lostTagIds: readonly string[];
  notifyOn: NotifyOn;
  timezone: string;
  /** rclone remote path (e.g. "gdrive:rfid_photos"); null disables uploads */
  uploadDestination: string | null;
  /** One notification per recipient */
  notificationDestinations: readonly string[];
}

export interface BatchProcessorDeps {
  selector: BestOfBatchSelector;
  ledger: EncounterLedger;
  delivery: DeliveryPipeline;
  clock: Clock;
  logger: Logger;
}

/**
 * What happened to one flushed batch.
 */
export interface BatchReport {
  tagId: string;
  reason: FlushReason;
  best: Detection;
  stats: EncounterStats;
  uploads: DeliveryOutcome[];
  notifications: DeliveryOutcome[];
  /** Notification text, or null when notifications were skipped */
  message: string | null;
}

/**
 * Flush handler: turns a closed batch into uploads and notifications.
 */
export class BatchProcessor {
  private readonly config: BatchProcessorConfig;
  private readonly deps: BatchProcessorDeps;
  private readonly logger: Logger;
  private readonly lost: ReadonlySet<string>;

  constructor(config: BatchProcessorConfig, deps: BatchProcessorDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'batch-processor' });
    this.lost = new Set(config.lostTagIds);
  }

  /** Bound handler for the aggregator */
  readonly handle = async (
    tagId: string,
    detections: Detection[],
    reason: FlushReason
  ): Promise<void> => {
    await this.process(tagId, detections, reason);
  };

  async process(tagId: string, detections: Detection[], reason: FlushReason): Promise<BatchReport> {
    const selection = await this.deps.selector.select(detections);
    const stats = this.deps.ledger.stats(tagId, this.deps.clock.now(), this.config.recentWindowMs);
    const description = selection.best.classification?.description;
    if (description) {
      this.deps.ledger.addNote(tagId, selection.best.timestamp, description);
    }

    const { uploads, links } =
      this.config.uploadDestination === null
        ? { uploads: [], links: [] }
        : await this.uploadArtifacts(
            this.config.uploadDestination,
            detections,
            new Set(selection.best.artifactPaths)
          );

    const best: Detection =
      links.length > 0 ? { ...selection.best, artifactLinks: links } : selection.best;
    const lost = this.lost.has(tagId);

    if (this.config.notifyOn === 'lost_only' && !lost) {
      this.logger.debug({ tagId }, 'Tag not on lost list, notification skipped');
      return { tagId, reason, best, stats, uploads, notifications: [], message: null };
    }

    const message = formatNotification({
      detection: best,
      stats,
      recentWindowMs: this.config.recentWindowMs,
      batchSize: detections.length,
      lost,
      timezone: this.config.timezone,
    });

    const notifications: DeliveryOutcome[] = [];
    for (const destination of this.config.notificationDestinations) {
      const outcome = await this.safeDeliver({
        kind: 'notification',
        destination,
        payload: { tagId, text: message },
      });
      if (outcome) {
        notifications.push(outcome);
      }
    }

    this.logger.info(
      {
        tagId,
        detections: detections.length,
        recentCount: stats.recentCount,
        totalCount: stats.totalCount,
        uploads: uploads.length,
        notifications: notifications.length,
        lost,
      },
      'Batch processed'
    );

    return { tagId, reason, best, stats, uploads, notifications, message };
  }

  /**
   * Upload every artifact of the batch. Links are kept for the selected
   * detection's artifacts only.
   */
  private async uploadArtifacts(
    destination: string,
    detections: readonly Detection[],
    bestArtifacts: ReadonlySet<string>
  ): Promise<{ uploads: DeliveryOutcome[]; links: string[] }> {
    const uploads: DeliveryOutcome[] = [];
    const links: string[] = [];
    for (const detection of detections) {
      for (const artifactPath of detection.artifactPaths) {
        const outcome = await this.safeDeliver({
          kind: 'upload',
          destination,
          payload: { artifactPath },
        });
        if (!outcome) continue;
        uploads.push(outcome);
        if (bestArtifacts.has(artifactPath) && outcome.status === 'delivered' && outcome.link) {
          links.push(outcome.link);
        }
      }
    }
    return { uploads, links };
  }

  private async safeDeliver(request: DeliveryRequest): Promise<DeliveryOutcome | null> {
    try {
      return await this.deps.delivery.deliver(request);
    } catch (error) {
      this.logger.error(
        { kind: request.kind, destination: request.destination, error: errorMessage(error) },
        'Delivery could not be recorded'
      );
      return null;
    }
  }
}

export function createBatchProcessor(
  config: BatchProcessorConfig,
  deps: BatchProcessorDeps
): BatchProcessor {
  return new BatchProcessor(config, deps);
}
