import { join } from 'node:path';
import type { CapturePort, ClassifierPort, Clock, ReaderLink } from '../ports/index.js';
import type { Logger } from '../types/index.js';
import { createSystemClock } from '../ports/index.js';
import { type MergedConfig, createConfigLoader } from '../config/index.js';
import {
  type DeferredStorage,
  type Storage,
  createDeferredStorage,
  createJSONStorage,
} from '../storage/index.js';
import { createLogger } from './logger.js';
import { createCircuitBreaker } from './circuit-breaker.js';
import { type Orchestrator, createOrchestrator, ENCOUNTERS_KEY } from './orchestrator.js';
import { SerialReaderLink } from '../reader/serial-reader-link.js';
import { SimulatedReaderLink } from '../reader/simulated-reader-link.js';
import {
  type BatchAggregator,
  type BatchProcessor,
  Deduplicator,
  EncounterLedger,
  createBatchAggregator,
  createBatchProcessor,
  createBacklogDigest,
  createBestOfBatchSelector,
} from '../pipeline/index.js';
import {
  type DeliveryPipeline,
  type DeliveryTransports,
  createBackupStore,
  createDeliveryPipeline,
} from '../delivery/index.js';
import {
  CommandCapture,
  NoopCapture,
  TelegramNotify,
  createRcloneUpload,
  createVisionClassifier,
} from '../adapters/index.js';

/**
 * Replacements for the container's defaults (tests, tools).
 */
export interface ContainerOverrides {
  /** Directory holding chipwatch.json (default: data/config, or $DATA_PATH/config) */
  configPath?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  /** Adjust the loaded configuration before anything is built */
  configure?: ((config: MergedConfig) => void) | undefined;
  clock?: Clock | undefined;
  logger?: Logger | undefined;
  reader?: ReaderLink | undefined;
  capture?: CapturePort | undefined;
  classifier?: ClassifierPort | undefined;
  transports?: Partial<DeliveryTransports> | undefined;
}

/**
 * Application container with every component wired.
 */
export interface Container {
  logger: Logger;
  config: MergedConfig;
  clock: Clock;
  orchestrator: Orchestrator;
  aggregator: BatchAggregator;
  processor: BatchProcessor;
  ledger: EncounterLedger;
  delivery: DeliveryPipeline;
  /** Durable state (manifest, dead letters) */
  storage: Storage;
  /** Write-batched state (encounter ledger) */
  ledgerStorage: DeferredStorage;
  /** Stop the pipeline and flush state. Idempotent. */
  shutdown: () => Promise<void>;
}

/**
 * Create and wire the application.
 *
 * - Loads configuration (env > chipwatch.json > defaults)
 * - Creates logger, storage, adapters and the pipeline
 * - Restores the encounter ledger and the delivery manifest
 */
export async function createContainerAsync(overrides: ContainerOverrides = {}): Promise<Container> {
  const env = overrides.env ?? process.env;
  const dataPath = env['DATA_PATH'];
  const loader = createConfigLoader(
    overrides.configPath ?? (dataPath ? join(dataPath, 'config') : 'data/config'),
    env
  );
  const config = await loader.load();
  overrides.configure?.(config);

  const logger: Logger =
    overrides.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });
  for (const warning of loader.getWarnings()) {
    logger.warn(warning);
  }
  logger.info({ readerPort: config.reader.port }, 'Loaded configuration');

  const clock = overrides.clock ?? createSystemClock();

  // Storage
  const storage = createJSONStorage(config.paths.state, { logger });
  const ledgerStorage = createDeferredStorage(storage, logger, {
    flushIntervalMs: config.pipeline.ledgerFlushMs,
  });
  logger.info({ statePath: config.paths.state }, 'Storage initialized');

  // Adapters
  const reader: ReaderLink =
    overrides.reader ??
    (config.reader.port === 'simulate'
      ? new SimulatedReaderLink(clock, logger, {
          tagIds: config.reader.simulatedTagIds,
          address: config.reader.address,
        })
      : new SerialReaderLink(
          { path: config.reader.port, baudRate: config.reader.baudRate },
          clock,
          logger
        ));

  const capture: CapturePort =
    overrides.capture ??
    (config.capture.cameras.length > 0
      ? new CommandCapture(
          {
            command: config.capture.command,
            cameras: config.capture.cameras,
            photoDir: config.capture.photoDir,
            timeoutMs: config.capture.timeoutMs,
          },
          clock,
          logger
        )
      : new NoopCapture());

  const classifier: ClassifierPort =
    overrides.classifier ??
    createVisionClassifier(
      {
        apiKey: config.classifier.apiKey,
        model: config.classifier.model,
        baseUrl: config.classifier.baseUrl,
        maxOutputTokens: config.classifier.maxOutputTokens,
      },
      logger
    );

  const botToken = config.telegram.botToken;
  const notificationDestinations = botToken ? config.telegram.chatIds : [];
  if (!botToken || config.telegram.chatIds.length === 0) {
    logger.warn('Telegram not configured, notifications disabled');
  }

  const transports: DeliveryTransports = {
    upload: overrides.transports?.upload ?? createRcloneUpload(logger),
    notification:
      overrides.transports?.notification ??
      new TelegramNotify(
        { botToken: botToken ?? '' },
        createCircuitBreaker({
          name: 'telegram',
          maxFailures: 3,
          resetTimeout: 60_000,
          timeout: config.delivery.sendTimeoutMs,
          logger,
          clock,
        }),
        logger
      ),
  };

  const uploadDestination = config.upload.rcloneRemote
    ? `${config.upload.rcloneRemote}:${config.upload.rclonePath}`
    : null;
  if (uploadDestination === null) {
    logger.warn('No rclone remote configured, photos stay local');
  }

  // Pipeline
  const delivery = createDeliveryPipeline(
    {
      retry: {
        baseDelayMs: config.delivery.baseDelayMs,
        factor: config.delivery.factor,
        maxDelayMs: config.delivery.maxDelayMs,
        maxAttempts: config.delivery.maxAttempts,
      },
      retryPollMs: config.delivery.retryPollMs,
      sendTimeoutMs: config.delivery.sendTimeoutMs,
      deadLetterLimit: config.delivery.deadLetterLimit,
      digestThreshold: config.delivery.digestThreshold,
    },
    {
      transports,
      storage,
      backups: createBackupStore(config.paths.backup, logger),
      clock,
      logger,
      backlogDigest: createBacklogDigest,
    }
  );

  const ledger = new EncounterLedger(config.pipeline.retentionMs);
  const restoredTags = ledger.restore(await ledgerStorage.load(ENCOUNTERS_KEY), clock.now());
  logger.info({ tags: restoredTags }, 'Encounter ledger restored');
  ledgerStorage.startAutoFlush();

  const selector = createBestOfBatchSelector(
    { goodEnoughScore: config.selector.goodEnoughScore, keywords: config.selector.keywords },
    classifier,
    createCircuitBreaker({
      name: 'classifier',
      maxFailures: 3,
      resetTimeout: 60_000,
      timeout: config.selector.classifierTimeoutMs,
      logger,
      clock,
    }),
    logger
  );

  const processor = createBatchProcessor(
    {
      recentWindowMs: config.pipeline.recentWindowMs,
      lostTagIds: config.pipeline.lostTagIds,
      notifyOn: config.pipeline.notifyOn,
      timezone: config.pipeline.timezone,
      uploadDestination,
      notificationDestinations,
    },
    { selector, ledger, delivery, clock, logger }
  );

  const aggregator = createBatchAggregator(
    {
      batchDelayMs: config.pipeline.batchDelayMs,
      maxDetectionsPerBatch: config.pipeline.maxDetectionsPerBatch,
    },
    clock,
    processor.handle,
    logger
  );

  const orchestrator = createOrchestrator(
    {
      address: config.reader.address,
      format: config.reader.format,
      pollIntervalMs: config.reader.pollIntervalMs,
      pollTimeoutMs: config.reader.pollTimeoutMs,
      errorBackoffMs: config.reader.errorBackoffMs,
      maxErrorBackoffMs: config.reader.maxErrorBackoffMs,
      drainOnShutdown: config.pipeline.drainOnShutdown,
      shutdownTimeoutMs: config.delivery.shutdownTimeoutMs,
      pruneIntervalMs: 60_000,
    },
    {
      reader,
      deduplicator: new Deduplicator(config.pipeline.dedupeMs),
      ledger,
      aggregator,
      capture,
      delivery,
      clock,
      logger,
      ledgerStorage,
    }
  );

  const recovery = await delivery.recover();
  logger.info({ ...recovery }, 'Delivery queue ready');

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      logger.info('Shutting down...');
      if (orchestrator.getState() === 'idle') {
        await delivery.stop(config.delivery.shutdownTimeoutMs);
      } else {
        await orchestrator.stop();
      }
      await ledgerStorage.shutdown();
      logger.info('Shutdown complete');
    })();
    return stopping;
  };

  return {
    logger,
    config,
    clock,
    orchestrator,
    aggregator,
    processor,
    ledger,
    delivery,
    storage,
    ledgerStorage,
    shutdown,
  };
}
