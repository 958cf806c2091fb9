/**
 * Chipwatch - pet microchip reader daemon
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainerAsync();
  const { logger, config, orchestrator } = container;

  logger.info(
    {
      port: config.reader.port,
      address: config.reader.address,
      batchDelayMs: config.pipeline.batchDelayMs,
      dedupeMs: config.pipeline.dedupeMs,
      lostTags: config.pipeline.lostTagIds.length,
    },
    'Chipwatch starting...'
  );

  orchestrator.start();
}

async function shutdown(exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown(1);
});

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
