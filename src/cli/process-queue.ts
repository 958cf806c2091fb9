/**
 * Process the delivery backlog once and exit.
 *
 * Runs a forced retry pass: every queued upload and notification is
 * attempted now, regardless of its backoff schedule. Useful after the
 * network comes back, or from cron on a box where the daemon is not
 * running. The daemon rereads the manifest, so it will not resend what this
 * run delivered, but the two writers are not locked against each other.
 */

import 'dotenv/config';

import { createContainerAsync } from '../core/container.js';

async function main(): Promise<number> {
  const container = await createContainerAsync();
  const { logger, delivery } = container;

  try {
    const backlog = await delivery.getBacklog();
    logger.info({ queued: backlog.length }, 'Processing delivery backlog');

    const result = await delivery.runOnce(true);
    const remaining = await delivery.getBacklog();

    logger.info({ ...result, remaining: remaining.length }, 'Backlog pass complete');
    return result.failed > 0 ? 2 : 0;
  } finally {
    await container.shutdown();
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('process-queue failed:', error);
    process.exit(1);
  });
