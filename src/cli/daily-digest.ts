/**
 * Send the daily pet activity report.
 *
 * Summarizes the encounter ledger for one local day (today unless
 * `--date` names another) and sends it to every configured Telegram chat.
 * A failed send is queued like any other notification. Meant for an
 * evening cron entry.
 */

import 'dotenv/config';

import { Command } from 'commander';
import { createContainerAsync } from '../core/container.js';
import { createDailyDigest, resolveDigestDay } from '../pipeline/index.js';

interface DailyDigestOptions {
  date?: string;
  dryRun?: boolean;
}

async function run(options: DailyDigestOptions): Promise<number> {
  const container = await createContainerAsync();
  const { logger, config, clock, ledger, delivery } = container;

  try {
    const day = resolveDigestDay(options.date, config.pipeline.timezone, clock.now());
    if (!day) {
      logger.error({ date: options.date }, 'Invalid date, expected YYYY-MM-DD');
      return 1;
    }

    const text = createDailyDigest(ledger, day);
    if (options.dryRun) {
      process.stdout.write(`${text}\n`);
      return 0;
    }

    if (config.telegram.chatIds.length === 0) {
      logger.warn('No Telegram chats configured, daily digest not sent');
      return 1;
    }

    let failed = 0;
    for (const chatId of config.telegram.chatIds) {
      const outcome = await delivery.deliver({
        kind: 'notification',
        destination: chatId,
        payload: { tagId: 'digest', text },
      });
      if (outcome.status === 'failed_permanently') {
        failed++;
      }
      logger.info({ chatId, status: outcome.status }, 'Daily digest sent');
    }
    return failed > 0 ? 2 : 0;
  } finally {
    await container.shutdown();
  }
}

const program = new Command()
  .name('chipwatch-daily-digest')
  .description('Send the daily pet activity report')
  .option('--date <date>', 'day to report on (YYYY-MM-DD), defaults to today')
  .option('--dry-run', 'print the report instead of sending it')
  .action(async (options: DailyDigestOptions) => {
    process.exitCode = await run(options);
  });

program.parseAsync().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('daily-digest failed:', error);
  process.exit(1);
});
