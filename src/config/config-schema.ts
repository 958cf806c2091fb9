import { z } from 'zod';

/**
 * Config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const positiveMs = z.number().int().positive();

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Schema of data/config/chipwatch.json.
 *
 * Every field is optional in the file; the defaults below fill the gaps,
 * so parsing `{}` yields the complete default configuration.
 */
export const configFileSchema = z
  .object({
    version: z.number().int().positive().default(CONFIG_FILE_VERSION),

    reader: z
      .object({
        /** Serial device, or "simulate" for the built-in simulator */
        port: z.string().min(1).default('/dev/ttyUSB0'),
        baudRate: z.number().int().positive().default(9600),
        /** Reader bus address, two hex digits */
        address: z.string().regex(/^[0-9A-Fa-f]{2}$/).default('01'),
        /** Output format code */
        format: z.string().regex(/^[0-9A-Za-z]$/).default('D'),
        pollIntervalMs: positiveMs.default(500),
        pollTimeoutMs: positiveMs.default(1000),
        errorBackoffMs: positiveMs.default(5000),
        maxErrorBackoffMs: positiveMs.default(60_000),
        /** Tags the simulator reports */
        simulatedTagIds: z.array(z.string().regex(/^\d{15}$/)).default(['900263003496836']),
      })
      .strict()
      .default({}),

    pipeline: z
      .object({
        dedupeMs: z.number().int().nonnegative().default(2000),
        batchDelayMs: positiveMs.default(60_000),
        maxDetectionsPerBatch: z.number().int().positive().default(5),
        recentWindowMs: positiveMs.default(30 * 60_000),
        retentionMs: positiveMs.default(7 * 24 * 60 * 60_000),
        /** Flush pending batches on shutdown instead of discarding them */
        drainOnShutdown: z.boolean().default(true),
        /** Tags reported as lost (notification header changes) */
        lostTagIds: z.array(z.string()).default([]),
        notifyOn: z.enum(['all', 'lost_only']).default('all'),
        /** IANA zone for notification timestamps, or "local" */
        timezone: z.string().min(1).default('local'),
        /** Ledger persistence interval */
        ledgerFlushMs: positiveMs.default(30_000),
      })
      .strict()
      .default({}),

    selector: z
      .object({
        goodEnoughScore: z.number().default(14),
        keywords: z
          .array(z.string())
          .default(['cat', 'dog', 'pet', 'kitten', 'puppy', 'animal', 'fur', 'tail', 'whiskers']),
        classifierTimeoutMs: positiveMs.default(30_000),
      })
      .strict()
      .default({}),

    delivery: z
      .object({
        baseDelayMs: positiveMs.default(30_000),
        factor: z.number().min(1).default(2),
        maxDelayMs: positiveMs.default(30 * 60_000),
        maxAttempts: z.number().int().positive().default(8),
        retryPollMs: positiveMs.default(30_000),
        sendTimeoutMs: positiveMs.default(30_000),
        shutdownTimeoutMs: positiveMs.default(10_000),
        deadLetterLimit: z.number().int().positive().default(500),
        /** Queued notifications per chat that get folded into one digest; 0 disables */
        digestThreshold: z.number().int().nonnegative().default(10),
      })
      .strict()
      .default({}),

    capture: z
      .object({
        /** argv template; `{output}` and `{camera}` are substituted */
        command: z
          .array(z.string())
          .min(1)
          .default(['rpicam-still', '--camera', '{camera}', '-n', '-t', '500', '-o', '{output}']),
        /** Empty list disables capture */
        cameras: z.array(z.number().int().nonnegative()).default([0]),
        photoDir: z.string().min(1).default('data/photos'),
        timeoutMs: positiveMs.default(15_000),
      })
      .strict()
      .default({}),

    upload: z
      .object({
        /** rclone remote name; empty disables uploads */
        rcloneRemote: z.string().default(''),
        rclonePath: z.string().default('rfid_photos'),
      })
      .strict()
      .default({}),

    classifier: z
      .object({
        /** Prefer OPENAI_API_KEY in the environment */
        apiKey: z.string().optional(),
        model: z.string().min(1).default('gpt-4o-mini'),
        baseUrl: z.string().url().optional(),
        maxOutputTokens: z.number().int().positive().default(150),
      })
      .strict()
      .default({}),

    telegram: z
      .object({
        /** Prefer TELEGRAM_BOT_TOKEN in the environment */
        botToken: z.string().optional(),
        chatIds: z.array(z.string()).default([]),
      })
      .strict()
      .default({}),

    logging: z
      .object({
        level: logLevelSchema.default('info'),
        pretty: z.boolean().default(true),
        logDir: z.string().min(1).default('data/logs'),
        maxFiles: z.number().int().positive().default(10),
      })
      .strict()
      .default({}),

    paths: z
      .object({
        data: z.string().min(1).default('data'),
        config: z.string().min(1).default('data/config'),
        state: z.string().min(1).default('data/state'),
        logs: z.string().min(1).default('data/logs'),
        backup: z.string().min(1).default('data/backup'),
      })
      .strict()
      .default({}),
  })
  .strict();

/**
 * Config file as written by the user.
 */
export type ConfigFile = z.input<typeof configFileSchema>;

/**
 * Fully resolved configuration used by the container.
 */
export type MergedConfig = z.output<typeof configFileSchema>;

/**
 * Defaults for every field.
 */
export const DEFAULT_CONFIG: MergedConfig = configFileSchema.parse({});
