import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  level: pino.Level;
  /** Pretty console output (development) */
  pretty: boolean;
  /** Also write a per-run log file (default: true) */
  toFile: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  toFile: true,
};

const LOG_PREFIX = 'chipwatch-';

function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_PREFIX}${timestamp}.log`;
}

/**
 * Keep only the newest `maxFiles` non-empty run logs.
 */
function cleanupOldLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime) // newest first
      .slice(maxFiles),
  ];
  for (const file of stale) {
    fs.rmSync(file.path, { force: true });
  }
}

/**
 * Pino mixin that copies the active trace context into every entry.
 * Explicit fields in a log call take precedence.
 */
function createTraceMixin(): () => Record<string, unknown> {
  const TRACE_KEYS = ['traceId', 'tagId', 'spanId'] as const;

  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = {};
    for (const key of TRACE_KEYS) {
      if (ctx[key]) {
        result[key] = ctx[key];
      }
    }
    return result;
  };
}

/**
 * Create the process logger.
 *
 * Console output goes through pino-pretty in development and plain JSON
 * otherwise. Each run also gets its own file under `logDir`; old runs
 * beyond `maxFiles` are removed at startup.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty, toFile } = { ...DEFAULT_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [
    pretty
      ? { target: 'pino-pretty', level, options: { colorize: true } }
      : { target: 'pino/file', level, options: { destination: 1 } }, // stdout
  ];

  if (toFile) {
    fs.mkdirSync(logDir, { recursive: true });
    cleanupOldLogs(logDir, maxFiles);
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename()),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}
