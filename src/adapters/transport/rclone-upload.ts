import { basename } from 'node:path';
import type { TransportPort } from '../../ports/index.js';
import type { DeliveryItem, Logger, TransportResult } from '../../types/index.js';
import { runCommand, type CommandRunner } from '../command-runner.js';

export interface RcloneUploadConfig {
  /** Timeout for `rclone copyto` */
  copyTimeoutMs: number;
  /** Timeout for `rclone link` */
  linkTimeoutMs: number;
}

const DEFAULT_CONFIG: RcloneUploadConfig = {
  copyTimeoutMs: 30_000,
  linkTimeoutMs: 10_000,
};

/**
 * Uploads an artifact with rclone and asks for a shareable link.
 *
 * The item destination is an rclone remote path such as
 * `gdrive:rfid_photos`. The remote file keeps the captured file name even
 * when the upload is retried from a backup copy.
 */
export class RcloneUpload implements TransportPort {
  readonly name = 'rclone';
  private readonly config: RcloneUploadConfig;
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    config: Partial<RcloneUploadConfig> = {},
    private readonly run: CommandRunner = runCommand
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger.child({ component: 'rclone' });
  }

  async send(item: DeliveryItem, signal: AbortSignal): Promise<TransportResult> {
    if (item.kind !== 'upload') {
      return { ok: false, retryable: false, error: `rclone cannot deliver ${item.kind} items` };
    }

    const source = item.payload.backupPath ?? item.payload.artifactPath;
    const remotePath = `${item.destination.replace(/\/+$/, '')}/${basename(item.payload.artifactPath)}`;

    const copy = await this.run(['rclone', 'copyto', source, remotePath], {
      timeoutMs: this.config.copyTimeoutMs,
      signal,
    });
    if (!copy.ok) {
      return { ok: false, retryable: copy.retryable, error: `rclone copyto: ${copy.message}` };
    }

    const link = await this.run(['rclone', 'link', remotePath], {
      timeoutMs: this.config.linkTimeoutMs,
      signal,
    });
    if (!link.ok) {
      // The file is up; a missing link only costs the notification its URL
      this.logger.warn({ remotePath, error: link.message }, 'Uploaded but no link available');
      return { ok: true };
    }

    const url = link.stdout.trim();
    this.logger.debug({ remotePath, url }, 'Uploaded');
    return url.length > 0 ? { ok: true, link: url } : { ok: true };
  }
}

export function createRcloneUpload(
  logger: Logger,
  config?: Partial<RcloneUploadConfig>,
  run?: CommandRunner
): RcloneUpload {
  return new RcloneUpload(logger, config, run);
}
