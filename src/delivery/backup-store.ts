import { access, copyFile, mkdir, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from '../types/index.js';

/**
 * Local copies of artifacts whose upload failed.
 *
 * Capture directories may be cleaned up independently; the retry worker
 * only ever uploads from here.
 */
export class BackupStore {
  private readonly logger: Logger;

  constructor(
    private readonly backupDir: string,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'backup-store' });
  }

  /**
   * Copy an artifact into the backup directory.
   * @returns Path of the copy
   */
  async store(artifactPath: string, itemId: string): Promise<string> {
    await mkdir(this.backupDir, { recursive: true });
    const target = join(this.backupDir, `${itemId}-${basename(artifactPath)}`);
    await copyFile(artifactPath, target);
    this.logger.debug({ artifactPath, target }, 'Artifact backed up');
    return target;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove a backup copy. Missing files are fine.
   */
  async remove(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
}

export function createBackupStore(backupDir: string, logger: Logger): BackupStore {
  return new BackupStore(backupDir, logger);
}
