import { mkdir, readFile, writeFile, unlink, access, rename, copyFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/index.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Directory holding one file per key */
  basePath: string;
  /** Keep the previous version as `<key>.backup.json` (default: true) */
  createBackup?: boolean;
  logger?: Logger | undefined;
}

/**
 * One JSON file per key.
 *
 * Writes go to `<key>.tmp.json` and are renamed over the real file, so a
 * crash mid-write leaves either the old or the new content. The previous
 * version is copied (never moved) to `<key>.backup.json`, so the real file
 * exists at every point of a save. A file that fails to parse falls back
 * to the previous version; a missing one to a finished temp file, then to
 * the previous version.
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger;
  }

  private getPath(key: string): string {
    return join(this.basePath, `${key}.json`);
  }

  private getBackupPath(key: string): string {
    return join(this.basePath, `${key}.backup.json`);
  }

  private getTempPath(key: string): string {
    return join(this.basePath, `${key}.tmp.json`);
  }

  async load(key: string): Promise<unknown> {
    const path = this.getPath(key);

    try {
      const content = await readFile(path, 'utf-8');
      return JSON.parse(content) as unknown;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return this.loadOrphaned(key);
      }

      if (error instanceof SyntaxError) {
        const backup = await this.loadBackup(key);
        if (backup !== null) {
          this.logger?.warn({ key, error: error.message }, 'Corrupted file, loaded previous version');
          return backup;
        }
      }

      throw error;
    }
  }

  private async loadBackup(key: string): Promise<unknown> {
    return this.readOptional(key, this.getBackupPath(key));
  }

  /**
   * The real file is gone: pick up what an interrupted save left behind.
   */
  private async loadOrphaned(key: string): Promise<unknown> {
    const pending = await this.readOptional(key, this.getTempPath(key));
    if (pending !== null) {
      this.logger?.warn({ key }, 'Missing file, loaded unfinished write');
      return pending;
    }

    const backup = await this.loadBackup(key);
    if (backup !== null) {
      this.logger?.warn({ key }, 'Missing file, loaded previous version');
    }
    return backup;
  }

  private async readOptional(key: string, filePath: string): Promise<unknown> {
    try {
      const content = await readFile(filePath, 'utf-8');
      return JSON.parse(content) as unknown;
    } catch (error) {
      this.logger?.debug({ key, filePath, error: String(error) }, 'No usable copy');
      return null;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    await mkdir(this.basePath, { recursive: true });

    const path = this.getPath(key);
    const tempPath = this.getTempPath(key);

    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

    if (this.createBackup && (await this.exists(key))) {
      try {
        await copyFile(path, this.getBackupPath(key));
      } catch (error) {
        // Best effort
        this.logger?.warn({ key, error: String(error) }, 'Failed to keep previous version');
      }
    }

    await rename(tempPath, path);
  }

  /**
   * Remove the key along with its previous version and any unfinished write.
   */
  async delete(key: string): Promise<boolean> {
    const removed = await this.unlinkIfPresent(this.getPath(key));
    await this.unlinkIfPresent(this.getBackupPath(key));
    await this.unlinkIfPresent(this.getTempPath(key));
    return removed;
  }

  private async unlinkIfPresent(filePath: string): Promise<boolean> {
    try {
      await unlink(filePath);
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.getPath(key));
      return true;
    } catch {
      return false;
    }
  }
}

export function createJSONStorage(
  basePath: string,
  options?: Omit<JSONStorageConfig, 'basePath'>
): JSONStorage {
  return new JSONStorage({ basePath, ...options });
}
