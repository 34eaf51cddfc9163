import { mkdir, readFile, writeFile, access, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Base directory for storage files */
  basePath: string;
  /** Keep the previous version as `<key>.backup.json` (default: true) */
  createBackup?: boolean;
  logger?: Logger;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * JSON file-based storage.
 *
 * Writes go to a temp file and are renamed into place, so a crash mid-write
 * leaves the previous version intact. A file that no longer parses is
 * replaced by its backup when one exists.
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger?.child({ component: 'json-storage' });
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
    try {
      const content = await readFile(this.getPath(key), 'utf-8');
      const data: unknown = JSON.parse(content);
      return data;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      if (error instanceof SyntaxError) {
        const backup = await this.loadBackup(key);
        if (backup !== null) {
          this.logger?.warn({ key }, 'Corrupted file, loaded from backup');
          return backup;
        }
      }
      throw error;
    }
  }

  private async loadBackup(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.getBackupPath(key), 'utf-8');
      const data: unknown = JSON.parse(content);
      return data;
    } catch {
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
        await rename(path, this.getBackupPath(key));
      } catch (error) {
        this.logger?.warn({ key, error: String(error) }, 'Backup before save failed');
      }
    }

    await rename(tempPath, path);
  }

  private async exists(key: string): Promise<boolean> {
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
