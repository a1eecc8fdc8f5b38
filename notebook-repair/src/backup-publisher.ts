/**
 * Backup Publisher
 * Copies a notebook aside before it is overwritten, writes the repaired
 * content, and puts the copy back if the write fails.
 */

import { constants } from 'node:fs';
import { NotebookRepairError, errorCode, errorMessage } from './errors.js';
import type { NotebookFileSystem } from './file-system.js';

export interface BackupConfig {
  collisionLimit: number;
  clock: () => Date;
}

export interface PublishOutcome {
  success: boolean;
  filePath: string;
  backupPath: string;
  size: number;
  writeError?: string;
  restored?: boolean;
  restoreError?: string;
}

const DEFAULT_BACKUP_CONFIG: BackupConfig = {
  collisionLimit: 99,
  clock: () => new Date()
};

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time, whole seconds: YYYYMMDD_HHMMSS.
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function backupPathFor(targetPath: string, date: Date, attempt = 0): string {
  const base = `${targetPath}.bak-${formatBackupTimestamp(date)}`;
  return attempt === 0 ? base : `${base}-${attempt}`;
}

export class BackupPublisher {
  private config: BackupConfig;

  constructor(
    private fileSystem: NotebookFileSystem,
    config: Partial<BackupConfig> = {}
  ) {
    this.config = { ...DEFAULT_BACKUP_CONFIG, ...config };
  }

  /**
   * Copy the file verbatim next to itself. Existing backups are never
   * overwritten: a second run within the same second gets a numbered name.
   */
  async createBackup(targetPath: string): Promise<string> {
    const now = this.config.clock();

    for (let attempt = 0; attempt <= this.config.collisionLimit; attempt++) {
      const backupPath = backupPathFor(targetPath, now, attempt);
      try {
        await this.fileSystem.copyFile(targetPath, backupPath, constants.COPYFILE_EXCL);
        return backupPath;
      } catch (error) {
        if (errorCode(error) === 'EEXIST') {
          continue;
        }
        throw new NotebookRepairError('BackupIOError', `Could not create backup: ${errorMessage(error)}`, {
          cause: error
        });
      }
    }

    throw new NotebookRepairError(
      'BackupIOError',
      `Could not create backup: ${this.config.collisionLimit + 1} backups already exist for ${formatBackupTimestamp(now)}`
    );
  }

  /**
   * Overwrite the target. On failure the backup is copied back over it and
   * the outcome records whether that worked.
   */
  async publish(targetPath: string, content: string, backupPath: string): Promise<PublishOutcome> {
    const size = Buffer.byteLength(content, 'utf8');

    try {
      await this.fileSystem.writeFile(targetPath, content);
      return { success: true, filePath: targetPath, backupPath, size };
    } catch (error) {
      const writeError = errorMessage(error);

      try {
        await this.fileSystem.copyFile(backupPath, targetPath);
        return { success: false, filePath: targetPath, backupPath, size, writeError, restored: true };
      } catch (restoreError) {
        return {
          success: false,
          filePath: targetPath,
          backupPath,
          size,
          writeError,
          restored: false,
          restoreError: errorMessage(restoreError)
        };
      }
    }
  }
}
