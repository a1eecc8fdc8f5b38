/**
 * Notebook Repairer
 * Removes `metadata.widgets` blocks that renderers cannot use, at the notebook
 * level and in every cell, then backs up and rewrites the file.
 */

import { TextDecoder } from 'node:util';
import type { JsonNode, RepairResult, WidgetRemoval } from '../../types.js';
import { BackupPublisher } from './backup-publisher.js';
import { NotebookRepairError, errorCode, errorMessage } from './errors.js';
import { nodeFileSystem, type NotebookFileSystem } from './file-system.js';
import { parseNotebookJson, serializeNotebook } from './json-format.js';
import { isArrayNode, isObjectNode, memberValue, removeMember, toPlainValue } from './json-tree.js';
import { RepairLogger } from './logger.js';
import { NotebookStructureValidator } from './structure-validator.js';
import { classifyWidgetState } from './widget-state-validator.js';

export interface RepairerOptions {
  fileSystem: NotebookFileSystem;
  logger: RepairLogger;
  clock: () => Date;
  maxFileSize: number;
  validateStructure: boolean;
  backupCollisionLimit: number;
}

const DEFAULT_MAX_FILE_SIZE = 200 * 1024 * 1024;

/**
 * Inspect one metadata owner and drop its widgets entry if it is unusable.
 */
function stripWidgets(owner: JsonNode): WidgetRemoval['reason'] | undefined {
  if (!isObjectNode(owner)) return undefined;

  const metadata = memberValue(owner, 'metadata');
  if (!isObjectNode(metadata)) return undefined;

  const widgets = memberValue(metadata, 'widgets');
  if (widgets === undefined) return undefined;

  const check = classifyWidgetState(toPlainValue(widgets));
  if (check === 'valid') return undefined;

  removeMember(metadata, 'widgets');
  return check;
}

/**
 * Remove malformed widgets blocks in place. Values that are not shaped like a
 * notebook are skipped. Removals are returned in document order.
 */
export function repairDocument(document: JsonNode): WidgetRemoval[] {
  const removals: WidgetRemoval[] = [];

  const notebookReason = stripWidgets(document);
  if (notebookReason) {
    removals.push({ location: 'notebook', reason: notebookReason });
  }

  const cells = isObjectNode(document) ? memberValue(document, 'cells') : undefined;
  if (isArrayNode(cells)) {
    cells.items.forEach((cell, cellIndex) => {
      const reason = stripWidgets(cell);
      if (reason) {
        removals.push({ location: 'cell', cellIndex, reason });
      }
    });
  }

  return removals;
}

export function describeRemoval(removal: WidgetRemoval): string {
  return removal.location === 'notebook'
    ? 'Removing malformed widgets metadata at notebook level'
    : `Removing malformed widgets metadata from cell ${removal.cellIndex}`;
}

export class NotebookRepairer {
  private options: RepairerOptions;
  private structureValidator = new NotebookStructureValidator();
  private backupPublisher: BackupPublisher;
  private decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(options: Partial<RepairerOptions> = {}) {
    this.options = {
      fileSystem: options.fileSystem ?? nodeFileSystem,
      logger: options.logger ?? new RepairLogger(),
      clock: options.clock ?? (() => new Date()),
      maxFileSize: options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
      validateStructure: options.validateStructure ?? true,
      backupCollisionLimit: options.backupCollisionLimit ?? 99
    };
    this.backupPublisher = new BackupPublisher(this.options.fileSystem, {
      clock: this.options.clock,
      collisionLimit: this.options.backupCollisionLimit
    });
  }

  /**
   * Run one repair pass over the file. Never rejects for I/O or content
   * problems: they come back as a failed result.
   */
  async repair(filePath: string): Promise<RepairResult> {
    const startTime = Date.now();
    const { logger } = this.options;
    let removals: WidgetRemoval[] = [];
    let backupPath: string | undefined;

    try {
      const document = await this.loadNotebook(filePath);

      removals = repairDocument(document);
      for (const removal of removals) {
        logger.info(describeRemoval(removal), { ...removal });
      }

      if (removals.length === 0) {
        logger.info(`No malformed widget metadata found in: ${filePath}`);
        return { success: true, changed: false, filePath, removals, timeMs: Date.now() - startTime };
      }

      backupPath = await this.backupPublisher.createBackup(filePath);
      logger.info(`Created backup: ${backupPath}`);

      const outcome = await this.backupPublisher.publish(filePath, serializeNotebook(document), backupPath);
      if (!outcome.success) {
        const writeError = new NotebookRepairError(
          'WriteIOError',
          `Could not write fixed notebook: ${outcome.writeError}`
        );
        logger.error(`Error: ${writeError.message}`);

        if (outcome.restored) {
          logger.warn('Restored from backup due to write error', { backupPath });
          return this.failure(filePath, startTime, writeError, removals, backupPath, true);
        }

        const restoreError = new NotebookRepairError(
          'RestoreIOError',
          `Could not restore from backup: ${outcome.restoreError}`
        );
        logger.error(`Error: ${restoreError.message}`, { backupPath });
        return this.failure(filePath, startTime, restoreError, removals, backupPath, false);
      }

      logger.info(`Successfully fixed: ${filePath}`, { bytes: outcome.size, removals: removals.length });
      return {
        success: true,
        changed: true,
        filePath,
        removals,
        backupPath,
        timeMs: Date.now() - startTime
      };
    } catch (error) {
      if (!(error instanceof NotebookRepairError)) {
        throw error;
      }
      logger.error(`Error: ${error.message}`, { code: error.code });
      return this.failure(filePath, startTime, error, removals, backupPath);
    }
  }

  private async loadNotebook(filePath: string): Promise<JsonNode> {
    const { fileSystem, logger, maxFileSize } = this.options;

    let size: number;
    try {
      ({ size } = await fileSystem.stat(filePath));
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new NotebookRepairError('NotFound', `File not found: ${filePath}`, { cause: error });
      }
      throw new NotebookRepairError('ReadIOError', `Could not read notebook: ${errorMessage(error)}`, {
        cause: error
      });
    }

    if (size > maxFileSize) {
      throw new NotebookRepairError(
        'ReadIOError',
        `Could not read notebook: file is ${size} bytes, limit is ${maxFileSize}`
      );
    }

    let bytes: Buffer;
    try {
      bytes = await fileSystem.readFile(filePath);
    } catch (error) {
      throw new NotebookRepairError('ReadIOError', `Could not read notebook: ${errorMessage(error)}`, {
        cause: error
      });
    }

    let text: string;
    try {
      text = this.decoder.decode(bytes);
    } catch (error) {
      throw new NotebookRepairError('ReadIOError', 'Could not read notebook: content is not valid UTF-8', {
        cause: error
      });
    }

    const document = parseNotebookJson(text);

    if (this.options.validateStructure) {
      const structure = this.structureValidator.check(toPlainValue(document));
      if (!structure.valid) {
        const details = structure.issues.map(issue => `${issue.path}: ${issue.message}`).join('; ');
        throw new NotebookRepairError('InvalidStructure', `Unexpected notebook structure: ${details}`);
      }
    }

    const cellList = isObjectNode(document) ? memberValue(document, 'cells') : undefined;
    const cells = isArrayNode(cellList) ? cellList.items.length : 0;
    logger.debug(`Loaded notebook: ${filePath}`, { bytes: size, cells });
    return document;
  }

  private failure(
    filePath: string,
    startTime: number,
    error: NotebookRepairError,
    removals: WidgetRemoval[],
    backupPath?: string,
    restored?: boolean
  ): RepairResult {
    return {
      success: false,
      changed: false,
      filePath,
      removals,
      ...(backupPath !== undefined ? { backupPath } : {}),
      ...(restored !== undefined ? { restored } : {}),
      error: error.toFailure(),
      timeMs: Date.now() - startTime
    };
  }
}

export async function repairNotebook(
  filePath: string,
  options: Partial<RepairerOptions> = {}
): Promise<RepairResult> {
  return new NotebookRepairer(options).repair(filePath);
}
