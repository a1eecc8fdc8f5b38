// Notebook repair module exports

export { NotebookRepairer, repairNotebook, repairDocument, describeRemoval } from './repairer.js';
export type { RepairerOptions } from './repairer.js';
export { isValidWidgetState, classifyWidgetState, isMapping } from './widget-state-validator.js';
export { NotebookStructureValidator, NOTEBOOK_SHAPE_SCHEMA } from './structure-validator.js';
export type { StructureCheckResult, StructureIssue } from './structure-validator.js';
export { BackupPublisher, backupPathFor, formatBackupTimestamp } from './backup-publisher.js';
export type { PublishOutcome } from './backup-publisher.js';
export { parseNotebookJson, serializeNotebook } from './json-format.js';
export type { SourceLocation } from './json-format.js';
export { isArrayNode, isObjectNode, memberValue, removeMember, toPlainValue } from './json-tree.js';
export { NotebookRepairError, ERROR_CODES } from './errors.js';
export { RepairLogger } from './logger.js';
export type { LogLevel, LogFormat, LogSink } from './logger.js';
export { nodeFileSystem } from './file-system.js';
export type { NotebookFileSystem } from './file-system.js';
export { runCli, parseArgs } from './cli.js';
export * from '../../types.js';
