import type { RepairErrorKind, RepairFailure } from '../../types.js';

export const ERROR_CODES: Record<RepairErrorKind, string> = {
  NotFound: 'E-REPAIR-NOT-FOUND',
  ParseError: 'E-REPAIR-PARSE',
  InvalidStructure: 'E-REPAIR-STRUCTURE',
  ReadIOError: 'E-REPAIR-READ',
  BackupIOError: 'E-REPAIR-BACKUP',
  WriteIOError: 'E-REPAIR-WRITE',
  RestoreIOError: 'E-REPAIR-RESTORE'
};

/**
 * Failure raised by a single repair step. The repairer catches it and
 * returns it as part of the result instead of letting it reach the caller.
 */
export class NotebookRepairError extends Error {
  readonly code: string;

  constructor(
    readonly kind: RepairErrorKind,
    message: string,
    readonly details: { line?: number; column?: number; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'NotebookRepairError';
    this.code = ERROR_CODES[kind];
  }

  toFailure(): RepairFailure {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      ...(this.details.line !== undefined ? { line: this.details.line } : {}),
      ...(this.details.column !== undefined ? { column: this.details.column } : {})
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
