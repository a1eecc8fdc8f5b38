import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import type { NotebookDocument } from '../../types.js';

export interface StructureIssue {
  path: string;
  message: string;
}

export interface StructureCheckResult {
  valid: boolean;
  issues: StructureIssue[];
}

/**
 * Only the containers the repair walks through are constrained; everything
 * else in a notebook is left to the format's own tooling.
 */
export const NOTEBOOK_SHAPE_SCHEMA = {
  $id: 'notebook-shape',
  type: 'object',
  properties: {
    metadata: { type: 'object' },
    cells: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          metadata: { type: 'object' }
        }
      }
    }
  }
} as const;

export class NotebookStructureValidator {
  private ajv: Ajv;
  private validateShape: ValidateFunction<NotebookDocument>;

  constructor() {
    this.ajv = new Ajv({
      strict: true,
      allErrors: true,
      removeAdditional: false,
      useDefaults: false,
      coerceTypes: false
    });
    this.validateShape = this.ajv.compile<NotebookDocument>(NOTEBOOK_SHAPE_SCHEMA);
  }

  check(value: unknown): StructureCheckResult {
    if (this.validateShape(value)) {
      return { valid: true, issues: [] };
    }
    return {
      valid: false,
      issues: this.formatAjvErrors(this.validateShape.errors ?? [])
    };
  }

  private formatAjvErrors(errors: ErrorObject[]): StructureIssue[] {
    return errors.map(error => ({
      path: error.instancePath || 'root',
      message: error.message || 'Unknown validation error'
    }));
  }
}
