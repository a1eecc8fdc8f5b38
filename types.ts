export type JsonObject = Record<string, unknown>;

/**
 * Parsed JSON that keeps what a plain value loses: member order (including
 * integer-like keys) and the source text of every number.
 */
export type JsonNode = JsonObjectNode | JsonArrayNode | JsonScalarNode;

export interface JsonMember {
  key: string;
  value: JsonNode;
}

export interface JsonObjectNode {
  type: 'object';
  members: JsonMember[];
}

export interface JsonArrayNode {
  type: 'array';
  items: JsonNode[];
}

export type JsonScalarNode =
  | { type: 'string'; value: string }
  | { type: 'number'; raw: string } // also NaN, Infinity, -Infinity
  | { type: 'boolean'; value: boolean }
  | { type: 'null' };

export interface NotebookCell {
  cell_type?: string;
  metadata?: JsonObject;
  [key: string]: unknown;
}

export interface NotebookDocument {
  metadata?: JsonObject;
  cells?: NotebookCell[];
  nbformat?: number;
  nbformat_minor?: number;
  [key: string]: unknown;
}

export type WidgetStateCheck = 'valid' | 'not-a-mapping' | 'missing-state';

export type WidgetRemoval =
  | { location: 'notebook'; reason: Exclude<WidgetStateCheck, 'valid'> }
  | { location: 'cell'; cellIndex: number; reason: Exclude<WidgetStateCheck, 'valid'> };

export type RepairErrorKind =
  | 'NotFound'
  | 'ParseError'
  | 'InvalidStructure'
  | 'ReadIOError'
  | 'BackupIOError'
  | 'WriteIOError'
  | 'RestoreIOError';

export interface RepairFailure {
  kind: RepairErrorKind;
  code: string;
  message: string;
  line?: number;
  column?: number;
}

export interface RepairResult {
  success: boolean;
  changed: boolean;
  filePath: string;
  removals: WidgetRemoval[];
  backupPath?: string;
  restored?: boolean;
  error?: RepairFailure;
  timeMs: number;
}
