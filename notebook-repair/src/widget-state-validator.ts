import type { JsonObject, WidgetStateCheck } from '../../types.js';

export function isMapping(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Renderers rebuild widgets from `metadata.widgets.state`, so a widgets block
 * is usable only when it is a mapping that owns a `state` key. The contents
 * of `state` are not inspected.
 */
export function classifyWidgetState(value: unknown): WidgetStateCheck {
  if (!isMapping(value)) {
    return 'not-a-mapping';
  }
  return Object.prototype.hasOwnProperty.call(value, 'state') ? 'valid' : 'missing-state';
}

export function isValidWidgetState(value: unknown): boolean {
  return classifyWidgetState(value) === 'valid';
}
