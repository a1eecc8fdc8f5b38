import type { JsonArrayNode, JsonNode, JsonObjectNode } from '../../types.js';

export function isObjectNode(node: JsonNode | undefined): node is JsonObjectNode {
  return node?.type === 'object';
}

export function isArrayNode(node: JsonNode | undefined): node is JsonArrayNode {
  return node?.type === 'array';
}

/**
 * Value of a member. With duplicate keys the last one wins, as with
 * `JSON.parse`.
 */
export function memberValue(node: JsonObjectNode, key: string): JsonNode | undefined {
  for (let i = node.members.length - 1; i >= 0; i--) {
    if (node.members[i].key === key) return node.members[i].value;
  }
  return undefined;
}

/**
 * Drop every member named `key`. Returns how many were dropped.
 */
export function removeMember(node: JsonObjectNode, key: string): number {
  const before = node.members.length;
  node.members = node.members.filter(member => member.key !== key);
  return before - node.members.length;
}

/**
 * Plain JavaScript value for schema checks and inspection. Numbers go through
 * `Number`, so this is lossy and never written back.
 */
export function toPlainValue(node: JsonNode): unknown {
  switch (node.type) {
    case 'object':
      return Object.fromEntries(node.members.map(member => [member.key, toPlainValue(member.value)]));
    case 'array':
      return node.items.map(toPlainValue);
    case 'number':
      return Number(node.raw);
    case 'string':
    case 'boolean':
      return node.value;
    case 'null':
      return null;
  }
}
