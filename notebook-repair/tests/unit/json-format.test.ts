import { describe, expect, test } from '@jest/globals';
import type { RepairFailure } from '../../../types.js';
import { NotebookRepairError } from '../../src/errors.js';
import { parseNotebookJson, serializeNotebook } from '../../src/json-format.js';
import { toPlainValue } from '../../src/json-tree.js';

function parseFailure(text: string): RepairFailure | undefined {
  try {
    parseNotebookJson(text);
  } catch (error) {
    if (error instanceof NotebookRepairError) return error.toFailure();
    throw error;
  }
  return undefined;
}

const roundTrip = (text: string) => serializeNotebook(parseNotebookJson(text));

describe('parseNotebookJson', () => {
  test('parses valid JSON', () => {
    expect(toPlainValue(parseNotebookJson('{"cells": [], "metadata": {"a": [1, 2, true, null, "x"]}}'))).toEqual({
      cells: [],
      metadata: { a: [1, 2, true, null, 'x'] }
    });
  });

  test('keeps member order, integer-like keys included', () => {
    expect(parseNotebookJson('{"z": 1, "10": 2, "a": 3}')).toEqual({
      type: 'object',
      members: [
        { key: 'z', value: { type: 'number', raw: '1' } },
        { key: '10', value: { type: 'number', raw: '2' } },
        { key: 'a', value: { type: 'number', raw: '3' } }
      ]
    });
  });

  test('keeps the source text of numbers', () => {
    expect(parseNotebookJson('[1.0, -0, 1E+5, 12345678901234567891]')).toEqual({
      type: 'array',
      items: [
        { type: 'number', raw: '1.0' },
        { type: 'number', raw: '-0' },
        { type: 'number', raw: '1E+5' },
        { type: 'number', raw: '12345678901234567891' }
      ]
    });
  });

  test('accepts NaN, Infinity and -Infinity', () => {
    const document = parseNotebookJson('[NaN, Infinity, -Infinity]');

    expect(document).toEqual({
      type: 'array',
      items: [
        { type: 'number', raw: 'NaN' },
        { type: 'number', raw: 'Infinity' },
        { type: 'number', raw: '-Infinity' }
      ]
    });
    expect(toPlainValue(document)).toEqual([NaN, Infinity, -Infinity]);
  });

  test('raises a ParseError with a stable code', () => {
    let caught: unknown;
    try {
      parseNotebookJson('{"cells": [');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NotebookRepairError);
    if (caught instanceof NotebookRepairError) {
      expect(caught.kind).toBe('ParseError');
      expect(caught.code).toBe('E-REPAIR-PARSE');
    }
  });

  test.each([
    ['', 'Unexpected end of input', 1, 1],
    ['{"cells": [', 'Unexpected end of input', 1, 12],
    ['{\n  "a": 1,\n}', 'Expected a property name in double quotes', 3, 1],
    ['{"a" 1}', "Expected ':' after a property name", 1, 6],
    ['{"a": 1 "b": 2}', "Expected ',' or '}' after a property value", 1, 9],
    ['[1 2]', "Expected ',' or ']' after an array element", 1, 4],
    ['[1,]', 'Expected a value', 1, 4],
    ['{"a": tru}', "Unexpected token 'tru'", 1, 7],
    ['[- Infinity]', "Unexpected token '-'", 1, 2],
    ['[-NaN]', "Unexpected token '-NaN'", 1, 2],
    ['{} []', 'Unexpected content after the document', 1, 4],
    ['// note\n{}', 'Comments are not allowed', 1, 1],
    ['{"a": "x\ny"}', 'Unterminated string', 1, 7],
    ['["\\x"]', 'Invalid escape character in string', 1, 2],
    ['[1.]', 'Incomplete number', 1, 2]
  ])('reports %j as "%s" at line %i, column %i', (text, detail, line, column) => {
    expect(parseFailure(text)).toEqual({
      kind: 'ParseError',
      code: 'E-REPAIR-PARSE',
      message: `Invalid JSON in notebook: ${detail} (line ${line}, column ${column})`,
      line,
      column
    });
  });

  test('limits nesting depth', () => {
    const text = `${'['.repeat(1001)}${']'.repeat(1001)}`;

    expect(parseFailure(text)?.message).toBe(
      'Invalid JSON in notebook: Nesting is deeper than 1000 levels (line 1, column 1001)'
    );
  });
});

describe('serializeNotebook', () => {
  test('uses two-space indentation and one trailing newline', () => {
    expect(roundTrip('{"metadata": {}, "cells": []}')).toBe('{\n  "metadata": {},\n  "cells": []\n}\n');
  });

  test('writes non-ASCII characters literally', () => {
    expect(roundTrip('{"title": "Caf\\u00e9 ☕ 数据"}')).toBe('{\n  "title": "Café ☕ 数据"\n}\n');
  });

  test('escapes quotes, backslashes and control characters', () => {
    expect(roundTrip('{"s": "a\\"b\\\\c\\n\\t"}')).toBe('{\n  "s": "a\\"b\\\\c\\n\\t"\n}\n');
  });

  test('keeps key order and number text from the parsed source', () => {
    expect(roundTrip('{"nbformat": 4, "cells": [], "metadata": {"z": 1, "10": 2.50, "a": -0.0}}')).toBe(
      '{\n  "nbformat": 4,\n  "cells": [],\n  "metadata": {\n    "z": 1,\n    "10": 2.50,\n    "a": -0.0\n  }\n}\n'
    );
  });

  test('indents nested arrays', () => {
    expect(roundTrip('[[1, [2]], {}]')).toBe('[\n  [\n    1,\n    [\n      2\n    ]\n  ],\n  {}\n]\n');
  });
});
