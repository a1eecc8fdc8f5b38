import { ScanError, SyntaxKind, createScanner, type JSONScanner } from 'jsonc-parser';
import type { JsonMember, JsonNode } from '../../types.js';
import { NotebookRepairError } from './errors.js';

export interface SourceLocation {
  line: number;
  column: number;
}

const INDENT = '  ';
const MAX_DEPTH = 1000;
const NON_FINITE = new Set(['NaN', 'Infinity', '-Infinity']);

function scanErrorMessage(error: ScanError): string {
  switch (error) {
    case ScanError.UnexpectedEndOfString:
      return 'Unterminated string';
    case ScanError.UnexpectedEndOfNumber:
      return 'Incomplete number';
    case ScanError.UnexpectedEndOfComment:
      return 'Unterminated comment';
    case ScanError.InvalidUnicode:
      return 'Invalid unicode escape';
    case ScanError.InvalidEscapeCharacter:
      return 'Invalid escape character in string';
    case ScanError.InvalidCharacter:
      return 'Invalid control character in string';
    default:
      return 'Invalid token';
  }
}

/**
 * Reads strict JSON into a JsonNode tree over the jsonc-parser scanner.
 * Comments and trailing commas are rejected; NaN, Infinity and -Infinity are
 * accepted as numbers, as notebook writers emit them.
 */
class JsonTreeReader {
  private readonly scanner: JSONScanner;
  private depth = 0;

  constructor(text: string) {
    this.scanner = createScanner(text, false);
  }

  read(): JsonNode {
    this.next();
    const root = this.readValue();
    if (this.scanner.getToken() !== SyntaxKind.EOF) {
      this.fail('Unexpected content after the document');
    }
    return root;
  }

  /** Advance to the next significant token. */
  private next(): SyntaxKind {
    for (;;) {
      const token = this.scanner.scan();
      if (token === SyntaxKind.Trivia || token === SyntaxKind.LineBreakTrivia) continue;
      if (token === SyntaxKind.LineCommentTrivia || token === SyntaxKind.BlockCommentTrivia) {
        this.fail('Comments are not allowed');
      }
      const error = this.scanner.getTokenError();
      if (error !== ScanError.None) {
        this.fail(scanErrorMessage(error));
      }
      return token;
    }
  }

  // Each reader starts on the value's first token and stops on the token after it.
  private readValue(): JsonNode {
    const scanner = this.scanner;
    switch (scanner.getToken()) {
      case SyntaxKind.OpenBraceToken:
        return this.nested(() => this.readObject());
      case SyntaxKind.OpenBracketToken:
        return this.nested(() => this.readArray());
      case SyntaxKind.StringLiteral: {
        const value = scanner.getTokenValue();
        this.next();
        return { type: 'string', value };
      }
      case SyntaxKind.NumericLiteral: {
        const raw = scanner.getTokenValue();
        this.next();
        return { type: 'number', raw };
      }
      case SyntaxKind.TrueKeyword:
      case SyntaxKind.FalseKeyword: {
        const value = scanner.getToken() === SyntaxKind.TrueKeyword;
        this.next();
        return { type: 'boolean', value };
      }
      case SyntaxKind.NullKeyword:
        this.next();
        return { type: 'null' };
      case SyntaxKind.Unknown:
        return this.readNonFinite();
      default:
        return this.fail('Expected a value');
    }
  }

  private nested(read: () => JsonNode): JsonNode {
    if (++this.depth > MAX_DEPTH) {
      this.fail(`Nesting is deeper than ${MAX_DEPTH} levels`);
    }
    const node = read();
    this.depth--;
    return node;
  }

  private readObject(): JsonNode {
    const scanner = this.scanner;
    const members: JsonMember[] = [];

    if (this.next() === SyntaxKind.CloseBraceToken) {
      this.next();
      return { type: 'object', members };
    }

    for (;;) {
      if (scanner.getToken() !== SyntaxKind.StringLiteral) {
        this.fail('Expected a property name in double quotes');
      }
      const key = scanner.getTokenValue();
      if (this.next() !== SyntaxKind.ColonToken) {
        this.fail("Expected ':' after a property name");
      }
      this.next();
      members.push({ key, value: this.readValue() });

      const token = scanner.getToken();
      if (token === SyntaxKind.CloseBraceToken) {
        this.next();
        return { type: 'object', members };
      }
      if (token !== SyntaxKind.CommaToken) {
        this.fail("Expected ',' or '}' after a property value");
      }
      this.next();
    }
  }

  private readArray(): JsonNode {
    const items: JsonNode[] = [];

    if (this.next() === SyntaxKind.CloseBracketToken) {
      this.next();
      return { type: 'array', items };
    }

    for (;;) {
      items.push(this.readValue());

      const token = this.scanner.getToken();
      if (token === SyntaxKind.CloseBracketToken) {
        this.next();
        return { type: 'array', items };
      }
      if (token !== SyntaxKind.CommaToken) {
        this.fail("Expected ',' or ']' after an array element");
      }
      this.next();
    }
  }

  /** NaN, Infinity and -Infinity; the scanner splits the last into '-' and 'Infinity'. */
  private readNonFinite(): JsonNode {
    const scanner = this.scanner;
    const start = this.location();
    let raw = scanner.getTokenValue();

    if (raw === '-') {
      const end = scanner.getTokenOffset() + scanner.getTokenLength();
      const token = this.next();
      if (token === SyntaxKind.Unknown && scanner.getTokenOffset() === end) {
        raw += scanner.getTokenValue();
      }
    }

    if (!NON_FINITE.has(raw)) {
      this.fail(`Unexpected token '${raw}'`, start);
    }
    this.next();
    return { type: 'number', raw };
  }

  private location(): SourceLocation {
    return {
      line: this.scanner.getTokenStartLine() + 1,
      column: this.scanner.getTokenStartCharacter() + 1
    };
  }

  private fail(expected: string, at: SourceLocation = this.location()): never {
    const detail = this.scanner.getToken() === SyntaxKind.EOF ? 'Unexpected end of input' : expected;
    throw new NotebookRepairError(
      'ParseError',
      `Invalid JSON in notebook: ${detail} (line ${at.line}, column ${at.column})`,
      at
    );
  }
}

/**
 * Parse notebook text. Every ParseError carries the 1-based line and column
 * of the offending token.
 */
export function parseNotebookJson(text: string): JsonNode {
  return new JsonTreeReader(text).read();
}

function writeNode(node: JsonNode, indent: string, out: string[]): void {
  switch (node.type) {
    case 'object': {
      if (node.members.length === 0) {
        out.push('{}');
        return;
      }
      const inner = indent + INDENT;
      out.push('{\n');
      node.members.forEach((member, index) => {
        out.push(`${index > 0 ? ',\n' : ''}${inner}${JSON.stringify(member.key)}: `);
        writeNode(member.value, inner, out);
      });
      out.push(`\n${indent}}`);
      return;
    }
    case 'array': {
      if (node.items.length === 0) {
        out.push('[]');
        return;
      }
      const inner = indent + INDENT;
      out.push('[\n');
      node.items.forEach((item, index) => {
        out.push(`${index > 0 ? ',\n' : ''}${inner}`);
        writeNode(item, inner, out);
      });
      out.push(`\n${indent}]`);
      return;
    }
    case 'string':
      out.push(JSON.stringify(node.value));
      return;
    case 'number':
      out.push(node.raw);
      return;
    case 'boolean':
      out.push(String(node.value));
      return;
    case 'null':
      out.push('null');
      return;
  }
}

/**
 * Two-space indentation, non-ASCII text left as-is, one trailing newline.
 * Member order and number text come from the parsed source.
 */
export function serializeNotebook(document: JsonNode): string {
  const out: string[] = [];
  writeNode(document, '', out);
  out.push('\n');
  return out.join('');
}
