// Rule parser
//
// Turns rule source text into a Program:
// - 42, -7         → int
// - 3.5, 1e3       → float
// - "hello\n"      → string (escapes: \n \t \" \\)
// - time:second    → symbol (any other run of non-space, non-paren chars)
// - (f a b)        → list
// - ; comment      → ignored to end of line

import type { Node, Position, Program } from './ast.js';
import { formatPosition } from './ast.js';

export class ParseError extends Error {
  constructor(message: string, public readonly pos: Position) {
    super(`${formatPosition(pos)}: ${message}`);
    this.name = 'ParseError';
  }
}

type Token =
  | { type: 'lparen'; pos: Position }
  | { type: 'rparen'; pos: Position }
  | { type: 'string'; value: string; pos: Position }
  | { type: 'atom'; text: string; pos: Position };

const INT_RE = /^[-+]?\d+$/;
const FLOAT_RE = /^[-+]?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/;
const DELIMITERS = new Set(['(', ')', '"', ';']);

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function tokenize(file: string, input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  let column = 1;

  const here = (): Position => ({ file, line, column });
  const advance = (): string => {
    const ch = input.charAt(i++);
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
    return ch;
  };

  while (i < input.length) {
    const ch = input.charAt(i);

    if (isSpace(ch)) {
      advance();
      continue;
    }

    if (ch === ';') {
      while (i < input.length && input.charAt(i) !== '\n') advance();
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', pos: here() });
      advance();
      continue;
    }

    if (ch === '"') {
      const pos = here();
      advance();
      let value = '';
      while (i < input.length && input.charAt(i) !== '"') {
        const c = advance();
        if (c !== '\\') {
          value += c;
          continue;
        }
        if (i >= input.length) break;
        const escaped = advance();
        switch (escaped) {
          case 'n': value += '\n'; break;
          case 't': value += '\t'; break;
          case '"': value += '"'; break;
          case '\\': value += '\\'; break;
          default:
            throw new ParseError(`unknown escape sequence \\${escaped}`, pos);
        }
      }
      if (i >= input.length) {
        throw new ParseError('unterminated string', pos);
      }
      advance(); // closing quote
      tokens.push({ type: 'string', value, pos });
      continue;
    }

    const pos = here();
    let text = '';
    while (i < input.length) {
      const c = input.charAt(i);
      if (isSpace(c) || DELIMITERS.has(c)) break;
      text += advance();
    }
    tokens.push({ type: 'atom', text, pos });
  }

  return tokens;
}

function atom(text: string, pos: Position): Node {
  if (INT_RE.test(text)) {
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
      throw new ParseError(`integer literal out of range: ${text}`, pos);
    }
    return { type: 'int', value, pos };
  }
  if (FLOAT_RE.test(text)) {
    return { type: 'float', value: Number(text), pos };
  }
  return { type: 'symbol', name: text, pos };
}

/**
 * Parses a whole rule file.
 *
 * An empty file is a valid, empty program.
 */
export function parse(file: string, source: string): Program {
  const tokens = tokenize(file, source);
  let pos = 0;

  function parseNode(): Node {
    const token = tokens[pos++];
    if (token === undefined) {
      throw new ParseError('unexpected end of input', endPosition());
    }

    switch (token.type) {
      case 'string':
        return { type: 'string', value: token.value, pos: token.pos };
      case 'atom':
        return atom(token.text, token.pos);
      case 'rparen':
        throw new ParseError("unexpected ')'", token.pos);
      case 'lparen': {
        const items: Node[] = [];
        for (;;) {
          const next = tokens[pos];
          if (next === undefined) {
            throw new ParseError("missing ')'", token.pos);
          }
          if (next.type === 'rparen') {
            pos++;
            return { type: 'list', items, pos: token.pos };
          }
          items.push(parseNode());
        }
      }
    }
  }

  function endPosition(): Position {
    const lines = source.split('\n');
    const last = lines[lines.length - 1] ?? '';
    return { file, line: lines.length, column: last.length + 1 };
  }

  const body: Node[] = [];
  while (pos < tokens.length) {
    body.push(parseNode());
  }

  return { type: 'program', file, body };
}
