import { describe, expect, it } from 'vitest';

import type { TokenKind } from '../src/frontend/lexer.js';
import { tokenize } from '../src/frontend/lexer.js';

function kinds(text: string): TokenKind[] {
  return tokenize(text).tokens.map((t) => t.kind);
}

describe('lexer', () => {
  it('classifies words and punctuation', () => {
    expect(kinds('a: push1 0x01 0o7 0b1 42; %x("s", selector("f()"))')).toEqual([
      'identifier',
      'colon',
      'identifier',
      'hex',
      'octal',
      'binary',
      'decimal',
      'separator',
      'percent',
      'identifier',
      'lparen',
      'string',
      'comma',
      'selector',
      'rparen',
      'eof',
    ]);
  });

  it('drops comments and whitespace but keeps newlines', () => {
    expect(kinds('stop # a comment ; not a separator\n\tpop\r\n')).toEqual([
      'identifier',
      'separator',
      'identifier',
      'separator',
      'eof',
    ]);
  });

  it('records offsets and payloads', () => {
    const [str, sel] = tokenize('"a b" selector("g(uint8)")').tokens;
    expect(str).toEqual({
      kind: 'string',
      text: '"a b"',
      value: 'a b',
      start: 0,
      end: 5,
      location: { line: 1, column: 1, offset: 0 },
    });
    expect(sel).toEqual({
      kind: 'selector',
      text: 'selector("g(uint8)")',
      value: 'g(uint8)',
      start: 6,
      end: 26,
      location: { line: 1, column: 7, offset: 6 },
    });
  });

  it('always ends with eof at the end of the text', () => {
    const { tokens, eof } = tokenize('stop');
    expect(tokens.at(-1)).toBe(eof);
    expect(eof).toEqual({
      kind: 'eof',
      text: '',
      value: '',
      start: 4,
      end: 4,
      location: { line: 1, column: 5, offset: 4 },
    });
  });
});

describe('token positions', () => {
  it('tracks line and column across newlines', () => {
    const locations = tokenize('ab\n  cd').tokens.map((t) => t.location);
    expect(locations).toEqual([
      { line: 1, column: 1, offset: 0 },
      { line: 1, column: 3, offset: 2 },
      { line: 2, column: 3, offset: 5 },
      { line: 2, column: 5, offset: 7 },
    ]);
  });

  it('counts CR as part of the line it ends', () => {
    const [, , b] = tokenize('a\r\nb').tokens;
    expect(b?.location).toEqual({ line: 2, column: 1, offset: 3 });
  });

  it('keeps counting lines after a comment', () => {
    const [, , , pop] = tokenize('stop # x\n\n pop').tokens;
    expect(pop?.location).toEqual({ line: 3, column: 2, offset: 11 });
  });

  it('stops a string at the end of its line', () => {
    expect(() => tokenize('"a"\n"b\n"')).toThrow('Unterminated string literal');
  });
});
