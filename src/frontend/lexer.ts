import type { SourcePosition } from './ast.js';
import { fail } from './errors.js';

export type TokenKind =
  | 'identifier'
  | 'binary'
  | 'octal'
  | 'decimal'
  | 'hex'
  | 'string'
  | 'selector'
  | 'colon'
  | 'percent'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'separator'
  | 'eof';

export interface Token {
  kind: TokenKind;
  /** Exact source text of the token. */
  text: string;
  /**
   * Payload: string contents without quotes, the signature inside `selector("...")`, otherwise
   * the same as `text`.
   */
  value: string;
  /** 0-based start offset (inclusive). */
  start: number;
  /** 0-based end offset (exclusive). */
  end: number;
  location: SourcePosition;
}

export interface TokenStream {
  tokens: Token[];
  /** The final token of `tokens`. */
  eof: Token;
}

const PUNCTUATION: Record<string, TokenKind> = {
  ':': 'colon',
  '%': 'percent',
  '(': 'lparen',
  ')': 'rparen',
  ',': 'comma',
  ';': 'separator',
  '\n': 'separator',
};

type Reject = (offset: number, message: string) => never;

function classifyWord(word: string, start: number, reject: Reject): TokenKind {
  if (word.startsWith('0x')) {
    if (!/^0x[0-9A-Fa-f]+$/.test(word)) reject(start, `Invalid hex literal "${word}"`);
    if ((word.length - 2) % 2 !== 0) {
      reject(start, `Hex literal "${word}" must have an even number of digits`);
    }
    return 'hex';
  }
  if (word.startsWith('0o')) {
    if (!/^0o[0-7]+$/.test(word)) reject(start, `Invalid octal literal "${word}"`);
    return 'octal';
  }
  if (word.startsWith('0b')) {
    if (!/^0b[01]+$/.test(word)) reject(start, `Invalid binary literal "${word}"`);
    return 'binary';
  }
  if (/^[0-9]+$/.test(word)) return 'decimal';
  if (/^[0-9]/.test(word)) reject(start, `Invalid numeric literal "${word}"`);
  return 'identifier';
}

/**
 * Split assembly source into tokens. Whitespace (space, tab, CR) and `#` comments are dropped;
 * newlines and `;` both become `separator` tokens. The last token is always `eof`.
 *
 * Line and column are tracked while scanning; no token spans a newline.
 */
export function tokenize(text: string): TokenStream {
  const tokens: Token[] = [];
  const WORD = /[A-Za-z0-9_]+/y;
  const SELECTOR_ARGS = /\("([^"\n]*)"\)/y;
  let i = 0;
  let line = 1;
  let lineStart = 0;

  function at(offset: number): SourcePosition {
    return { line, column: offset - lineStart + 1, offset };
  }

  function lexError(offset: number, message: string): never {
    return fail({ kind: 'Lexer', message, location: at(offset) });
  }

  function push(kind: TokenKind, start: number, end: number, value?: string): void {
    const raw = text.slice(start, end);
    tokens.push({ kind, text: raw, value: value ?? raw, start, end, location: at(start) });
  }

  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }
    if (ch === '#') {
      const eol = text.indexOf('\n', i);
      i = eol < 0 ? text.length : eol;
      continue;
    }

    const punct = PUNCTUATION[ch];
    if (punct !== undefined) {
      push(punct, i, i + 1);
      i++;
      if (ch === '\n') {
        line++;
        lineStart = i;
      }
      continue;
    }

    if (ch === '"') {
      let close = i + 1;
      while (close < text.length && text[close] !== '"' && text[close] !== '\n') close++;
      if (text.charAt(close) !== '"') lexError(i, 'Unterminated string literal');
      push('string', i, close + 1, text.slice(i + 1, close));
      i = close + 1;
      continue;
    }

    WORD.lastIndex = i;
    const word = WORD.exec(text);
    if (word) {
      const start = i;
      const w = word[0];
      i += w.length;
      const kind = classifyWord(w, start, lexError);

      // `selector(` always opens a selector literal; a `selector` label is never followed by `(`.
      if (kind === 'identifier' && w === 'selector' && text.charAt(i) === '(') {
        SELECTOR_ARGS.lastIndex = i;
        const lit = SELECTOR_ARGS.exec(text);
        if (!lit) lexError(start, 'Malformed selector literal');
        i += lit[0].length;
        push('selector', start, i, lit[1] ?? '');
        continue;
      }

      push(kind, start, i);
      continue;
    }

    lexError(i, `Unexpected character ${JSON.stringify(ch)}`);
  }

  const eof: Token = { kind: 'eof', text: '', value: '', start: i, end: i, location: at(i) };
  tokens.push(eof);
  return { tokens, eof };
}
