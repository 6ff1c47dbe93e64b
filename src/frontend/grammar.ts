import { isFunctionSignature } from '../evm/signature.js';
import { isPushSpecifier, pushSpecifier, specifierFor } from '../evm/opcodes.js';
import type { ArgToken } from './args.js';
import type { SourcePosition, Specifier } from './ast.js';
import { fail } from './errors.js';
import type { Token, TokenKind } from './lexer.js';
import { tokenize } from './lexer.js';

export type Directive = 'import' | 'include' | 'include_hex' | 'push';

const DIRECTIVES: ReadonlySet<string> = new Set<Directive>([
  'import',
  'include',
  'include_hex',
  'push',
]);

function isDirective(name: string): name is Directive {
  return DIRECTIVES.has(name);
}

const PUSH_OPERANDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'binary',
  'octal',
  'decimal',
  'hex',
  'selector',
  'identifier',
]);

const ARGUMENT_TOKENS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'string',
  'identifier',
  'binary',
  'octal',
  'decimal',
  'hex',
  'selector',
]);

/**
 * One matched statement of the parse tree. Separators and comments leave no trace.
 */
export type Statement =
  | { kind: 'LabelDefn'; name: string; location: SourcePosition }
  | { kind: 'Op'; spec: Specifier; location: SourcePosition }
  | {
      kind: 'Push';
      spec: Specifier;
      operand: Token;
      location: SourcePosition;
      operandLocation: SourcePosition;
    }
  | { kind: 'Macro'; directive: Directive; args: ArgToken[]; location: SourcePosition };

export interface ParseTree {
  statements: Statement[];
}

const PUSH_MNEMONIC = /^push([1-9][0-9]?)$/;

function describeToken(t: Token): string {
  if (t.kind === 'eof') return 'end of input';
  if (t.kind === 'separator') return t.text === ';' ? '";"' : 'end of line';
  return JSON.stringify(t.text);
}

/**
 * Match the whole source against the grammar. Fails on the first mismatch with a `Lexer` error.
 */
export function parseGrammar(source: string): ParseTree {
  const { tokens, eof } = tokenize(source);
  const statements: Statement[] = [];
  let idx = 0;

  const peek = (ahead = 0): Token => tokens[idx + ahead] ?? eof;

  function syntaxError(t: Token, message: string): never {
    return fail({ kind: 'Lexer', message, location: t.location });
  }

  function expectEndOfStatement(): void {
    const t = peek();
    if (t.kind !== 'separator' && t.kind !== 'eof') {
      syntaxError(t, `Expected end of statement, found ${describeToken(t)}`);
    }
  }

  function parsePush(head: Token, spec: Specifier): void {
    const operand = peek(1);
    if (!PUSH_OPERANDS.has(operand.kind)) {
      syntaxError(operand, `Expected operand for "${head.text}", found ${describeToken(operand)}`);
    }
    if (operand.kind === 'selector' && !isFunctionSignature(operand.value)) {
      syntaxError(operand, `Malformed function signature ${JSON.stringify(operand.value)}`);
    }
    statements.push({
      kind: 'Push',
      spec,
      operand,
      location: head.location,
      operandLocation: operand.location,
    });
    idx += 2;
    expectEndOfStatement();
  }

  function parseArguments(): ArgToken[] {
    const open = peek();
    if (open.kind !== 'lparen') syntaxError(open, `Expected "(", found ${describeToken(open)}`);
    idx++;

    const args: ArgToken[] = [];
    if (peek().kind === 'rparen') {
      idx++;
      return args;
    }
    for (;;) {
      const arg = peek();
      if (!ARGUMENT_TOKENS.has(arg.kind)) {
        syntaxError(arg, `Expected argument, found ${describeToken(arg)}`);
      }
      args.push({ kind: arg.kind, text: arg.text, value: arg.value, location: arg.location });
      idx++;

      const sep = peek();
      idx++;
      if (sep.kind === 'rparen') return args;
      if (sep.kind !== 'comma') {
        syntaxError(sep, `Expected "," or ")", found ${describeToken(sep)}`);
      }
    }
  }

  function parseMacro(percent: Token): void {
    const name = peek(1);
    const directive = name.kind === 'identifier' && name.start === percent.end ? name.text : '';
    if (!isDirective(directive)) syntaxError(percent, `Unknown directive "%${directive}"`);
    idx += 2;
    const args = parseArguments();
    statements.push({ kind: 'Macro', directive, args, location: percent.location });
    expectEndOfStatement();
  }

  function parseStatement(): void {
    const t = peek();

    if (t.kind === 'percent') {
      parseMacro(t);
      return;
    }

    if (t.kind !== 'identifier') syntaxError(t, `Unexpected ${describeToken(t)}`);

    const next = peek(1);
    if (next.kind === 'colon' && next.start === t.end) {
      statements.push({ kind: 'LabelDefn', name: t.text, location: t.location });
      idx += 2;
      return;
    }

    const push = PUSH_MNEMONIC.exec(t.text);
    const pushSpec = push ? pushSpecifier(Number(push[1])) : undefined;
    if (pushSpec) {
      parsePush(t, pushSpec);
      return;
    }

    const spec = specifierFor(t.text);
    if (!spec || isPushSpecifier(spec)) syntaxError(t, `Unknown instruction "${t.text}"`);
    statements.push({ kind: 'Op', spec, location: t.location });
    idx++;
    expectEndOfStatement();
  }

  while (peek().kind !== 'eof') {
    if (peek().kind === 'separator') {
      idx++;
      continue;
    }
    parseStatement();
  }

  return { statements };
}
