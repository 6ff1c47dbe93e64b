import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ArgKind } from './args.js';
import type { SourcePosition } from './ast.js';
import type { TokenKind } from './lexer.js';

/**
 * Closed set of failures produced while parsing. The first one aborts the parse.
 */
export type ParseError =
  | { kind: 'Lexer'; message: string; location: SourcePosition }
  | {
      kind: 'ImmediateTooLarge';
      /** Declared immediate width of the instruction. */
      width: number;
      /** Minimal (or raw) byte count of the literal. */
      size: number;
      location: SourcePosition;
    }
  | {
      kind: 'ExtraArgument';
      directive: string;
      expected: number;
      got: number;
      location: SourcePosition;
    }
  | {
      kind: 'MissingArgument';
      directive: string;
      got: number;
      expected: number;
      location: SourcePosition;
    }
  | {
      kind: 'ArgumentType';
      directive: string;
      /** 0-based argument index. */
      position: number;
      expected: ArgKind;
      got: TokenKind;
      location: SourcePosition;
    };

export type ParseErrorKind = ParseError['kind'];

/**
 * Thrown inside the grammar and builder to abort on the first fault; `parseAsm` turns it back
 * into a value.
 */
export class ParseFailure extends Error {
  readonly error: ParseError;

  constructor(error: ParseError) {
    super(describeParseError(error));
    this.name = 'ParseFailure';
    this.error = error;
  }
}

export function fail(error: ParseError): never {
  throw new ParseFailure(error);
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

export function describeParseError(error: ParseError): string {
  switch (error.kind) {
    case 'Lexer':
      return error.message;
    case 'ImmediateTooLarge':
      return `Immediate needs ${plural(error.size, 'byte')} but the instruction takes ${plural(
        error.width,
        'byte',
      )}`;
    case 'ExtraArgument':
      return `%${error.directive} expects ${plural(error.expected, 'argument')}, got ${error.got}`;
    case 'MissingArgument':
      return `%${error.directive} expects ${plural(error.expected, 'argument')}, got ${error.got}`;
    case 'ArgumentType':
      return `%${error.directive} argument ${error.position + 1} must be a ${error.expected}, got ${error.got}`;
  }
}

const diagnosticIdByKind = {
  Lexer: DiagnosticIds.SyntaxError,
  ImmediateTooLarge: DiagnosticIds.ImmediateTooLarge,
  ExtraArgument: DiagnosticIds.ExtraArgument,
  MissingArgument: DiagnosticIds.MissingArgument,
  ArgumentType: DiagnosticIds.ArgumentType,
} as const satisfies Record<ParseErrorKind, Diagnostic['id']>;

/**
 * Convert a parse error into a file diagnostic.
 */
export function toDiagnostic(file: string, error: ParseError): Diagnostic {
  return {
    id: diagnosticIdByKind[error.kind],
    severity: 'error',
    message: describeParseError(error),
    file,
    line: error.location.line,
    column: error.location.column,
  };
}
