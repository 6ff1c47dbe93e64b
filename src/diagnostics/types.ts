/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A parser diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `EAS100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Failed to read a source file from disk. */
  IoReadFailed: 'EAS001',

  /** Internal error during parsing (unexpected exception). */
  InternalParseError: 'EAS002',

  /** Source text does not match the grammar. */
  SyntaxError: 'EAS100',

  /** A push operand does not fit the immediate width of its instruction. */
  ImmediateTooLarge: 'EAS200',

  /** Directive invoked with more arguments than it takes. */
  ExtraArgument: 'EAS310',

  /** Directive invoked with fewer arguments than it takes. */
  MissingArgument: 'EAS311',

  /** Directive argument has the wrong lexical kind for its position. */
  ArgumentType: 'EAS312',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
