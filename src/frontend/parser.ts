import type { Diagnostic } from '../diagnostics/types.js';
import type { ImmediateLiteral } from '../evm/immediate.js';
import { normalizeLiteral } from '../evm/immediate.js';
import { immediateSize } from '../evm/opcodes.js';
import { args1, labelArg, pathArg } from './args.js';
import type { AbstractOp, AsmNode, InstructionNode, OpNode } from './ast.js';
import type { ParseError } from './errors.js';
import { fail, ParseFailure, toDiagnostic } from './errors.js';
import type { ParseTree, Statement } from './grammar.js';
import { parseGrammar } from './grammar.js';

export type ParseResult = { ok: true; nodes: AsmNode[] } | { ok: false; error: ParseError };

type MacroStatement = Extract<Statement, { kind: 'Macro' }>;
type PushStatement = Extract<Statement, { kind: 'Push' }>;

const PATH_ARGS = args1(pathArg);
const LABEL_ARGS = args1(labelArg);

function instruction(op: AbstractOp): InstructionNode {
  return { kind: 'Instruction', op };
}

function parsePath(stmt: MacroStatement): string {
  const res = PATH_ARGS.parse(stmt.args, { directive: stmt.directive, location: stmt.location });
  if (!res.ok) fail(res.error);
  return res.value[0];
}

function buildMacro(stmt: MacroStatement): AsmNode {
  switch (stmt.directive) {
    case 'import':
      return { kind: 'Import', path: parsePath(stmt) };
    case 'include':
      return { kind: 'Include', path: parsePath(stmt) };
    case 'include_hex':
      return { kind: 'IncludeHex', path: parsePath(stmt) };
    case 'push': {
      // Only a label is accepted here; the push width is picked once the address is known.
      const res = LABEL_ARGS.parse(stmt.args, { directive: 'push', location: stmt.location });
      if (!res.ok) fail(res.error);
      return instruction({ kind: 'Push', immediate: { kind: 'LabelRef', name: res.value[0] } });
    }
  }
}

function literalOf(stmt: PushStatement): ImmediateLiteral | undefined {
  const { operand } = stmt;
  switch (operand.kind) {
    case 'binary':
    case 'octal':
    case 'decimal':
    case 'hex':
      return { kind: operand.kind, text: operand.text };
    case 'selector':
      return { kind: 'selector', signature: operand.value };
    default:
      return undefined;
  }
}

function buildPush(stmt: PushStatement): OpNode {
  const { spec, operand } = stmt;
  const literal = literalOf(stmt);
  if (!literal) {
    if (operand.kind !== 'identifier') {
      throw new Error(`Unexpected push operand token "${operand.kind}"`);
    }
    return { kind: 'Op', spec, immediate: { kind: 'LabelRef', name: operand.text } };
  }

  const width = immediateSize(spec);
  const res = normalizeLiteral(literal, width);
  if (!res.ok) {
    fail({ kind: 'ImmediateTooLarge', width, size: res.size, location: stmt.operandLocation });
  }
  return { kind: 'Op', spec, immediate: { kind: 'Bytes', bytes: res.bytes } };
}

function buildNodes(tree: ParseTree): AsmNode[] {
  const program: AsmNode[] = [];
  for (const stmt of tree.statements) {
    switch (stmt.kind) {
      case 'Macro':
        program.push(buildMacro(stmt));
        break;
      case 'LabelDefn':
        program.push(instruction({ kind: 'Label', name: stmt.name }));
        break;
      case 'Push':
        program.push(instruction(buildPush(stmt)));
        break;
      case 'Op':
        program.push(instruction({ kind: 'Op', spec: stmt.spec }));
        break;
    }
  }
  return program;
}

/**
 * Parse EVM assembly source into an ordered AST.
 *
 * The whole text is matched against the grammar first, so a syntax error anywhere wins over an
 * immediate or argument error earlier in the file. Stops at the first error; no partial AST.
 * Directives are returned as nodes; nothing is read from disk.
 */
export function parseAsm(source: string): ParseResult {
  try {
    return { ok: true, nodes: buildNodes(parseGrammar(source)) };
  } catch (err) {
    if (err instanceof ParseFailure) return { ok: false, error: err.error };
    throw err;
  }
}

/**
 * Diagnostics-style wrapper around {@link parseAsm}: on failure, appends one error diagnostic for
 * `filePath` and returns `undefined`.
 */
export function parseModuleFile(
  filePath: string,
  sourceText: string,
  diagnostics: Diagnostic[],
): AsmNode[] | undefined {
  const res = parseAsm(sourceText);
  if (!res.ok) {
    diagnostics.push(toDiagnostic(filePath, res.error));
    return undefined;
  }
  return res.nodes;
}
