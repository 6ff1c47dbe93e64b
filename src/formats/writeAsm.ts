import { bytesToHex } from '@noble/hashes/utils';

import type { AbstractOp, AsmNode, Immediate } from '../frontend/ast.js';
import type { AsmArtifact, WriteAsmOptions } from './types.js';

function operandText(imm: Immediate): string {
  return imm.kind === 'Bytes' ? `0x${bytesToHex(imm.bytes)}` : imm.name;
}

function opLine(op: AbstractOp): string {
  switch (op.kind) {
    case 'Label':
      return `${op.name}:`;
    case 'Op':
      return op.immediate ? `${op.spec.mnemonic} ${operandText(op.immediate)}` : op.spec.mnemonic;
    case 'Push':
      // A sized immediate has a fixed width already, so it is written as the matching pushN.
      return op.immediate.kind === 'LabelRef'
        ? `%push(${op.immediate.name})`
        : `push${op.immediate.bytes.length} ${operandText(op.immediate)}`;
  }
}

// Paths are written raw: the lexer reads string contents verbatim, with no escapes.
function nodeLine(node: AsmNode): string {
  switch (node.kind) {
    case 'Instruction':
      return opLine(node.op);
    case 'Import':
      return `%import("${node.path}")`;
    case 'Include':
      return `%include("${node.path}")`;
    case 'IncludeHex':
      return `%include_hex("${node.path}")`;
  }
}

/**
 * Render an AST back into canonical source, one statement per line. Parsing the text again
 * yields the same nodes (a sized `Push` comes back as the equivalent `pushN` op).
 */
export function writeAsm(nodes: AsmNode[], opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines = nodes.map(nodeLine);
  return { kind: 'asm', text: lines.length === 0 ? '' : lines.join(lineEnding) + lineEnding };
}
