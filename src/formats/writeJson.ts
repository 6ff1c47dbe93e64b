import { bytesToHex } from '@noble/hashes/utils';

import type { AsmNode, Immediate } from '../frontend/ast.js';
import { specifierSize } from '../evm/opcodes.js';
import type { JsonArtifact, JsonImmediate, JsonNode } from './types.js';

function immediateJson(imm: Immediate): JsonImmediate {
  return imm.kind === 'Bytes' ? { bytes: `0x${bytesToHex(imm.bytes)}` } : { label: imm.name };
}

function nodeJson(node: AsmNode): JsonNode {
  if (node.kind === 'Import') return { kind: 'import', path: node.path };
  if (node.kind === 'Include') return { kind: 'include', path: node.path };
  if (node.kind === 'IncludeHex') return { kind: 'include_hex', path: node.path };

  const { op } = node;
  switch (op.kind) {
    case 'Label':
      return { kind: 'label', name: op.name };
    case 'Push':
      return { kind: 'push', immediate: immediateJson(op.immediate) };
    case 'Op':
      return {
        kind: 'op',
        mnemonic: op.spec.mnemonic,
        opcode: op.spec.code,
        size: specifierSize(op.spec),
        ...(op.immediate ? { immediate: immediateJson(op.immediate) } : {}),
      };
  }
}

/**
 * Serialize an AST into the versioned JSON document.
 */
export function writeJson(nodes: AsmNode[]): JsonArtifact {
  return {
    kind: 'json',
    json: { format: 'evm-asm-ast', version: 1, nodes: nodes.map(nodeJson) },
  };
}
