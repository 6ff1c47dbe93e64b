import type { Specifier } from '../frontend/ast.js';
import namedOpcodes from './opcodes.json' with { type: 'json' };

export const MAX_PUSH_WIDTH = 32;

function family(prefix: string, first: number, base: number, count: number): Specifier[] {
  const out: Specifier[] = [];
  for (let n = first; n < first + count; n++) {
    const immediateWidth = prefix === 'push' ? n : 0;
    out.push({ mnemonic: `${prefix}${n}`, code: base + (n - first), immediateWidth });
  }
  return out;
}

function buildTable(): Map<string, Specifier> {
  const table = new Map<string, Specifier>();
  const add = (spec: Specifier): void => {
    if (table.has(spec.mnemonic)) {
      throw new Error(`Duplicate mnemonic in opcode table: ${spec.mnemonic}`);
    }
    table.set(spec.mnemonic, spec);
  };

  for (const entry of namedOpcodes) {
    add({ mnemonic: entry.mnemonic, code: entry.code, immediateWidth: 0 });
  }
  family('push', 1, 0x60, MAX_PUSH_WIDTH).forEach(add);
  family('dup', 1, 0x80, 16).forEach(add);
  family('swap', 1, 0x90, 16).forEach(add);
  family('log', 0, 0xa0, 5).forEach(add);
  return table;
}

const OPCODES = buildTable();

/**
 * Total encoded size in bytes: the opcode byte plus the immediate.
 */
export function specifierSize(spec: Specifier): number {
  return 1 + spec.immediateWidth;
}

/**
 * Number of immediate bytes expected after the opcode, derived from the total size.
 */
export function immediateSize(spec: Specifier): number {
  return specifierSize(spec) - 1;
}

/**
 * Look up an instruction by its exact (case-sensitive) mnemonic.
 */
export function specifierFor(mnemonic: string): Specifier | undefined {
  return OPCODES.get(mnemonic);
}

/**
 * `pushN` specifier for `1 <= n <= 32`.
 */
export function pushSpecifier(n: number): Specifier | undefined {
  if (!Number.isInteger(n) || n < 1 || n > MAX_PUSH_WIDTH) return undefined;
  return OPCODES.get(`push${n}`);
}

/** True for `pushN`, the only instructions that carry an immediate. */
export function isPushSpecifier(spec: Specifier): boolean {
  return spec.immediateWidth > 0;
}

/**
 * Every known specifier, ordered by opcode value.
 */
export function allSpecifiers(): Specifier[] {
  return [...OPCODES.values()].sort((a, b) => a.code - b.code);
}
