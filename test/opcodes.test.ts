import { describe, expect, it } from 'vitest';

import {
  MAX_PUSH_WIDTH,
  allSpecifiers,
  immediateSize,
  isPushSpecifier,
  pushSpecifier,
  specifierFor,
  specifierSize,
} from '../src/evm/opcodes.js';
import { spec } from './test-helpers.js';

describe('opcode table', () => {
  it('maps named instructions to their opcodes', () => {
    expect(spec('stop').code).toBe(0x00);
    expect(spec('keccak256').code).toBe(0x20);
    expect(spec('jumpdest').code).toBe(0x5b);
    expect(spec('create2').code).toBe(0xf5);
    expect(spec('selfdestruct').code).toBe(0xff);
  });

  it('builds the numbered families', () => {
    expect(spec('push1')).toEqual({ mnemonic: 'push1', code: 0x60, immediateWidth: 1 });
    expect(spec('push32')).toEqual({ mnemonic: 'push32', code: 0x7f, immediateWidth: 32 });
    expect(spec('dup1').code).toBe(0x80);
    expect(spec('dup16').code).toBe(0x8f);
    expect(spec('swap1').code).toBe(0x90);
    expect(spec('swap16').code).toBe(0x9f);
    expect(spec('log0').code).toBe(0xa0);
    expect(spec('log4').code).toBe(0xa4);
  });

  it('derives sizes from the immediate width', () => {
    expect(specifierSize(spec('add'))).toBe(1);
    expect(specifierSize(spec('push2'))).toBe(3);
    expect(immediateSize(spec('push32'))).toBe(32);
    expect(immediateSize(spec('jump'))).toBe(0);
  });

  it('looks up pushN by width', () => {
    expect(pushSpecifier(1)?.code).toBe(0x60);
    expect(pushSpecifier(MAX_PUSH_WIDTH)?.code).toBe(0x7f);
    expect(pushSpecifier(0)).toBeUndefined();
    expect(pushSpecifier(33)).toBeUndefined();
    expect(pushSpecifier(1.5)).toBeUndefined();
  });

  it('only push instructions carry immediates', () => {
    expect(isPushSpecifier(spec('push7'))).toBe(true);
    expect(isPushSpecifier(spec('dup7'))).toBe(false);
  });

  it('is case-sensitive', () => {
    expect(specifierFor('ADD')).toBeUndefined();
    expect(specifierFor('push0')).toBeUndefined();
  });

  it('lists every specifier once, ordered by opcode', () => {
    const all = allSpecifiers();
    expect(all).toHaveLength(143);
    for (let i = 1; i < all.length; i++) {
      expect(all[i]?.code).toBeGreaterThan(all[i - 1]?.code ?? -1);
    }
  });
});
