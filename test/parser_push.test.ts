import { describe, expect, it } from 'vitest';

import { label, op, parseErr, parseOk, push, pushLabel } from './test-helpers.js';

describe('parser: push immediates', () => {
  it('parses binary literals', () => {
    const asm = `
      # simple cases
      push1 0b0
      push1 0b1
      push2 0b100000000
    `;
    expect(parseOk(asm)).toEqual([push('push1', '00'), push('push1', '01'), push('push2', '0100')]);
  });

  it('parses octal literals', () => {
    const asm = `
      push1 0o0
      push1 0o7
      push2 0o400
    `;
    expect(parseOk(asm)).toEqual([push('push1', '00'), push('push1', '07'), push('push2', '0100')]);
  });

  it('parses decimal literals with left padding', () => {
    const asm = `
      push1 0
      push1 1

      # left-pad values too small
      push2 42

      # barely enough for 2 bytes
      push2 256

      # just enough for 4 bytes
      push4 4294967295
    `;
    expect(parseOk(asm)).toEqual([
      push('push1', '00'),
      push('push1', '01'),
      push('push2', '002a'),
      push('push2', '0100'),
      push('push4', 'ffffffff'),
    ]);
  });

  it('pads the largest numeric literal to every push width', () => {
    for (let n = 1; n <= 32; n++) {
      const used = Math.min(16, n);
      const value = (1n << BigInt(8 * used)) - 1n;
      const expected = '00'.repeat(n - used) + 'ff'.repeat(used);
      expect(parseOk(`push${n} ${value}`)).toEqual([push(`push${n}`, expected)]);
    }
  });

  it('rejects decimal values wider than the push', () => {
    expect(parseErr('push1 256')).toEqual({
      kind: 'ImmediateTooLarge',
      width: 1,
      size: 2,
      location: { line: 1, column: 7, offset: 6 },
    });
  });

  it('limits binary/octal/decimal literals to 16 bytes even for wider pushes', () => {
    const twoTo128 = (1n << 128n).toString();
    expect(parseErr(`push32 ${twoTo128}`)).toMatchObject({
      kind: 'ImmediateTooLarge',
      width: 32,
      size: 17,
    });
    expect(parseOk(`push17 0x01${'00'.repeat(16)}`)).toEqual([
      push('push17', `01${'00'.repeat(16)}`),
    ]);
  });

  it('decodes hex literals byte-for-byte', () => {
    const asm = `
      push1 0x01 # comment
      push1 0x42
      push2 0x0102
      push4 0x01020304
      push8 0x0102030405060708
      push16 0x0102030405060708090a0b0c0d0e0f10
      push32 0x0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20
    `;
    expect(parseOk(asm)).toEqual([
      push('push1', '01'),
      push('push1', '42'),
      push('push2', '0102'),
      push('push4', '01020304'),
      push('push8', '0102030405060708'),
      push('push16', '0102030405060708090a0b0c0d0e0f10'),
      push('push32', '0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20'),
    ]);
  });

  it('pads short hex literals and rejects long ones', () => {
    expect(parseOk('push4 0xABCD')).toEqual([push('push4', '0000abcd')]);
    expect(parseErr('push2 0x010203')).toMatchObject({
      kind: 'ImmediateTooLarge',
      width: 2,
      size: 3,
    });
  });

  it('hashes selector signatures', () => {
    const asm = `
      push4 selector("name()")
      push4 selector("balanceOf(address)")
      push4 selector("transfer(address,uint256)")
      push4 selector("approve(address,uint256)")
      push32 selector("transfer(address,uint256)")
    `;
    expect(parseOk(asm)).toEqual([
      push('push4', '06fdde03'),
      push('push4', '70a08231'),
      push('push4', 'a9059cbb'),
      push('push4', '095ea7b3'),
      push('push32', 'a9059cbb2ab09eb219583f4a59a5d0623ade346d962bcd4e46b11da047c9049b'),
    ]);
  });

  it('takes as many selector bytes as the push width', () => {
    expect(parseOk('push1 selector("name()")')).toEqual([push('push1', '06')]);
    expect(parseOk('push8 selector("transfer(address,uint256)")')).toEqual([
      push('push8', 'a9059cbb2ab09eb2'),
    ]);
  });

  it('rejects a selector signature with spaces', () => {
    expect(parseErr('push4 selector("name( )")')).toMatchObject({
      kind: 'Lexer',
      message: 'Malformed function signature "name( )"',
      location: { line: 1, column: 7 },
    });
  });

  it('defers label operands without checking them', () => {
    const asm = `
      push2 snake_case
      jumpi
    `;
    expect(parseOk(asm)).toEqual([pushLabel('push2', 'snake_case'), op('jumpi')]);
  });

  it('accepts "selector" as a label when no literal follows', () => {
    expect(parseOk('selector:\npush1 selector')).toEqual([
      label('selector'),
      pushLabel('push1', 'selector'),
    ]);
  });
});
