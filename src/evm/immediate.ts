import { keccak_256 } from '@noble/hashes/sha3';
import { hexToBytes, utf8ToBytes } from '@noble/hashes/utils';

/**
 * Binary/octal/decimal literals are limited to 128-bit values, even for wider pushes.
 */
export const MAX_NUMERIC_LITERAL_BYTES = 16;

export type ImmediateLiteral =
  | { kind: 'binary' | 'octal' | 'decimal' | 'hex'; text: string }
  | { kind: 'selector'; signature: string };

export type NormalizeResult =
  | { ok: true; bytes: Uint8Array }
  | {
      ok: false;
      /** Byte count of the literal that did not fit. */
      size: number;
    };

/**
 * Minimal big-endian encoding of a non-negative value; zero encodes as a single byte.
 */
export function minimalBytes(value: bigint): Uint8Array {
  if (value < 0n) throw new RangeError(`Negative immediate: ${value}`);
  const hex = value.toString(16);
  return hexToBytes(hex.length % 2 === 0 ? hex : `0${hex}`);
}

/**
 * Parse a `0b`/`0o` prefixed or plain decimal literal into its minimal bytes.
 */
export function numericLiteralBytes(text: string): Uint8Array {
  return minimalBytes(BigInt(text));
}

/**
 * Decode a `0x` literal digit-for-digit; the result is exactly half the digit count.
 */
export function hexLiteralBytes(text: string): Uint8Array {
  return hexToBytes(text.startsWith('0x') ? text.slice(2) : text);
}

/**
 * First `width` bytes of Keccak-256 over the signature's UTF-8 bytes.
 */
export function selectorBytes(signature: string, width: number): Uint8Array {
  return keccak_256(utf8ToBytes(signature)).slice(0, width);
}

/**
 * Left-pad `raw` with zero bytes to exactly `width`. Never truncates: returns `undefined` when
 * `raw` is longer than `width`.
 */
export function fitImmediate(raw: Uint8Array, width: number): Uint8Array | undefined {
  if (raw.length > width) return undefined;
  const out = new Uint8Array(width);
  out.set(raw, width - raw.length);
  return out;
}

/**
 * Convert a push operand literal into exactly `width` immediate bytes.
 */
export function normalizeLiteral(literal: ImmediateLiteral, width: number): NormalizeResult {
  let raw: Uint8Array;
  switch (literal.kind) {
    case 'binary':
    case 'octal':
    case 'decimal':
      raw = numericLiteralBytes(literal.text);
      if (raw.length > MAX_NUMERIC_LITERAL_BYTES) return { ok: false, size: raw.length };
      break;
    case 'hex':
      raw = hexLiteralBytes(literal.text);
      break;
    case 'selector':
      raw = selectorBytes(literal.signature, width);
      break;
  }
  const bytes = fitImmediate(raw, width);
  return bytes ? { ok: true, bytes } : { ok: false, size: raw.length };
}
