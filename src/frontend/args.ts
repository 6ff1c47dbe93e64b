import { isFunctionSignature } from '../evm/signature.js';
import type { SourcePosition } from './ast.js';
import type { ParseError } from './errors.js';
import type { TokenKind } from './lexer.js';

/**
 * Semantic kind a directive expects at one argument position.
 */
export type ArgKind = 'path' | 'label' | 'signature';

/**
 * One raw directive argument, as matched by the grammar.
 */
export interface ArgToken {
  kind: TokenKind;
  text: string;
  value: string;
  location: SourcePosition;
}

/**
 * Converter for a single argument position. `convert` returns `undefined` when the token's
 * lexical form does not fit `kind`.
 */
export interface ArgSpec<T> {
  readonly kind: ArgKind;
  convert(token: ArgToken): T | undefined;
}

export const pathArg: ArgSpec<string> = {
  kind: 'path',
  convert: (token) => (token.kind === 'string' ? token.value : undefined),
};

export const labelArg: ArgSpec<string> = {
  kind: 'label',
  convert: (token) => (token.kind === 'identifier' ? token.text : undefined),
};

export const signatureArg: ArgSpec<string> = {
  kind: 'signature',
  convert: (token) =>
    token.kind === 'string' && isFunctionSignature(token.value) ? token.value : undefined,
};

export interface ArgContext {
  /** Directive name without `%`, used in errors. */
  directive: string;
  /** Location of the directive itself; reported for arity errors. */
  location: SourcePosition;
}

export type ArgsResult<T> = { ok: true; value: T } | { ok: false; error: ParseError };

/**
 * Fixed-arity directive signature producing a typed tuple.
 */
export interface ArgSignature<T> {
  parse(args: readonly ArgToken[], ctx: ArgContext): ArgsResult<T>;
}

function checkArity(
  args: readonly ArgToken[],
  expected: number,
  ctx: ArgContext,
): ParseError | undefined {
  const got = args.length;
  const { directive, location } = ctx;
  if (got < expected) return { kind: 'MissingArgument', directive, got, expected, location };
  if (got > expected) return { kind: 'ExtraArgument', directive, expected, got, location };
  return undefined;
}

function convertAt<T>(
  spec: ArgSpec<T>,
  args: readonly ArgToken[],
  position: number,
  ctx: ArgContext,
): ArgsResult<T> {
  const token = args[position];
  if (!token) {
    return {
      ok: false,
      error: {
        kind: 'MissingArgument',
        directive: ctx.directive,
        got: args.length,
        expected: position + 1,
        location: ctx.location,
      },
    };
  }
  const value = spec.convert(token);
  if (value === undefined) {
    return {
      ok: false,
      error: {
        kind: 'ArgumentType',
        directive: ctx.directive,
        position,
        expected: spec.kind,
        got: token.kind,
        location: token.location,
      },
    };
  }
  return { ok: true, value };
}

export function args1<A>(a: ArgSpec<A>): ArgSignature<[A]> {
  return {
    parse(args, ctx) {
      const arity = checkArity(args, 1, ctx);
      if (arity) return { ok: false, error: arity };
      const first = convertAt(a, args, 0, ctx);
      if (!first.ok) return first;
      return { ok: true, value: [first.value] };
    },
  };
}

export function args2<A, B>(a: ArgSpec<A>, b: ArgSpec<B>): ArgSignature<[A, B]> {
  return {
    parse(args, ctx) {
      const arity = checkArity(args, 2, ctx);
      if (arity) return { ok: false, error: arity };
      const first = convertAt(a, args, 0, ctx);
      if (!first.ok) return first;
      const second = convertAt(b, args, 1, ctx);
      if (!second.ok) return second;
      return { ok: true, value: [first.value, second.value] };
    },
  };
}

export function args3<A, B, C>(
  a: ArgSpec<A>,
  b: ArgSpec<B>,
  c: ArgSpec<C>,
): ArgSignature<[A, B, C]> {
  return {
    parse(args, ctx) {
      const arity = checkArity(args, 3, ctx);
      if (arity) return { ok: false, error: arity };
      const first = convertAt(a, args, 0, ctx);
      if (!first.ok) return first;
      const second = convertAt(b, args, 1, ctx);
      if (!second.ok) return second;
      const third = convertAt(c, args, 2, ctx);
      if (!third.ok) return third;
      return { ok: true, value: [first.value, second.value, third.value] };
    },
  };
}
