/**
 * Frontend AST contracts for EVM assembly.
 *
 * This module defines types only. Parsing lives in `parser.ts`; encoding and label resolution
 * belong to downstream passes.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the source text. */
  offset: number;
}

/**
 * One instruction class: opcode value plus the width of the immediate that follows it.
 *
 * The total encoded size is derived (see `specifierSize` in `evm/opcodes.ts`), never stored.
 */
export interface Specifier {
  readonly mnemonic: string;
  readonly code: number;
  /** Immediate bytes carried after the opcode byte (0 for everything except `pushN`). */
  readonly immediateWidth: number;
}

/**
 * Push operand: concrete bytes of exactly the instruction's immediate width, or a label name
 * substituted by the linker.
 */
export type Immediate =
  | { readonly kind: 'Bytes'; readonly bytes: Uint8Array }
  | { readonly kind: 'LabelRef'; readonly name: string };

/**
 * Concrete instruction. `immediate` is present exactly when the specifier has a non-zero width.
 */
export interface OpNode {
  readonly kind: 'Op';
  readonly spec: Specifier;
  readonly immediate?: Immediate;
}

/**
 * Label definition bound to the offset of the next instruction.
 */
export interface LabelDefNode {
  readonly kind: 'Label';
  readonly name: string;
}

/**
 * Push whose width is chosen downstream, once the label's address is known (`%push(label)`).
 */
export interface DeferredPushNode {
  readonly kind: 'Push';
  readonly immediate: Immediate;
}

export type AbstractOp = OpNode | LabelDefNode | DeferredPushNode;

export interface InstructionNode {
  readonly kind: 'Instruction';
  readonly op: AbstractOp;
}

/** `%import("path")`. */
export interface ImportNode {
  readonly kind: 'Import';
  readonly path: string;
}

/** `%include("path")`: spliced in as source text. */
export interface IncludeNode {
  readonly kind: 'Include';
  readonly path: string;
}

/** `%include_hex("path")`: spliced in as raw bytes. */
export interface IncludeHexNode {
  readonly kind: 'IncludeHex';
  readonly path: string;
}

export type AsmNode = InstructionNode | ImportNode | IncludeNode | IncludeHexNode;
