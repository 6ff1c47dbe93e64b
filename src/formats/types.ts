import type { AsmNode } from '../frontend/ast.js';

/**
 * Serialized immediate: `0x`-prefixed lowercase hex, or a label reference.
 */
export type JsonImmediate = { bytes: string } | { label: string };

export type JsonNode =
  | { kind: 'op'; mnemonic: string; opcode: number; size: number; immediate?: JsonImmediate }
  | { kind: 'label'; name: string }
  | { kind: 'push'; immediate: JsonImmediate }
  | { kind: 'import' | 'include' | 'include_hex'; path: string };

/**
 * Versioned AST document written by `writeJson`.
 */
export interface AstJson {
  format: 'evm-asm-ast';
  version: 1;
  nodes: JsonNode[];
}

export interface JsonArtifact {
  kind: 'json';
  json: AstJson;
}

export interface AsmArtifact {
  kind: 'asm';
  text: string;
}

export type Artifact = JsonArtifact | AsmArtifact;

export interface WriteAsmOptions {
  /** Line ending used between statements (default `\n`). */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory artifact writers used by the pipeline.
 */
export interface FormatWriters {
  writeJson: (nodes: AsmNode[]) => JsonArtifact;
  writeAsm: (nodes: AsmNode[], opts?: WriteAsmOptions) => AsmArtifact;
}
