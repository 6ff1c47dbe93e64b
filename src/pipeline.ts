import type { Diagnostic } from './diagnostics/types.js';
import type { AsmNode } from './frontend/ast.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that select which artifacts are produced for a parsed file.
 */
export interface ParseOptions {
  /** Emit the JSON AST document. Defaults to `true` unless `emitAsm` is given alone. */
  emitJson?: boolean;
  /** Emit canonical assembly text rebuilt from the AST. */
  emitAsm?: boolean;
}

/**
 * Result of a file parse: diagnostics, the AST (empty on error) and any produced artifacts.
 */
export interface ParseFileResult {
  diagnostics: Diagnostic[];
  nodes: AsmNode[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

export type ParseFileFn = (
  entryFile: string,
  options: ParseOptions,
  deps: PipelineDeps,
) => Promise<ParseFileResult>;
