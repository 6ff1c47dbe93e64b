import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { AsmNode } from './frontend/ast.js';
import { parseModuleFile } from './frontend/parser.js';
import type { Artifact } from './formats/types.js';
import type { ParseFileFn, ParseFileResult, ParseOptions, PipelineDeps } from './pipeline.js';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

function withDefaults(options: ParseOptions): Required<ParseOptions> {
  const emitAsm = options.emitAsm ?? false;
  // JSON is the primary artifact: on unless the caller only asked for asm.
  const emitJson = options.emitJson ?? !(options.emitAsm === true);
  return { emitJson, emitAsm };
}

/**
 * Parse one assembly file from disk.
 *
 * Only the entry file is read: `%import`/`%include`/`%include_hex` nodes are returned as-is for a
 * later stage to resolve. Artifacts are produced in-memory via `deps.formats`.
 */
export const parseFile: ParseFileFn = async (
  entryFile: string,
  options: ParseOptions,
  deps: PipelineDeps,
): Promise<ParseFileResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  let sourceText: string;
  try {
    sourceText = await readFile(entryPath, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read entry file: ${String(err)}`,
      file: entryPath,
    });
    return { diagnostics, nodes: [], artifacts: [] };
  }

  let nodes: AsmNode[] | undefined;
  try {
    nodes = parseModuleFile(entryPath, sourceText, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalParseError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file: entryPath,
    });
    return { diagnostics, nodes: [], artifacts: [] };
  }

  if (!nodes || hasErrors(diagnostics)) {
    return { diagnostics, nodes: [], artifacts: [] };
  }

  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];
  if (emit.emitJson) artifacts.push(deps.formats.writeJson(nodes));
  if (emit.emitAsm) artifacts.push(deps.formats.writeAsm(nodes));

  return { diagnostics, nodes, artifacts };
};
