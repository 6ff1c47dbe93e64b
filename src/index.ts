export type {
  AbstractOp,
  AsmNode,
  DeferredPushNode,
  Immediate,
  ImportNode,
  IncludeHexNode,
  IncludeNode,
  InstructionNode,
  LabelDefNode,
  OpNode,
  SourcePosition,
  Specifier,
} from './frontend/ast.js';
export type { ParseResult } from './frontend/parser.js';
export { parseAsm, parseModuleFile } from './frontend/parser.js';
export type { ParseError, ParseErrorKind } from './frontend/errors.js';
export { describeParseError, toDiagnostic } from './frontend/errors.js';
export type {
  ArgContext,
  ArgKind,
  ArgSignature,
  ArgSpec,
  ArgToken,
  ArgsResult,
} from './frontend/args.js';
export { args1, args2, args3, labelArg, pathArg, signatureArg } from './frontend/args.js';
export type { ImmediateLiteral, NormalizeResult } from './evm/immediate.js';
export {
  MAX_NUMERIC_LITERAL_BYTES,
  fitImmediate,
  normalizeLiteral,
  selectorBytes,
} from './evm/immediate.js';
export {
  MAX_PUSH_WIDTH,
  allSpecifiers,
  immediateSize,
  isPushSpecifier,
  pushSpecifier,
  specifierFor,
  specifierSize,
} from './evm/opcodes.js';
export { isFunctionSignature } from './evm/signature.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { ParseFileFn, ParseFileResult, ParseOptions, PipelineDeps } from './pipeline.js';
export { parseFile } from './parseFile.js';
export { defaultFormatWriters } from './formats/index.js';
export type { Artifact, AsmArtifact, AstJson, JsonArtifact, JsonNode } from './formats/types.js';
