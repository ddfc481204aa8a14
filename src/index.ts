export { compile, compileSource, ENTRY_EXTENSION } from './compile.js';
export type {
  CompileFn,
  CompileSourceFn,
  CompilerOptions,
  CompileResult,
  PipelineDeps,
} from './pipeline.js';
export { DiagnosticError, DiagnosticIds, hasErrors } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { Lexer, tokenize, tokenizeSource } from './frontend/lexer.js';
export { makeSourceFile } from './frontend/source.js';
export type { SourceFile } from './frontend/source.js';
export type { Token, TokenKind, HashWord, Keyword } from './frontend/tokens.js';
export { parseProgram } from './frontend/parser.js';
export type * from './frontend/ast.js';
export { analyzeProgram, emitProgram, validateProgram } from './semantics/analyze.js';
export { ScopeStack } from './semantics/scope.js';
export type { Binding } from './semantics/scope.js';
export { defaultFormatWriters } from './formats/index.js';
export type * from './formats/types.js';
