import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /**
   * Stop after tokenizing. No artifacts are produced unless `emitTokens` is also set.
   */
  lexOnly?: boolean;
  /** Emit a token listing (`.tokens.txt`). */
  emitTokens?: boolean;
  /** Emit the syntax tree as JSON (`.ast.json`). */
  emitAst?: boolean;
  /** Line ending for text artifacts (default `\n`). */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * When any diagnostic is an error, `artifacts` is empty.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;

/**
 * In-memory variant: the source text is supplied by the caller.
 */
export type CompileSourceFn = (
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => CompileResult;
