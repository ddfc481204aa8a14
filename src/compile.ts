import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import { tokenizeSource } from './frontend/lexer.js';
import { parseProgram } from './frontend/parser.js';
import type { Artifact } from './formats/types.js';
import type {
  CompileFn,
  CompileSourceFn,
  CompilerOptions,
  CompileResult,
  PipelineDeps,
} from './pipeline.js';
import { analyzeProgram } from './semantics/analyze.js';

export const ENTRY_EXTENSION = '.lol';

/**
 * Compile LOLCODE-markdown source held in memory.
 *
 * Lexical and syntax errors stop at the first one; semantic errors are all reported. Any error
 * leaves the artifact list empty.
 */
export const compileSource: CompileSourceFn = (
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult => {
  const diagnostics: Diagnostic[] = [];
  const artifacts: Artifact[] = [];
  const lineEnding = options.lineEnding ?? '\n';

  if (options.lexOnly || options.emitTokens) {
    const tokens = tokenizeSource(path, text, diagnostics);
    if (!tokens) return { diagnostics, artifacts: [] };
    if (options.emitTokens) artifacts.push(deps.formats.writeTokens(tokens, { lineEnding }));
    if (options.lexOnly) return { diagnostics, artifacts };
  }

  const program = parseProgram(path, text, diagnostics);
  if (!program) return { diagnostics, artifacts: [] };

  const html = analyzeProgram(program, diagnostics);
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  artifacts.unshift(deps.formats.writeHtml(html, { lineEnding }));
  if (options.emitAst) {
    artifacts.push(deps.formats.writeAst(program, { rootDir: dirname(resolve(path)) }));
  }

  return { diagnostics, artifacts };
};

/**
 * Compile a LOLCODE-markdown document from an entry file.
 *
 * Artifacts are produced in-memory via `deps.formats`; nothing is written to disk.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);

  if (extname(entryPath) !== ENTRY_EXTENSION) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.InvalidEntryExtension,
          severity: 'error',
          message: `Input file must have a ${ENTRY_EXTENSION} extension`,
          file: entryPath,
        },
      ],
      artifacts: [],
    };
  }

  let sourceText: string;
  try {
    sourceText = await readFile(entryPath, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryPath,
        },
      ],
      artifacts: [],
    };
  }

  return compileSource(entryPath, sourceText, options, deps);
};
