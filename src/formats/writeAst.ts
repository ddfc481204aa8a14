import { isAbsolute, relative, resolve } from 'node:path';

import type { AstNode, ProgramNode } from '../frontend/ast.js';
import type { AstArtifact, AstJsonNode, WriteAstOptions } from './types.js';

function normalizeAstPath(file: string, rootDir?: string): string {
  const withSlashes = file.replace(/\\/g, '/');
  if (!rootDir) return withSlashes;
  const absFile = resolve(file);
  const rel = relative(resolve(rootDir), absFile);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return absFile.replace(/\\/g, '/');
  }
  return rel.replace(/\\/g, '/');
}

function serializeNode(node: AstNode): AstJsonNode {
  const out: AstJsonNode = {
    kind: node.kind,
    line: node.span.start.line,
    column: node.span.start.column,
  };
  for (const [key, value] of Object.entries(node)) {
    if (key === 'kind' || key === 'span' || key === 'children') continue;
    out[key] = value;
  }
  if ('children' in node) {
    const children: readonly AstNode[] = node.children;
    out.children = children.map(serializeNode);
  }
  return out;
}

/**
 * Create an `.ast.json` artifact. Spans shrink to start line/column; the file is recorded once.
 */
export function writeAst(program: ProgramNode, opts?: WriteAstOptions): AstArtifact {
  return {
    kind: 'ast',
    json: {
      format: 'lolcode-markdown-ast',
      version: 1,
      file: normalizeAstPath(program.span.file, opts?.rootDir),
      root: serializeNode(program),
    },
  };
}
