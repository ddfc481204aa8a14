import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { AstNode, ProgramNode } from '../frontend/ast.js';
import {
  audio,
  bold,
  heading,
  htmlDocument,
  italics,
  lineBreak,
  listItem,
  paragraph,
  textRun,
  undefinedPlaceholder,
  unorderedList,
  video,
} from '../lowering/html.js';
import { ScopeStack } from './scope.js';

/**
 * Walk `program` once with a fresh scope stack, appending semantic diagnostics and returning the HTML
 * document.
 *
 * Problems never stop the walk: every error in the tree is reported, and references that fail to
 * resolve render as `[undefined: name]`. List item contents are rendered but not checked.
 */
export function analyzeProgram(program: ProgramNode, diagnostics: Diagnostic[]): string {
  const scopes = new ScopeStack();
  /** Nesting depth of subtrees that render without being checked. */
  let unchecked = 0;

  const report = (id: DiagnosticId, message: string, node: AstNode): void => {
    if (unchecked > 0) return;
    diagnostics.push({
      id,
      severity: 'error',
      message,
      file: node.span.file,
      line: node.span.start.line,
      column: node.span.start.column,
    });
  };

  const all = (nodes: readonly AstNode[]): string => nodes.map(visit).join('');

  const scoped = (nodes: readonly AstNode[]): string => {
    scopes.push();
    try {
      return all(nodes);
    } finally {
      scopes.pop();
    }
  };

  const quiet = (nodes: readonly AstNode[]): string => {
    unchecked++;
    try {
      return all(nodes);
    } finally {
      unchecked--;
    }
  };

  function visit(node: AstNode): string {
    switch (node.kind) {
      case 'Program':
        return htmlDocument(all(node.children));
      case 'HeadSection':
        return all(node.children);
      case 'ParagrafSection':
        return paragraph(scoped(node.children));
      case 'ListSection':
        return unorderedList(scoped(node.children));
      case 'Title':
        return heading(node.content);
      case 'Text':
        return textRun(node.content);
      case 'Bold':
        return bold(all(node.children));
      case 'Italics':
        return italics(all(node.children));
      // List items are rendered but never checked.
      case 'Item':
        return listItem(quiet(node.children));
      case 'Newline':
        return lineBreak();
      case 'Sound':
        return audio(node.url);
      case 'Video':
        return video(node.url);
      case 'VariableDeclaration':
        if (!scopes.declare(node.name)) {
          report(
            DiagnosticIds.VariableRedeclared,
            `Variable '${node.name}' is already declared in this scope`,
            node,
          );
        }
        return '';
      case 'VariableAssignment':
        // No pending declaration: nothing to bind.
        if (node.name === undefined) return '';
        if (!scopes.assign(node.name, node.value)) {
          report(
            DiagnosticIds.AssignToUndeclared,
            `Cannot assign to undeclared variable '${node.name}'`,
            node,
          );
        }
        return '';
      case 'VariableReference': {
        const binding = scopes.lookup(node.name);
        if (binding === undefined) {
          report(
            DiagnosticIds.VariableUndeclared,
            `Variable '${node.name}' is used but never declared`,
            node,
          );
          return textRun(undefinedPlaceholder(node.name));
        }
        if (binding === null) {
          report(
            DiagnosticIds.VariableUnassigned,
            `Variable '${node.name}' is used but never assigned a value`,
            node,
          );
          return textRun(undefinedPlaceholder(node.name));
        }
        return textRun(binding);
      }
    }
  }

  return visit(program);
}

/**
 * Scope-check `program`. An empty result means the program is valid.
 */
export function validateProgram(program: ProgramNode): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  analyzeProgram(program, diagnostics);
  return diagnostics;
}

/**
 * Render `program` to HTML without reporting. Meant for trees that already validated.
 */
export function emitProgram(program: ProgramNode): string {
  return analyzeProgram(program, []);
}
