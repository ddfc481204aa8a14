import type { ProgramNode } from '../frontend/ast.js';
import type { Token } from '../frontend/tokens.js';

/**
 * Options for HTML writing.
 */
export interface WriteHtmlOptions {
  /**
   * Line ending to use in the written document.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for the token listing.
 */
export interface WriteTokensOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for AST JSON writing.
 */
export interface WriteAstOptions {
  /**
   * Base directory used to normalize the recorded source path.
   * When provided, the path is made project-relative and uses `/` separators.
   */
  rootDir?: string;
}

/**
 * In-memory HTML document artifact.
 */
export interface HtmlArtifact {
  kind: 'html';
  path?: string;
  text: string;
}

/**
 * In-memory token listing artifact (`.tokens.txt`).
 */
export interface TokensArtifact {
  kind: 'tokens';
  path?: string;
  text: string;
}

/**
 * In-memory syntax tree artifact (`.ast.json`).
 */
export interface AstArtifact {
  kind: 'ast';
  path?: string;
  json: AstJson;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = HtmlArtifact | TokensArtifact | AstArtifact;

/**
 * Serialized tree node: the node's own fields with its span reduced to a start line/column.
 */
export type AstJsonNode = {
  kind: string;
  line: number;
  column: number;
  children?: AstJsonNode[];
  [key: string]: unknown;
};

export type AstJson = {
  format: 'lolcode-markdown-ast';
  version: 1;
  file: string;
  root: AstJsonNode;
};

/**
 * Format writers used by the pipeline to turn compiler output into artifacts.
 */
export interface FormatWriters {
  writeHtml(html: string, opts?: WriteHtmlOptions): HtmlArtifact;
  writeTokens(tokens: Token[], opts?: WriteTokensOptions): TokensArtifact;
  writeAst(program: ProgramNode, opts?: WriteAstOptions): AstArtifact;
}
