import type {
  BodyNode,
  HeadSectionNode,
  InlineNode,
  ItemNode,
  ListSectionNode,
  ParagrafSectionNode,
  ProgramNode,
  SectionNode,
  StyledNode,
  TextNode,
  TitleNode,
  VariableAssignmentNode,
  VariableDeclarationNode,
  VariableReferenceNode,
} from './ast.js';
import { Lexer } from './lexer.js';
import { makeSourceFile, span, type SourceFile } from './source.js';
import {
  describeToken,
  isHash,
  isKeywordToken,
  type HashWord,
  type Keyword,
  type Token,
} from './tokens.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticError, DiagnosticIds } from '../diagnostics/types.js';

/**
 * Recursive-descent parser with one token of lookahead, pulling tokens from a {@link Lexer} on demand.
 *
 * Every rule consumes its closing hash word before returning; the first violation throws a
 * {@link DiagnosticError} positioned at the lookahead token.
 */
class Parser {
  private readonly lexer: Lexer;
  private current: Token;
  /** End offset of the most recently consumed token. */
  private lastEnd = 0;
  /** Most recent declaration still waiting for its `#IT IZ`. */
  private pending: string | undefined;

  constructor(private readonly file: SourceFile) {
    this.lexer = new Lexer(file);
    this.current = this.lexer.nextToken();
  }

  program(): ProgramNode {
    const start = this.expectHash('#HAI');
    this.skipNewlines();
    const children = this.body();
    this.skipNewlines();
    this.expectHash('#KTHXBYE');
    const end = this.lastEnd;
    this.skipNewlines();
    if (this.current.kind !== 'Eof') {
      this.fail('Unexpected tokens after #KTHXBYE', DiagnosticIds.TrailingTokens);
    }
    return { kind: 'Program', span: span(this.file, start.offset, end), children };
  }

  // Top level never rejects a token: text-like tokens become Text, stray hash words are dropped.
  private body(): BodyNode[] {
    const nodes: BodyNode[] = [];
    for (;;) {
      this.skipNewlines();
      const tok = this.current;
      if (tok.kind === 'Eof' || isHash(tok, '#KTHXBYE')) return nodes;

      switch (tok.kind) {
        case 'HashWord':
          switch (tok.text) {
            case '#MAEK':
              nodes.push(this.section());
              break;
            case '#I HAZ':
              nodes.push(this.declaration());
              this.skipNewlines();
              if (isHash(this.current, '#IT IZ')) nodes.push(this.assignment());
              break;
            case '#LEMME SEE':
              nodes.push(this.reference());
              break;
            case '#GIMMEH':
              nodes.push(this.styled());
              break;
            default:
              this.advance();
          }
          break;
        case 'Text':
        case 'VarDef':
        case 'Keyword':
          this.advance();
          nodes.push(this.text(tok.text, tok));
          break;
        default:
          this.advance();
      }
    }
  }

  private section(): SectionNode {
    const start = this.expectHash('#MAEK');
    this.skipNewlines();
    const kw = this.current;
    if (kw.kind !== 'Keyword') {
      return this.fail(`Expected section type after #MAEK but found ${describeToken(kw)}`);
    }
    switch (kw.text) {
      case 'HEAD':
        return this.headSection(start);
      case 'PARAGRAF':
        return this.paragrafSection(start);
      case 'LIST':
        return this.listSection(start);
      default:
        return this.fail(`Unknown section type '${kw.text}'`);
    }
  }

  private headSection(start: Token): HeadSectionNode {
    this.expectKeyword('HEAD');
    const children: TitleNode[] = [];
    for (;;) {
      this.skipNewlines();
      if (!isHash(this.current, '#GIMMEH')) break;
      children.push(this.title());
    }
    this.expectHash('#OIC');
    return { kind: 'HeadSection', span: this.spanFrom(start), children };
  }

  private title(): TitleNode {
    const start = this.expectHash('#GIMMEH');
    this.expectKeyword('TITLE');
    const parts: string[] = [];
    for (let tok = this.current; !isHash(tok, '#MKAY'); tok = this.current) {
      if (tok.kind === 'Text' || tok.kind === 'VarDef') {
        parts.push(tok.text);
      } else if (tok.kind !== 'Newline') {
        this.fail(`Unexpected token in TITLE: ${describeToken(tok)}`);
      }
      this.advance();
    }
    this.expectHash('#MKAY');
    return { kind: 'Title', span: this.spanFrom(start), content: parts.join(' ').trim() };
  }

  private paragrafSection(start: Token): ParagrafSectionNode {
    this.expectKeyword('PARAGRAF');
    const children: BodyNode[] = [];
    for (;;) {
      this.skipNewlines();
      const node = this.paragrafContent();
      if (!node) break;
      children.push(node);
    }
    this.expectHash('#OIC');
    return { kind: 'ParagrafSection', span: this.spanFrom(start), children };
  }

  /**
   * One construct inside a paragraf, or `undefined` at the first token that starts none; the caller's
   * `#OIC` check then reports that token.
   */
  private paragrafContent(): BodyNode | undefined {
    const tok = this.current;
    switch (tok.kind) {
      case 'HashWord':
        switch (tok.text) {
          case '#I HAZ':
            return this.declaration();
          case '#IT IZ':
            return this.assignment();
          case '#LEMME SEE':
            return this.reference();
          case '#GIMMEH':
            return this.styled();
          case '#MAEK':
            return this.section();
          default:
            return undefined;
        }
      case 'Text':
      case 'VarDef':
        this.advance();
        return this.text(tok.text, tok);
      default:
        return undefined;
    }
  }

  private listSection(start: Token): ListSectionNode {
    this.expectKeyword('LIST');
    const children: ItemNode[] = [];
    for (;;) {
      this.skipNewlines();
      if (!isHash(this.current, '#GIMMEH')) break;
      children.push(this.item());
    }
    this.expectHash('#OIC');
    return { kind: 'ListSection', span: this.spanFrom(start), children };
  }

  private item(): ItemNode {
    const start = this.expectHash('#GIMMEH');
    this.expectKeyword('ITEM');
    const children = this.inlineRun();
    this.expectHash('#MKAY');
    return { kind: 'Item', span: this.spanFrom(start), children };
  }

  private declaration(): VariableDeclarationNode {
    const start = this.expectHash('#I HAZ');
    const tok = this.current;
    if (tok.kind !== 'VarDef') {
      return this.fail(`Expected variable name after #I HAZ but found ${describeToken(tok)}`);
    }
    this.advance();
    this.pending = tok.text;
    return { kind: 'VariableDeclaration', span: this.spanFrom(start), name: tok.text };
  }

  private assignment(): VariableAssignmentNode {
    const start = this.expectHash('#IT IZ');
    const parts: string[] = [];
    for (let tok = this.current; tok.kind === 'Text' || tok.kind === 'VarDef'; tok = this.current) {
      parts.push(tok.text);
      this.advance();
    }
    this.expectHash('#MKAY');

    const name = this.pending;
    this.pending = undefined;
    return {
      kind: 'VariableAssignment',
      span: this.spanFrom(start),
      ...(name !== undefined ? { name } : {}),
      value: parts.join('').trim(),
    };
  }

  private reference(): VariableReferenceNode {
    const start = this.expectHash('#LEMME SEE');
    const tok = this.current;
    if (tok.kind !== 'VarDef') {
      return this.fail(`Expected variable name after #LEMME SEE but found ${describeToken(tok)}`);
    }
    this.advance();
    this.expectHash('#MKAY');
    return { kind: 'VariableReference', span: this.spanFrom(start), name: tok.text };
  }

  private styled(): StyledNode {
    const start = this.expectHash('#GIMMEH');
    const style = this.current;
    if (style.kind !== 'Keyword') {
      return this.fail(`Expected style keyword after #GIMMEH but found ${describeToken(style)}`);
    }

    switch (style.text) {
      case 'NEWLINE':
        this.advance();
        return { kind: 'Newline', span: this.spanFrom(start) };
      case 'SOUNDZ':
      case 'VIDZ': {
        this.advance();
        const url = this.urlRun();
        this.expectHash('#MKAY');
        return style.text === 'SOUNDZ'
          ? { kind: 'Sound', span: this.spanFrom(start), url }
          : { kind: 'Video', span: this.spanFrom(start), url };
      }
      case 'BOLD':
      case 'ITALICS': {
        this.advance();
        const children = this.inlineRun();
        this.expectHash('#MKAY');
        return style.text === 'BOLD'
          ? { kind: 'Bold', span: this.spanFrom(start), children }
          : { kind: 'Italics', span: this.spanFrom(start), children };
      }
      default:
        return this.fail(`Unknown style '${style.text}'`);
    }
  }

  /** Text, identifiers and variable references, up to the first other token. */
  private inlineRun(): InlineNode[] {
    const children: InlineNode[] = [];
    for (;;) {
      const tok = this.current;
      if (isHash(tok, '#LEMME SEE')) {
        children.push(this.reference());
      } else if (tok.kind === 'Text' || tok.kind === 'VarDef') {
        this.advance();
        children.push(this.text(tok.text, tok));
      } else {
        return children;
      }
    }
  }

  /** URL pieces are joined without separators; line breaks inside a URL are dropped. */
  private urlRun(): string {
    let url = '';
    for (;;) {
      const tok = this.current;
      if (tok.kind === 'Text' || tok.kind === 'VarDef') {
        url += tok.text;
      } else if (tok.kind !== 'Newline') {
        return url.trim();
      }
      this.advance();
    }
  }

  private text(content: string, tok: Token): TextNode {
    return { kind: 'Text', span: span(this.file, tok.offset, tok.endOffset), content };
  }

  private advance(): Token {
    const tok = this.current;
    this.lastEnd = tok.endOffset;
    this.current = this.lexer.nextToken();
    return tok;
  }

  private skipNewlines(): void {
    while (this.current.kind === 'Newline') this.advance();
  }

  private expectHash(word: HashWord): Token {
    if (isHash(this.current, word)) return this.advance();
    return this.fail(`Expected '${word}' but found ${describeToken(this.current)}`);
  }

  private expectKeyword(word: Keyword): Token {
    if (isKeywordToken(this.current, word)) return this.advance();
    return this.fail(`Expected keyword '${word}' but found ${describeToken(this.current)}`);
  }

  private spanFrom(start: Token) {
    return span(this.file, start.offset, this.lastEnd);
  }

  private fail(message: string, id: DiagnosticId = DiagnosticIds.ParseError): never {
    throw new DiagnosticError({
      id,
      severity: 'error',
      message,
      file: this.file.path,
      line: this.current.line,
      column: this.current.column,
    });
  }
}

/**
 * Parse a whole LOLCODE-markdown document.
 *
 * Lexical and syntax errors are fatal: exactly one diagnostic is appended and `undefined` returned.
 */
export function parseProgram(
  path: string,
  text: string,
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  try {
    return new Parser(makeSourceFile(path, text)).program();
  } catch (err) {
    if (err instanceof DiagnosticError) {
      diagnostics.push(err.diagnostic);
      return undefined;
    }
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file: path,
    });
    return undefined;
  }
}
