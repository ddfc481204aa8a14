import {
  DiagnosticError,
  DiagnosticIds,
  type Diagnostic,
  type DiagnosticId,
} from '../diagnostics/types.js';
import { makeSourceFile, posAtOffset, type SourceFile } from './source.js';
import {
  HASH_WORD_PAIRS,
  isHashWord,
  isKeyword,
  type HashWord,
  type Token,
  type TokenKind,
} from './tokens.js';

function isAlpha(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z]$/.test(ch);
}

function isAlphaNumeric(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9]$/.test(ch);
}

/**
 * Pull-based tokenizer over a single source file.
 *
 * Each call to {@link Lexer.nextToken} yields one token; once input is exhausted every further call
 * yields `Eof`. Spaces and tabs separate tokens, but every `\n` is a `Newline` token of its own.
 * `#OBTW ... #TLDR` comments and blank text runs produce no token at all.
 *
 * Lexical errors throw a {@link DiagnosticError}; the lexer is not usable afterwards.
 */
export class Lexer {
  private pos = 0;

  constructor(private readonly file: SourceFile) {}

  nextToken(): Token {
    for (;;) {
      this.skipBlanks();
      const start = this.pos;
      const ch = this.peek();

      if (ch === undefined) return this.token({ kind: 'Eof' }, start);

      if (ch === '\n') {
        this.pos++;
        return this.token({ kind: 'Newline' }, start);
      }

      if (ch === '#') {
        const word = this.readHashWord(start);
        if (word === '#OBTW') {
          this.skipComment(start);
          continue;
        }
        return this.token({ kind: 'HashWord', text: word }, start);
      }

      if (isAlpha(ch)) {
        const raw = this.readWhile(isAlphaNumeric);
        const upper = raw.toUpperCase();
        return isKeyword(upper)
          ? this.token({ kind: 'Keyword', text: upper }, start)
          : this.token({ kind: 'VarDef', text: raw }, start);
      }

      const text = this.readWhile((c) => c !== '\n' && c !== '#').trim();
      if (text.length === 0) continue;
      return this.token({ kind: 'Text', text }, start);
    }
  }

  private peek(): string | undefined {
    return this.file.text[this.pos];
  }

  private skipBlanks(): void {
    while (this.peek() === ' ' || this.peek() === '\t') this.pos++;
  }

  private readWhile(accept: (ch: string) => boolean): string {
    const start = this.pos;
    for (let ch = this.peek(); ch !== undefined && accept(ch); ch = this.peek()) {
      this.pos++;
    }
    return this.file.text.slice(start, this.pos);
  }

  /**
   * Read `#WORD`, merging `I HAZ`, `IT IZ` and `LEMME SEE`.
   *
   * The second word is consumed before it is compared; when it does not complete the pair it stays
   * consumed and only the first word is classified.
   */
  private readHashWord(start: number): HashWord {
    this.pos++;
    let word = this.readWhile(isAlpha).toUpperCase();

    const pair = HASH_WORD_PAIRS.get(word);
    if (pair !== undefined && this.peek() === ' ') {
      this.pos++;
      const second = this.readWhile(isAlpha).toUpperCase();
      if (second === pair) word = `${word} ${pair}`;
    }

    const full = `#${word}`;
    if (isHashWord(full)) return full;
    return this.fail(DiagnosticIds.UnrecognizedHashWord, `Unrecognized hashtag word '${full}'`, start);
  }

  /**
   * Skip past the `#TLDR` closing a comment opened at `openedAt`. Any other `#` text inside the
   * comment is ordinary content.
   */
  private skipComment(openedAt: number): void {
    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        this.fail(DiagnosticIds.UnclosedComment, 'Unclosed comment block - missing #TLDR', openedAt);
      }
      this.pos++;
      if (ch === '#' && this.readWhile(isAlpha).toUpperCase() === 'TLDR') return;
    }
  }

  private token(kind: TokenKind, start: number): Token {
    const { line, column } = posAtOffset(this.file, start);
    return { ...kind, line, column, offset: start, endOffset: this.pos };
  }

  private fail(id: DiagnosticId, message: string, at: number): never {
    const { line, column } = posAtOffset(this.file, at);
    throw new DiagnosticError({
      id,
      severity: 'error',
      message,
      file: this.file.path,
      line,
      column,
    });
  }
}

/**
 * Drain a fresh lexer over `file`. The returned array always ends with exactly one `Eof` token.
 */
export function tokenize(file: SourceFile): Token[] {
  const lexer = new Lexer(file);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.nextToken();
    tokens.push(token);
    if (token.kind === 'Eof') return tokens;
  }
}

/**
 * Tokenize `text` without parsing it.
 *
 * A lexical error is fatal: exactly one diagnostic is appended and `undefined` returned.
 */
export function tokenizeSource(
  path: string,
  text: string,
  diagnostics: Diagnostic[],
): Token[] | undefined {
  try {
    return tokenize(makeSourceFile(path, text));
  } catch (err) {
    if (!(err instanceof DiagnosticError)) throw err;
    diagnostics.push(err.diagnostic);
    return undefined;
  }
}
