import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticError, DiagnosticIds } from '../src/diagnostics/types.js';
import { Lexer, tokenize, tokenizeSource } from '../src/frontend/lexer.js';
import { makeSourceFile } from '../src/frontend/source.js';
import type { Token } from '../src/frontend/tokens.js';

function lex(text: string): Token[] {
  return tokenize(makeSourceFile('doc.lol', text));
}

function summary(tokens: Token[]): string[] {
  return tokens.map((t) => ('text' in t ? `${t.kind}:${t.text}` : t.kind));
}

function lexError(text: string): Diagnostic | undefined {
  const diagnostics: Diagnostic[] = [];
  expect(tokenizeSource('doc.lol', text, diagnostics)).toBeUndefined();
  expect(diagnostics).toHaveLength(1);
  return diagnostics[0];
}

describe('lexer', () => {
  it('tokenizes the minimal document with positions', () => {
    const tokens = lex('#HAI\n#KTHXBYE');
    expect(tokens).toEqual([
      { kind: 'HashWord', text: '#HAI', line: 1, column: 1, offset: 0, endOffset: 4 },
      { kind: 'Newline', line: 1, column: 5, offset: 4, endOffset: 5 },
      { kind: 'HashWord', text: '#KTHXBYE', line: 2, column: 1, offset: 5, endOffset: 13 },
      { kind: 'Eof', line: 2, column: 9, offset: 13, endOffset: 13 },
    ]);
  });

  it('ends every successful run with exactly one Eof', () => {
    const tokens = lex('#HAI\n#MAEK PARAGRAF\nsome words here\n#OIC\n#KTHXBYE\n');
    expect(tokens.filter((t) => t.kind === 'Eof')).toHaveLength(1);
    expect(tokens[tokens.length - 1]?.kind).toBe('Eof');
  });

  it('keeps returning Eof once input is exhausted', () => {
    const lexer = new Lexer(makeSourceFile('doc.lol', '#HAI'));
    expect(lexer.nextToken().kind).toBe('HashWord');
    expect(lexer.nextToken().kind).toBe('Eof');
    expect(lexer.nextToken().kind).toBe('Eof');
  });

  it('reads hash words case-insensitively and merges two-word forms', () => {
    expect(summary(lex('#hai #I HAZ name #it iz #Lemme See #mkay'))).toEqual([
      'HashWord:#HAI',
      'HashWord:#I HAZ',
      'VarDef:name',
      'HashWord:#IT IZ',
      'HashWord:#LEMME SEE',
      'HashWord:#MKAY',
      'Eof',
    ]);
  });

  it('uppercases keywords and keeps identifiers verbatim', () => {
    expect(summary(lex('bold Bold Item2 myVar'))).toEqual([
      'Keyword:BOLD',
      'Keyword:BOLD',
      'VarDef:Item2',
      'VarDef:myVar',
      'Eof',
    ]);
  });

  it('reads non-identifier runs as trimmed text up to a newline or hash', () => {
    const tokens = lex('hello, there!  #MKAY');
    expect(summary(tokens)).toEqual(['VarDef:hello', 'Text:, there!', 'HashWord:#MKAY', 'Eof']);
    expect(tokens[1]).toMatchObject({ line: 1, column: 6 });
  });

  it('drops blank runs such as carriage returns', () => {
    expect(summary(lex('#HAI\r\n#KTHXBYE'))).toEqual([
      'HashWord:#HAI',
      'Newline',
      'HashWord:#KTHXBYE',
      'Eof',
    ]);
  });

  it('skips comments without producing tokens', () => {
    expect(summary(lex('#HAI #OBTW anything #GIMMEH here\nstill #TLDR #KTHXBYE'))).toEqual([
      'HashWord:#HAI',
      'HashWord:#KTHXBYE',
      'Eof',
    ]);
  });

  it('produces the same stream with and without a comment', () => {
    const plain = summary(lex('#HAI\nhello\n#KTHXBYE'));
    const commented = summary(lex('#HAI\nhello #OBTW note #TLDR\n#KTHXBYE'));
    expect(commented).toEqual(plain);
  });

  it('reports an unknown hash word at the hash position', () => {
    const d = lexError('#HAI\n  #FOO bar');
    expect(d).toEqual({
      id: DiagnosticIds.UnrecognizedHashWord,
      severity: 'error',
      message: "Unrecognized hashtag word '#FOO'",
      file: 'doc.lol',
      line: 2,
      column: 3,
    });
  });

  it('counts columns in code points', () => {
    const d = lexError('\u{1F600} #FOO');
    expect(d).toMatchObject({ line: 1, column: 3 });
  });

  it('does not backtrack after a failed two-word lookahead', () => {
    const d = lexError('#I CAN');
    expect(d?.message).toBe("Unrecognized hashtag word '#I'");
    expect(d?.column).toBe(1);
  });

  it('reports an unclosed comment at its opening', () => {
    const d = lexError('#HAI\n#OBTW this has no closing tag');
    expect(d).toMatchObject({
      id: DiagnosticIds.UnclosedComment,
      message: 'Unclosed comment block - missing #TLDR',
      line: 2,
      column: 1,
    });
  });

  it('throws DiagnosticError from tokenize', () => {
    expect(() => lex('#NOPE')).toThrow(DiagnosticError);
  });
});
