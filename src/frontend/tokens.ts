/**
 * Token contracts shared by the lexer, the parser and the token listing writer.
 */

/**
 * Closed set of `#`-prefixed structural words, stored with their `#` and a single inner space.
 */
export const HASH_WORDS = [
  '#HAI',
  '#KTHXBYE',
  '#OBTW',
  '#TLDR',
  '#MAEK',
  '#OIC',
  '#GIMMEH',
  '#MKAY',
  '#I HAZ',
  '#IT IZ',
  '#LEMME SEE',
] as const;

export type HashWord = (typeof HASH_WORDS)[number];

/**
 * Closed set of bare reserved words naming a section or style kind.
 */
export const KEYWORDS = [
  'HEAD',
  'TITLE',
  'PARAGRAF',
  'BOLD',
  'ITALICS',
  'LIST',
  'ITEM',
  'NEWLINE',
  'SOUNDZ',
  'VIDZ',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

/**
 * First words that may open a two-word hash word, mapped to the second word that completes it.
 */
export const HASH_WORD_PAIRS: ReadonlyMap<string, string> = new Map([
  ['I', 'HAZ'],
  ['IT', 'IZ'],
  ['LEMME', 'SEE'],
]);

export type TokenKind =
  | { readonly kind: 'HashWord'; readonly text: HashWord }
  | { readonly kind: 'Keyword'; readonly text: Keyword }
  | { readonly kind: 'Text'; readonly text: string }
  | { readonly kind: 'VarDef'; readonly text: string }
  | { readonly kind: 'Newline' }
  | { readonly kind: 'Eof' };

/**
 * Position fields shared by every token.
 */
export interface TokenPosition {
  /** 1-based line of the token's first character. */
  readonly line: number;
  /** 1-based column of the token's first character. */
  readonly column: number;
  /** 0-based offset of the token's first character. */
  readonly offset: number;
  /** 0-based exclusive end offset. */
  readonly endOffset: number;
}

export type Token = TokenKind & TokenPosition;

const hashWordSet: ReadonlySet<string> = new Set(HASH_WORDS);
const keywordSet: ReadonlySet<string> = new Set(KEYWORDS);

export function isHashWord(text: string): text is HashWord {
  return hashWordSet.has(text);
}

export function isKeyword(text: string): text is Keyword {
  return keywordSet.has(text);
}

export function isHash(token: Token, word: HashWord): boolean {
  return token.kind === 'HashWord' && token.text === word;
}

export function isKeywordToken(token: Token, word: Keyword): boolean {
  return token.kind === 'Keyword' && token.text === word;
}

/**
 * Human-readable rendering used in syntax error messages and the token listing.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'HashWord':
      return `hashtag word '${token.text}'`;
    case 'Keyword':
      return `keyword '${token.text}'`;
    case 'Text':
      return `text "${token.text}"`;
    case 'VarDef':
      return `identifier '${token.text}'`;
    case 'Newline':
      return 'newline';
    case 'Eof':
      return 'end of input';
  }
}
