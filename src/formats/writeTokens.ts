import type { Token } from '../frontend/tokens.js';
import type { TokensArtifact, WriteTokensOptions } from './types.js';

function tokenValue(token: Token): string {
  switch (token.kind) {
    case 'HashWord':
    case 'Keyword':
    case 'VarDef':
      return token.text;
    case 'Text':
      return JSON.stringify(token.text);
    case 'Newline':
    case 'Eof':
      return '';
  }
}

/**
 * Create a deterministic `.tokens.txt` listing: one `line:column  Kind  value` row per token.
 *
 * Text values are JSON-quoted so their surrounding whitespace stays visible.
 */
export function writeTokens(tokens: Token[], opts?: WriteTokensOptions): TokensArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';

  const lines: string[] = [];
  lines.push(`; token listing (${tokens.length} tokens)`);
  for (const token of tokens) {
    const where = `${token.line}:${token.column}`.padEnd(8, ' ');
    lines.push(`${where}${token.kind.padEnd(10, ' ')}${tokenValue(token)}`.trimEnd());
  }

  return { kind: 'tokens', text: lines.join(lineEnding) + lineEnding };
}
