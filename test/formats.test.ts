import { describe, expect, it } from 'vitest';

import { tokenize } from '../src/frontend/lexer.js';
import { makeSourceFile } from '../src/frontend/source.js';
import { writeAst } from '../src/formats/writeAst.js';
import { writeHtml } from '../src/formats/writeHtml.js';
import { writeTokens } from '../src/formats/writeTokens.js';
import { doc, parseOk } from './helpers/parse.js';

describe('writeTokens', () => {
  it('lists one aligned row per token', () => {
    const tokens = tokenize(makeSourceFile('doc.lol', '#HAI\nhi there, friend\n#KTHXBYE'));
    expect(writeTokens(tokens).text).toBe(
      [
        '; token listing (8 tokens)',
        '1:1     HashWord  #HAI',
        '1:5     Newline',
        '2:1     VarDef    hi',
        '2:4     VarDef    there',
        '2:9     Text      ", friend"',
        '2:17    Newline',
        '3:1     HashWord  #KTHXBYE',
        '3:9     Eof',
        '',
      ].join('\n'),
    );
  });

  it('honors the requested line ending', () => {
    const tokens = tokenize(makeSourceFile('doc.lol', '#HAI'));
    expect(writeTokens(tokens, { lineEnding: '\r\n' }).text).toBe(
      '; token listing (2 tokens)\r\n1:1     HashWord  #HAI\r\n1:5     Eof\r\n',
    );
  });
});

describe('writeHtml', () => {
  it('keeps \\n by default', () => {
    expect(writeHtml('a\nb')).toEqual({ kind: 'html', text: 'a\nb' });
  });

  it('converts to \\r\\n without doubling existing ones', () => {
    expect(writeHtml('a\nb\r\nc', { lineEnding: '\r\n' }).text).toBe('a\r\nb\r\nc');
  });
});

describe('writeAst', () => {
  const program = parseOk(
    doc(
      '#HAI',
      '#MAEK PARAGRAF',
      '#I HAZ x',
      '#IT IZ hello #MKAY',
      '#GIMMEH BOLD #LEMME SEE x #MKAY #MKAY',
      '#OIC',
      '#KTHXBYE',
    ),
  );

  it('reduces spans to start positions and keeps node fields', () => {
    const { json } = writeAst(program);
    expect(json.format).toBe('lolcode-markdown-ast');
    expect(json.version).toBe(1);
    expect(json.file).toBe('doc.lol');
    expect(json.root).toEqual({
      kind: 'Program',
      line: 1,
      column: 1,
      children: [
        {
          kind: 'ParagrafSection',
          line: 2,
          column: 1,
          children: [
            { kind: 'VariableDeclaration', line: 3, column: 1, name: 'x' },
            { kind: 'VariableAssignment', line: 4, column: 1, name: 'x', value: 'hello' },
            {
              kind: 'Bold',
              line: 5,
              column: 1,
              children: [{ kind: 'VariableReference', line: 5, column: 14, name: 'x' }],
            },
          ],
        },
      ],
    });
  });

  it('records the file relative to rootDir', () => {
    const empty = parseOk('#HAI\n#KTHXBYE\n');
    expect(writeAst(empty, { rootDir: '.' }).json.file).toBe('doc.lol');
  });
});
