import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DOCUMENT_TITLE, htmlDocument } from '../src/lowering/html.js';
import { analyzeProgram, emitProgram } from '../src/semantics/analyze.js';
import { doc, parseOk } from './helpers/parse.js';

function render(text: string): string {
  return emitProgram(parseOk(text));
}

describe('HTML emission', () => {
  it('wraps the body in a fixed document skeleton', () => {
    expect(render(doc('#HAI', '#KTHXBYE'))).toBe(
      [
        '<!DOCTYPE html>',
        '<html>',
        '<head>',
        '<meta charset="UTF-8">',
        `<title>${DOCUMENT_TITLE}</title>`,
        '</head>',
        '<body>',
        '</body>',
        '</html>',
      ].join('\n'),
    );
  });

  it('renders head titles as headings', () => {
    const html = render(
      doc('#HAI', '#MAEK HEAD', '#GIMMEH TITLE My Page #MKAY', '#OIC', '#KTHXBYE'),
    );
    expect(html).toContain('<h1>My Page</h1>');
    expect(html).toBe(htmlDocument('<h1>My Page</h1>\n'));
  });

  it('substitutes an assigned value with a trailing space', () => {
    const html = render(
      doc(
        '#HAI',
        '#MAEK PARAGRAF',
        '#I HAZ x',
        '#IT IZ hello #MKAY',
        '#LEMME SEE x #MKAY',
        '#OIC',
        '#KTHXBYE',
      ),
    );
    expect(html).toBe(htmlDocument('<p>\nhello </p>\n'));
  });

  it('renders an assigned value exactly as its pieces are written', () => {
    const html = render(
      doc(
        '#HAI',
        '#MAEK PARAGRAF',
        '#I HAZ x',
        '#IT IZ Hello, world #MKAY',
        '#LEMME SEE x #MKAY',
        '#OIC',
        '#KTHXBYE',
      ),
    );
    expect(html).toBe(htmlDocument('<p>\nHello, world </p>\n'));
  });

  it('resolves outer paragraf bindings in nested sections', () => {
    const html = render(
      doc(
        '#HAI',
        '#MAEK PARAGRAF',
        '#I HAZ x',
        '#IT IZ v #MKAY',
        '#MAEK PARAGRAF',
        '#LEMME SEE x #MKAY',
        '#OIC',
        '#MAEK LIST',
        '#GIMMEH ITEM #LEMME SEE x #MKAY #MKAY',
        '#OIC',
        '#OIC',
        '#KTHXBYE',
      ),
    );
    expect(html).toBe(htmlDocument('<p>\n<p>\nv </p>\n<ul>\n<li>v </li>\n</ul>\n</p>\n'));
  });

  it('renders unresolved list item references without reporting them', () => {
    const diagnostics: Diagnostic[] = [];
    const html = analyzeProgram(
      parseOk(doc('#HAI', '#MAEK LIST', '#GIMMEH ITEM see #LEMME SEE b #MKAY #MKAY', '#OIC', '#KTHXBYE')),
      diagnostics,
    );
    expect(html).toBe(htmlDocument('<ul>\n<li>see [undefined: b] </li>\n</ul>\n'));
    expect(diagnostics).toEqual([]);
  });

  it('renders list items in source order', () => {
    const html = render(
      doc(
        '#HAI',
        '#MAEK LIST',
        '#GIMMEH ITEM one #MKAY',
        '#GIMMEH ITEM two #MKAY',
        '#OIC',
        '#KTHXBYE',
      ),
    );
    expect(html).toBe(htmlDocument('<ul>\n<li>one </li>\n<li>two </li>\n</ul>\n'));
  });

  it('renders inline styles, line breaks and media', () => {
    const html = render(
      doc(
        '#HAI',
        '#MAEK PARAGRAF',
        'Hello',
        '#GIMMEH BOLD big #MKAY',
        '#GIMMEH ITALICS small #MKAY',
        '#GIMMEH NEWLINE',
        '#GIMMEH SOUNDZ clip.mp3 #MKAY',
        '#GIMMEH VIDZ movie.mp4 #MKAY',
        '#OIC',
        '#KTHXBYE',
      ),
    );
    expect(html).toBe(
      htmlDocument(
        '<p>\n' +
          'Hello <b>big </b><i>small </i><br>\n' +
          '<audio controls src="clip.mp3"></audio>\n' +
          '<video controls src="movie.mp4"></video>\n' +
          '</p>\n',
      ),
    );
  });

  it('uses the innermost binding when shadowing', () => {
    const html = render(
      doc(
        '#HAI',
        '#I HAZ x',
        '#IT IZ outer #MKAY',
        '#MAEK PARAGRAF',
        '#I HAZ x',
        '#IT IZ inner #MKAY',
        '#LEMME SEE x #MKAY',
        '#OIC',
        '#MAEK PARAGRAF',
        '#LEMME SEE x #MKAY',
        '#OIC',
        '#KTHXBYE',
      ),
    );
    expect(html).toBe(htmlDocument('<p>\ninner </p>\n<p>\nouter </p>\n'));
  });

  it('renders a placeholder for unresolved references', () => {
    const diagnostics: Diagnostic[] = [];
    const html = analyzeProgram(
      parseOk(doc('#HAI', '#MAEK PARAGRAF', '#LEMME SEE ghost #MKAY', '#OIC', '#KTHXBYE')),
      diagnostics,
    );
    expect(html).toBe(htmlDocument('<p>\n[undefined: ghost] </p>\n'));
    expect(diagnostics).toHaveLength(1);
  });

  it('passes content through without escaping', () => {
    const html = render(doc('#HAI', '#MAEK PARAGRAF', '<em>raw</em>', '#OIC', '#KTHXBYE'));
    expect(html).toBe(htmlDocument('<p>\n<em>raw</em> </p>\n'));
  });

  it('produces identical output for identical input', () => {
    const text = doc('#HAI', '#MAEK LIST', '#GIMMEH ITEM one #MKAY', '#OIC', '#KTHXBYE');
    expect(render(text)).toBe(render(text));
  });
});
