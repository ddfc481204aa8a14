// HTML fragment shapes. Content is inserted verbatim: the markup language passes raw HTML through.

export const DOCUMENT_TITLE = 'LOLCODE Markdown';

export function htmlDocument(body: string): string {
  return (
    '<!DOCTYPE html>\n' +
    '<html>\n' +
    '<head>\n' +
    '<meta charset="UTF-8">\n' +
    `<title>${DOCUMENT_TITLE}</title>\n` +
    '</head>\n' +
    '<body>\n' +
    body +
    '</body>\n' +
    '</html>'
  );
}

export function paragraph(inner: string): string {
  return `<p>\n${inner}</p>\n`;
}

export function unorderedList(inner: string): string {
  return `<ul>\n${inner}</ul>\n`;
}

export function listItem(inner: string): string {
  return `<li>${inner}</li>\n`;
}

export function heading(content: string): string {
  return `<h1>${content}</h1>\n`;
}

/** Text runs carry one trailing space so adjacent runs stay separated. */
export function textRun(content: string): string {
  return `${content} `;
}

export function bold(inner: string): string {
  return `<b>${inner}</b>`;
}

export function italics(inner: string): string {
  return `<i>${inner}</i>`;
}

export function lineBreak(): string {
  return '<br>\n';
}

export function audio(url: string): string {
  return `<audio controls src="${url}"></audio>\n`;
}

export function video(url: string): string {
  return `<video controls src="${url}"></video>\n`;
}

export function undefinedPlaceholder(name: string): string {
  return `[undefined: ${name}]`;
}
