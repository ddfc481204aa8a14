import type { HtmlArtifact, WriteHtmlOptions } from './types.js';

/**
 * Wrap an emitted HTML document as an artifact, converting line endings when asked to.
 */
export function writeHtml(html: string, opts?: WriteHtmlOptions): HtmlArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const text = lineEnding === '\n' ? html : html.replace(/\r?\n/g, lineEnding);
  return { kind: 'html', text };
}
