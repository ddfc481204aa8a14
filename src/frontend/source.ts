import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * A document being compiled, with the offset at which each of its lines begins.
 */
export interface SourceFile {
  /** Path as given by the caller; copied into spans and diagnostics. */
  path: string;
  text: string;
  /** Offset of the first character of every line, ascending; `lineStarts[0]` is 0. */
  lineStarts: number[];
}

export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let nl = text.indexOf('\n'); nl !== -1; nl = text.indexOf('\n', nl + 1)) {
    lineStarts.push(nl + 1);
  }
  return { path, text, lineStarts };
}

/** Index of the last line starting at or before `offset`. */
function lineIndexAt(lineStarts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/**
 * Line and column of `offset`, both 1-based.
 *
 * Columns count code points, so a character outside the BMP takes one column. Offsets past the
 * end of the text clamp to the end, where `Eof` tokens sit.
 */
export function posAtOffset(file: SourceFile, offset: number): SourcePosition {
  const at = Math.max(0, Math.min(offset, file.text.length));
  const index = lineIndexAt(file.lineStarts, at);
  const lineStart = file.lineStarts[index] ?? 0;
  const column = [...file.text.slice(lineStart, at)].length + 1;
  return { line: index + 1, column, offset: at };
}

/**
 * Span over `[startOffset, endOffset)`; an end before the start collapses to the start.
 */
export function span(file: SourceFile, startOffset: number, endOffset: number): SourceSpan {
  return {
    file: file.path,
    start: posAtOffset(file, startOffset),
    end: posAtOffset(file, Math.max(startOffset, endOffset)),
  };
}
