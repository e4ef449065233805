/**
 * Line scanner. Walks the text with indexOf so that large logs are never
 * split into one big array.
 */

export interface SourceLine {
  text: string;
  /** 1-indexed */
  lineNumber: number;
}

export function* iterateLines(text: string): Generator<SourceLine> {
  let start = 0;
  let lineNumber = 0;
  while (start < text.length) {
    let end = text.indexOf('\n', start);
    if (end < 0) end = text.length;
    lineNumber++;
    const stop = end > start && text.charCodeAt(end - 1) === 13 ? end - 1 : end; // \r\n
    yield { text: text.slice(start, stop), lineNumber };
    start = end + 1;
  }
}
