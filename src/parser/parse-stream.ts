/**
 * livyscan — Stream-level parser.
 * Turns one raw log stream into a lazy sequence of LogEvents.
 */

import type { LogEvent, RawLogFile } from '../types/index.js';
import { iterateLines } from './lines.js';
import { parseLine } from './parse-line.js';

/**
 * Parse a log stream. The result is restartable: every iteration scans
 * the text again from the first line and yields the identical sequence.
 * Blank lines produce no event.
 */
export function parseStream(file: RawLogFile): Iterable<LogEvent> {
  return {
    [Symbol.iterator]: () => generateEvents(file),
  };
}

function* generateEvents(file: RawLogFile): Generator<LogEvent> {
  for (const { text, lineNumber } of iterateLines(file.text)) {
    if (!text.trim()) continue;
    yield* parseLine(text, lineNumber, file.streamKind);
  }
}

/**
 * Parse a plain string, collecting every event. Useful for tests and
 * one-off inspection.
 */
export function parseString(text: string, streamKind: RawLogFile['streamKind'] = 'stdout'): LogEvent[] {
  return [...parseStream({ sessionId: '<input>', streamKind, text })];
}
