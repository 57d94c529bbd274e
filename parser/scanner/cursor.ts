/**
 * Cursor - immutable view over the remaining input.
 *
 * Offsets are UTF-16 code units into `source`. Moving forward returns a new
 * cursor. Two cursors over the same input compare by `length`.
 */

import { CharacterCodes } from './character-codes';
import type { ErrorCallback } from './parse-result';

export interface Cursor {
  /** Whole input the cursor views. */
  readonly source: string;

  /** Offset of the first remaining unit. */
  readonly pos: number;

  /** Offset just past the last unit (exclusive). */
  readonly end: number;

  /** Remaining units, `end - pos`. */
  readonly length: number;

  /** Diagnostics hook shared by every derived cursor. */
  readonly onError: ErrorCallback | undefined;

  isEmpty(): boolean;

  /** Remaining text. */
  rest(): string;

  /** Code unit at a relative offset, or -1 past the end. */
  charCodeAt(offset: number): number;

  /** Code point at a relative offset, or undefined past the end. */
  codePointAt(offset: number): number | undefined;

  startsWith(pattern: string): boolean;

  /** Relative offset of the next occurrence of `text`, or -1. */
  indexOf(text: string): number;

  /** Cursor `n` units further on. */
  advance(n: number): Cursor;

  /** The first `n` remaining units as text. */
  until(n: number): string;

  /** Empty cursor at end of input. */
  finish(): Cursor;

  fillDebugState(state: CursorDebugState): void;
}

export interface CursorOptions {
  /** Called once at the site of a literal or comment failure. */
  onError?: ErrorCallback;
}

export interface CursorDebugState {
  pos: number;
  end: number;
  length: number;

  /** 1-based line of `pos`. */
  line: number;

  /** 1-based column of `pos`, counted in code units. */
  column: number;

  /** Next code point as text, or '' at end of input. */
  nextChar: string;
}

export function createCursor(source: string, options: CursorOptions = {}): Cursor {
  return makeCursor(source, 0, source.length, options.onError);
}

function makeCursor(source: string, pos: number, end: number, onError: ErrorCallback | undefined): Cursor {
  const length = end - pos;

  function charCodeAt(offset: number): number {
    if (offset < 0 || offset >= length) return -1;
    return source.charCodeAt(pos + offset);
  }

  function codePointAt(offset: number): number | undefined {
    if (offset < 0 || offset >= length) return undefined;
    return source.codePointAt(pos + offset);
  }

  function startsWith(pattern: string): boolean {
    return pattern.length <= length && source.startsWith(pattern, pos);
  }

  function indexOf(text: string): number {
    const found = source.indexOf(text, pos);
    if (found < 0 || found + text.length > end) return -1;
    return found - pos;
  }

  function advance(n: number): Cursor {
    if (n < 0 || n > length)
      throw new Error('Cursor: cannot advance ' + n + ' units with ' + length + ' remaining');
    if (n === 0) return cursor;
    if (splitsSurrogatePair(pos + n))
      throw new Error('Cursor: advance would split a surrogate pair at ' + (pos + n));
    return makeCursor(source, pos + n, end, onError);
  }

  function until(n: number): string {
    if (n < 0 || n > length)
      throw new Error('Cursor: cannot take ' + n + ' units with ' + length + ' remaining');
    return source.substring(pos, pos + n);
  }

  function finish(): Cursor {
    return length === 0 ? cursor : makeCursor(source, end, end, onError);
  }

  function splitsSurrogatePair(at: number): boolean {
    const before = source.charCodeAt(at - 1);
    const after = source.charCodeAt(at);
    return before >= 0xD800 && before <= 0xDBFF && after >= 0xDC00 && after <= 0xDFFF;
  }

  function fillDebugState(state: CursorDebugState): void {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < pos; i++) {
      if (source.charCodeAt(i) === CharacterCodes.lineFeed) {
        line++;
        lineStart = i + 1;
      }
    }

    const next = codePointAt(0);
    state.pos = pos;
    state.end = end;
    state.length = length;
    state.line = line;
    state.column = pos - lineStart + 1;
    state.nextChar = next === undefined ? '' : String.fromCodePoint(next);
  }

  const cursor: Cursor = {
    source,
    pos,
    end,
    length,
    onError,
    isEmpty: () => length === 0,
    rest: () => source.substring(pos, end),
    charCodeAt,
    codePointAt,
    startsWith,
    indexOf,
    advance,
    until,
    finish,
    fillDebugState,
  };

  return Object.freeze(cursor);
}
