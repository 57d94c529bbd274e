import { CharacterCodes } from './character-codes';
import type { Cursor } from './cursor';
import { done, LiteralErrorCode, reportError, type ParseResult } from './parse-result';

export interface RawLiteral {
  /** Body text, carriage returns removed. */
  value: string;
  /** Number of `#` markers on each side. */
  hashes: number;
}

/**
 * Scan a raw text literal starting at its `#` run (or directly at the quote).
 *
 * The body ends at the first `"` followed by at least as many `#` as opened it.
 */
export function decodeRawText(cursor: Cursor): ParseResult<RawLiteral> {
  let hashes = 0;
  while (cursor.charCodeAt(hashes) === CharacterCodes.hash) hashes++;

  if (cursor.charCodeAt(hashes) !== CharacterCodes.doubleQuote) {
    if (hashes === cursor.length)
      return reportError(cursor, LiteralErrorCode.UnterminatedRawLiteral, 0, hashes);
    return reportError(cursor, LiteralErrorCode.InvalidRawDelimiter, hashes, hashes + 1);
  }

  const closingRun = cursor.until(hashes);
  const parts: string[] = [];
  let runStart = hashes + 1;

  for (let i = runStart; i < cursor.length; i++) {
    const ch = cursor.charCodeAt(i);

    if (ch === CharacterCodes.doubleQuote && cursor.advance(i + 1).startsWith(closingRun)) {
      parts.push(cursor.source.substring(cursor.pos + runStart, cursor.pos + i));
      return done(cursor.advance(i + 1 + hashes), { value: parts.join(''), hashes });
    }

    if (ch === CharacterCodes.carriageReturn) {
      parts.push(cursor.source.substring(cursor.pos + runStart, cursor.pos + i));
      runStart = i + 1;
    }
  }

  return reportError(cursor, LiteralErrorCode.UnterminatedRawLiteral, 0, cursor.length);
}
