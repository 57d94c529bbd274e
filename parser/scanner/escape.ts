/**
 * Escape decoding for quoted literal bodies.
 *
 * Each entry point takes a cursor positioned just after the opening quote and
 * returns the decoded value with a cursor past the closing quote. Text and
 * character literals decode to strings; byte literals decode to byte values.
 */

import {
  CharacterCodes,
  charSize,
  hexDigitValue,
  isHexDigit,
  isOctalDigit,
  isScalarValue,
  isUnicodeWhiteSpace
} from './character-codes';
import type { Cursor } from './cursor';
import { done, LiteralErrorCode, reportError, type ParseResult } from './parse-result';
import { createSpanBuffer } from './span-buffer';

/** Escape set selection: text flavour allows \u{...} and limits \x to 00-7F. */
const enum LiteralFlavor {
  Text,
  Byte,
}

/** Marker value for a backslash-newline continuation. */
const LINE_CONTINUATION = -1;

interface EscapeScan {
  /** Decoded code point or byte, or LINE_CONTINUATION. */
  value: number;
  /** Relative offset just past the escape. */
  end: number;
}

interface EscapeError {
  code: LiteralErrorCode;
  /** Relative offset just past the offending unit. */
  end: number;
}

export function decodeText(cursor: Cursor): ParseResult<string> {
  const buffer = createSpanBuffer({ source: cursor.source });
  let i = 0;
  let runStart = 0;

  const flush = (upTo: number) => buffer.addSpan(cursor.pos + runStart, cursor.pos + upTo);

  while (i < cursor.length) {
    const ch = cursor.charCodeAt(i);

    if (ch === CharacterCodes.doubleQuote) {
      flush(i);
      return done(cursor.advance(i + 1), buffer.materialize());
    }

    if (ch === CharacterCodes.carriageReturn) {
      if (cursor.charCodeAt(i + 1) !== CharacterCodes.lineFeed)
        return reportError(cursor, LiteralErrorCode.BareCarriageReturn, i, i + 1);
      flush(i);
      buffer.addChar('\n');
      i += 2;
      runStart = i;
      continue;
    }

    if (ch === CharacterCodes.backslash) {
      flush(i);
      const escape = scanEscape(cursor, i, LiteralFlavor.Text);
      if ('code' in escape)
        return reportError(cursor, escape.code, i, escape.end);
      if (escape.value !== LINE_CONTINUATION)
        buffer.addChar(String.fromCodePoint(escape.value));
      i = escape.end;
      runStart = i;
      continue;
    }

    i++;
  }

  return reportError(cursor, LiteralErrorCode.UnterminatedLiteral, 0, cursor.length);
}

export function decodeByteText(cursor: Cursor): ParseResult<Uint8Array> {
  const bytes: number[] = [];
  let i = 0;

  while (i < cursor.length) {
    const ch = cursor.charCodeAt(i);

    switch (ch) {
      case CharacterCodes.doubleQuote:
        return done(cursor.advance(i + 1), Uint8Array.from(bytes));

      case CharacterCodes.carriageReturn:
        if (cursor.charCodeAt(i + 1) !== CharacterCodes.lineFeed)
          return reportError(cursor, LiteralErrorCode.BareCarriageReturn, i, i + 1);
        bytes.push(CharacterCodes.lineFeed);
        i += 2;
        break;

      case CharacterCodes.backslash: {
        const escape = scanEscape(cursor, i, LiteralFlavor.Byte);
        if ('code' in escape)
          return reportError(cursor, escape.code, i, escape.end);
        if (escape.value !== LINE_CONTINUATION)
          bytes.push(escape.value);
        i = escape.end;
        break;
      }

      default:
        if (ch > CharacterCodes.maxAsciiCharacter)
          return reportError(cursor, LiteralErrorCode.NonAsciiByte, i, i + 1);
        bytes.push(ch);
        i++;
    }
  }

  return reportError(cursor, LiteralErrorCode.UnterminatedLiteral, 0, cursor.length);
}

/**
 * Decode one character followed by `'` or end of input.
 */
export function decodeChar(cursor: Cursor): ParseResult<string> {
  const unit = scanSingleUnit(cursor, LiteralFlavor.Text);
  if ('code' in unit)
    return reportError(cursor, unit.code, 0, unit.end);
  return closeSingleUnit(cursor, unit.end, String.fromCodePoint(unit.value));
}

/**
 * Decode one byte followed by `'` or end of input.
 */
export function decodeByte(cursor: Cursor): ParseResult<number> {
  const unit = scanSingleUnit(cursor, LiteralFlavor.Byte);
  if ('code' in unit)
    return reportError(cursor, unit.code, 0, unit.end);
  return closeSingleUnit(cursor, unit.end, unit.value);
}

function closeSingleUnit<T>(cursor: Cursor, end: number, value: T): ParseResult<T> {
  if (end === cursor.length)
    return done(cursor.finish(), value);
  if (cursor.charCodeAt(end) === CharacterCodes.singleQuote)
    return done(cursor.advance(end + 1), value);
  return reportError(cursor, LiteralErrorCode.ExpectedClosingQuote, end, end + 1);
}

function scanSingleUnit(cursor: Cursor, flavor: LiteralFlavor): EscapeScan | EscapeError {
  const ch = cursor.codePointAt(0);
  if (ch === undefined)
    return { code: LiteralErrorCode.UnterminatedLiteral, end: 0 };

  switch (ch) {
    case CharacterCodes.singleQuote:
      return { code: LiteralErrorCode.EmptyLiteral, end: 1 };

    case CharacterCodes.carriageReturn:
      if (cursor.charCodeAt(1) !== CharacterCodes.lineFeed)
        return { code: LiteralErrorCode.BareCarriageReturn, end: 1 };
      return { value: CharacterCodes.lineFeed, end: 2 };

    case CharacterCodes.backslash: {
      const escape = scanEscape(cursor, 0, flavor);
      if (!('code' in escape) && escape.value === LINE_CONTINUATION)
        return { code: LiteralErrorCode.LineContinuationInCharacter, end: 2 };
      return escape;
    }

    default:
      if (flavor === LiteralFlavor.Byte && ch > CharacterCodes.maxAsciiCharacter)
        return { code: LiteralErrorCode.NonAsciiByte, end: charSize(ch) };
      return { value: ch, end: charSize(ch) };
  }
}

/**
 * Scan the escape whose backslash is at relative offset `start`.
 */
function scanEscape(cursor: Cursor, start: number, flavor: LiteralFlavor): EscapeScan | EscapeError {
  const selector = cursor.charCodeAt(start + 1);
  const end = start + 2;

  switch (selector) {
    case CharacterCodes.n: return { value: CharacterCodes.lineFeed, end };
    case CharacterCodes.r: return { value: CharacterCodes.carriageReturn, end };
    case CharacterCodes.t: return { value: CharacterCodes.tab, end };
    case CharacterCodes.backslash: return { value: CharacterCodes.backslash, end };
    case CharacterCodes._0: return { value: CharacterCodes.nullCharacter, end };
    case CharacterCodes.singleQuote: return { value: CharacterCodes.singleQuote, end };
    case CharacterCodes.doubleQuote: return { value: CharacterCodes.doubleQuote, end };

    case CharacterCodes.x:
      return scanHexEscape(cursor, end, flavor);

    case CharacterCodes.u:
      if (flavor === LiteralFlavor.Text)
        return scanUnicodeEscape(cursor, end);
      return { code: LiteralErrorCode.InvalidEscape, end };

    case CharacterCodes.lineFeed:
    case CharacterCodes.carriageReturn:
      return { value: LINE_CONTINUATION, end: skipWhiteSpace(cursor, end) };

    default:
      return { code: LiteralErrorCode.InvalidEscape, end: Math.min(end, cursor.length) };
  }
}

// \xHH: text literals stay within 7-bit ASCII, byte literals take 00-FF
function scanHexEscape(cursor: Cursor, at: number, flavor: LiteralFlavor): EscapeScan | EscapeError {
  const high = cursor.charCodeAt(at);
  const low = cursor.charCodeAt(at + 1);
  const highOk = flavor === LiteralFlavor.Text ? isOctalDigit(high) : isHexDigit(high);

  if (!highOk)
    return { code: LiteralErrorCode.InvalidHexEscape, end: at + 1 };
  if (!isHexDigit(low))
    return { code: LiteralErrorCode.InvalidHexEscape, end: at + 2 };

  return { value: hexDigitValue(high) * 16 + hexDigitValue(low), end: at + 2 };
}

// \u{H..HHHHHH}
function scanUnicodeEscape(cursor: Cursor, at: number): EscapeScan | EscapeError {
  if (cursor.charCodeAt(at) !== CharacterCodes.openBrace)
    return { code: LiteralErrorCode.InvalidUnicodeEscape, end: at + 1 };

  let value = 0;
  let digits = 0;
  let i = at + 1;

  while (true) {
    const ch = cursor.charCodeAt(i);
    if (ch === CharacterCodes.closeBrace && digits > 0) break;
    if (digits === 6 || !isHexDigit(ch))
      return { code: LiteralErrorCode.InvalidUnicodeEscape, end: i + 1 };
    value = value * 16 + hexDigitValue(ch);
    digits++;
    i++;
  }

  if (!isScalarValue(value))
    return { code: LiteralErrorCode.InvalidScalarValue, end: i + 1 };

  return { value, end: i + 1 };
}

function skipWhiteSpace(cursor: Cursor, from: number): number {
  let i = from;
  while (i < cursor.length) {
    const ch = cursor.codePointAt(i);
    if (ch === undefined || !isUnicodeWhiteSpace(ch)) break;
    i += charSize(ch);
  }
  return i;
}
