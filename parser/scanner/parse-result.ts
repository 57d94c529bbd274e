/**
 * Result shape shared by every literal and trivia operation,
 * plus the error codes reported through the optional onError hook.
 */

import type { Cursor } from './cursor';

export interface ParseDone<T> {
  done: true;
  /** Cursor positioned just past what was consumed. */
  rest: Cursor;
  value: T;
}

export interface ParseFailed {
  done: false;
}

export type ParseResult<T> = ParseDone<T> | ParseFailed;

export const failed: ParseFailed = Object.freeze({ done: false as const });

export function done<T>(rest: Cursor, value: T): ParseDone<T> {
  return { done: true, rest, value };
}

/**
 * Error codes for literal and comment diagnostics
 */
export enum LiteralErrorCode {
  None,
  UnterminatedLiteral,
  BareCarriageReturn,
  InvalidEscape,
  InvalidHexEscape,
  InvalidUnicodeEscape,
  InvalidScalarValue,
  NonAsciiByte,
  EmptyLiteral,
  ExpectedClosingQuote,
  LineContinuationInCharacter,
  InvalidRawDelimiter,
  UnterminatedRawLiteral,
  UnterminatedBlockComment,
}

export type ErrorCallback = (start: number, end: number, code: LiteralErrorCode, message: string) => void;

const errorMessages: Record<LiteralErrorCode, string> = {
  [LiteralErrorCode.None]: '',
  [LiteralErrorCode.UnterminatedLiteral]: 'Unterminated literal',
  [LiteralErrorCode.BareCarriageReturn]: 'Bare carriage return in literal',
  [LiteralErrorCode.InvalidEscape]: 'Unknown character escape',
  [LiteralErrorCode.InvalidHexEscape]: 'Invalid \\x escape',
  [LiteralErrorCode.InvalidUnicodeEscape]: 'Invalid \\u{...} escape',
  [LiteralErrorCode.InvalidScalarValue]: 'Escape is not a Unicode scalar value',
  [LiteralErrorCode.NonAsciiByte]: 'Non-ASCII character in byte literal',
  [LiteralErrorCode.EmptyLiteral]: 'Empty character literal',
  [LiteralErrorCode.ExpectedClosingQuote]: 'Character literal holds more than one character',
  [LiteralErrorCode.LineContinuationInCharacter]: 'Line continuation in character literal',
  [LiteralErrorCode.InvalidRawDelimiter]: 'Invalid raw literal delimiter',
  [LiteralErrorCode.UnterminatedRawLiteral]: 'Unterminated raw literal',
  [LiteralErrorCode.UnterminatedBlockComment]: 'Unterminated block comment',
};

/**
 * Report a failure at [start, end) relative to the cursor, then return `failed`.
 */
export function reportError(cursor: Cursor, code: LiteralErrorCode, start: number, end: number): ParseFailed {
  cursor.onError?.(cursor.pos + start, cursor.pos + Math.min(end, cursor.length), code, errorMessages[code]);
  return failed;
}
