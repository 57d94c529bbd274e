/**
 * Character codes used by literal and trivia scanning, with the whitespace,
 * digit, identifier and scalar-value checks built on them
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  // Control characters, contiguous: tab..carriageReturn
  tab = 0x09,
  lineFeed = 0x0A,              // \n
  verticalTab = 0x0B,
  formFeed = 0x0C,
  carriageReturn = 0x0D,        // \r

  space = 0x20,
  exclamation = 0x21,           // !
  doubleQuote = 0x22,           // "
  hash = 0x23,                  // #
  singleQuote = 0x27,           // '
  asterisk = 0x2A,              // *
  slash = 0x2F,                 // /

  _0 = 0x30,                    // 0
  _7 = 0x37,                    // 7
  _9 = 0x39,                    // 9

  A = 0x41,
  F = 0x46,
  backslash = 0x5C,             // \
  a = 0x61,
  f = 0x66,
  n = 0x6E,
  r = 0x72,
  t = 0x74,
  u = 0x75,
  x = 0x78,

  openBrace = 0x7B,             // {
  closeBrace = 0x7D,            // }

  leftToRightMark = 0x200E,
  rightToLeftMark = 0x200F,

  maxScalarValue = 0x10FFFF,
  minSurrogate = 0xD800,
  maxSurrogate = 0xDFFF,
  maxBmpCharacter = 0xFFFF,
}

const unicodeWhiteSpace = /\p{White_Space}/u;
const identifierContinue = /\p{XID_Continue}/u;

/**
 * Space or one of tab, line feed, vertical tab, form feed, carriage return
 */
export function isAsciiWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         (ch >= CharacterCodes.tab && ch <= CharacterCodes.carriageReturn);
}

/**
 * Unicode White_Space property only
 */
export function isUnicodeWhiteSpace(codePoint: number): boolean {
  if (codePoint <= CharacterCodes.maxAsciiCharacter)
    return isAsciiWhiteSpace(codePoint);
  return unicodeWhiteSpace.test(String.fromCodePoint(codePoint));
}

/**
 * Check if a code point is whitespace between tokens.
 * Unicode White_Space plus the two directional marks.
 */
export function isWhiteSpace(codePoint: number): boolean {
  return codePoint === CharacterCodes.leftToRightMark ||
         codePoint === CharacterCodes.rightToLeftMark ||
         isUnicodeWhiteSpace(codePoint);
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._9;
}

/**
 * Digits 0..7, the leading digit of a text `\x` escape
 */
export function isOctalDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._7;
}

/**
 * Check if character is a hexadecimal digit
 */
export function isHexDigit(ch: number): boolean {
  return isDigit(ch) ||
         (ch >= CharacterCodes.A && ch <= CharacterCodes.F) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.f);
}

/** Value of a hex digit; callers check isHexDigit first. */
export function hexDigitValue(ch: number): number {
  if (isDigit(ch)) return ch - CharacterCodes._0;
  if (ch >= CharacterCodes.a) return ch - CharacterCodes.a + 10;
  return ch - CharacterCodes.A + 10;
}

/**
 * Check if a code point can continue an identifier (XID_Continue)
 */
export function isIdentifierPart(codePoint: number): boolean {
  return identifierContinue.test(String.fromCodePoint(codePoint));
}

/**
 * Unicode scalar value: in range and not a surrogate
 */
export function isScalarValue(value: number): boolean {
  return value >= 0 &&
         value <= CharacterCodes.maxScalarValue &&
         !(value >= CharacterCodes.minSurrogate && value <= CharacterCodes.maxSurrogate);
}

/** Number of UTF-16 code units a code point occupies. */
export function charSize(codePoint: number): number {
  return codePoint > CharacterCodes.maxBmpCharacter ? 2 : 1;
}
