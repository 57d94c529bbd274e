/**
 * Trivia: whitespace and comments that are not doc comments.
 *
 * Doc comments (`///`, `//!`, `/**`, `/*!`) are real tokens and end a trivia
 * run. Four or more slashes, or three or more stars, are plain comments again.
 */

import {
  CharacterCodes,
  charSize,
  isAsciiWhiteSpace,
  isIdentifierPart,
  isWhiteSpace
} from './character-codes';
import type { Cursor } from './cursor';
import { done, failed, LiteralErrorCode, reportError, type ParseResult } from './parse-result';

/**
 * Skip the longest run of whitespace and plain comments.
 * Fails when nothing was skipped or a block comment never closes.
 */
export function skipTrivia(input: Cursor): ParseResult<void> {
  if (input.isEmpty()) return failed;

  let i = 0;
  while (i < input.length) {
    const s = input.advance(i);
    const ch = s.charCodeAt(0);

    if (ch === CharacterCodes.slash) {
      if (isPlainLineComment(s)) {
        const newline = s.indexOf('\n');
        if (newline < 0) break;
        i += newline + 1;
        continue;
      }

      if (isPlainBlockComment(s)) {
        const comment = blockComment(s);
        if (!comment.done) return failed;
        i += comment.value.length;
        continue;
      }
    }

    if (isAsciiWhiteSpace(ch)) {
      i++;
      continue;
    }

    if (ch > CharacterCodes.maxAsciiCharacter) {
      const codePoint = s.codePointAt(0);
      if (codePoint !== undefined && isWhiteSpace(codePoint)) {
        i += charSize(codePoint);
        continue;
      }
    }

    return i > 0 ? done(s, undefined) : failed;
  }

  return done(input.finish(), undefined);
}

/**
 * Cursor after any trivia, or the same cursor when there is none.
 */
export function skipTriviaOrStay(input: Cursor): Cursor {
  const skipped = skipTrivia(input);
  return skipped.done ? skipped.rest : input;
}

/**
 * Match one block comment, nested comments included, and return its text.
 */
export function blockComment(input: Cursor): ParseResult<string> {
  if (!input.startsWith('/*')) return failed;

  let depth = 0;
  let i = 0;
  const upper = input.length - 1;

  while (i < upper) {
    const ch = input.charCodeAt(i);
    const next = input.charCodeAt(i + 1);

    if (ch === CharacterCodes.slash && next === CharacterCodes.asterisk) {
      depth++;
      i++; // eat '*'
    } else if (ch === CharacterCodes.asterisk && next === CharacterCodes.slash) {
      depth--;
      if (depth === 0)
        return done(input.advance(i + 2), input.until(i + 2));
      i++; // eat '/'
    }
    i++;
  }

  return reportError(input, LiteralErrorCode.UnterminatedBlockComment, 0, input.length);
}

/**
 * Succeeds without consuming when the next code point cannot continue an
 * identifier.
 */
export function wordBreak(input: Cursor): ParseResult<void> {
  const ch = input.codePointAt(0);
  if (ch !== undefined && isIdentifierPart(ch)) return failed;
  return done(input, undefined);
}

function isPlainLineComment(s: Cursor): boolean {
  return s.startsWith('//') &&
    (!s.startsWith('///') || s.startsWith('////')) &&
    !s.startsWith('//!');
}

function isPlainBlockComment(s: Cursor): boolean {
  return s.startsWith('/*') &&
    (!s.startsWith('/**') || s.startsWith('/***')) &&
    !s.startsWith('/*!');
}
