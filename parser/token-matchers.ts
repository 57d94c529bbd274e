/**
 * Token matchers
 * Punctuation and keyword matching on top of the trivia skipper
 */

import type { Cursor } from './scanner/cursor';
import { done, failed, type ParseResult } from './scanner/parse-result';
import { skipTriviaOrStay, wordBreak } from './scanner/trivia';

/**
 * Parses a piece of punctuation like "+" or "+=" after any leading trivia
 */
export function punct(input: Cursor, token: string): ParseResult<string> {
  const start = skipTriviaOrStay(input);
  if (start.startsWith(token)) {
    return done(start.advance(token.length), token);
  }
  return failed;
}

/**
 * Parses a keyword like "fn" or "struct"; "fnord" does not match "fn"
 */
export function keyword(input: Cursor, token: string): ParseResult<string> {
  const matched = punct(input, token);
  if (!matched.done || !wordBreak(matched.rest).done) {
    return failed;
  }
  return matched;
}
