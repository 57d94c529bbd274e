export { createCursor } from './scanner/cursor';
export type { Cursor, CursorOptions, CursorDebugState } from './scanner/cursor';

export { done, failed, LiteralErrorCode } from './scanner/parse-result';
export type { ParseResult, ParseDone, ParseFailed, ErrorCallback } from './scanner/parse-result';

export { decodeText, decodeChar, decodeByteText, decodeByte } from './scanner/escape';
export { decodeRawText } from './scanner/raw-literal';
export type { RawLiteral } from './scanner/raw-literal';
export { skipTrivia, skipTriviaOrStay, blockComment, wordBreak } from './scanner/trivia';

export { punct, keyword } from './token-matchers';
