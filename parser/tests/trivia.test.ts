import { describe, expect, it, test } from 'vitest';
import { createCursor } from '../scanner/cursor';
import { blockComment, skipTrivia, skipTriviaOrStay, wordBreak } from '../scanner/trivia';
import { parseWith, restAfter } from './test-utils';

describe('skipTrivia', () => {
  describe('whitespace', () => {
    test('ASCII whitespace', () => {
      expect(restAfter(skipTrivia, '   x')).toBe('x');
      expect(restAfter(skipTrivia, '\t\n\v\f\r x')).toBe('x');
    });

    test('unicode whitespace and directional marks', () => {
      expect(restAfter(skipTrivia, '\u00A0\u3000\u2028x')).toBe('x');
      expect(restAfter(skipTrivia, '\u200E\u200Fx')).toBe('x');
    });

    test('zero width space is not whitespace', () => {
      expect(restAfter(skipTrivia, '\u200Bx')).toBeUndefined();
    });

    test('consuming everything yields end of input', () => {
      const result = skipTrivia(createCursor(' \n '));
      expect(result.done && result.rest.isEmpty()).toBe(true);
    });
  });

  describe('zero progress', () => {
    test('nothing to skip fails', () => {
      expect(restAfter(skipTrivia, 'x')).toBeUndefined();
      expect(restAfter(skipTrivia, '/ x')).toBeUndefined();
    });

    test('empty input fails', () => {
      expect(restAfter(skipTrivia, '')).toBeUndefined();
    });

    test('skipping again after trivia fails', () => {
      const first = skipTrivia(createCursor('  /* c */ x'));
      expect(first.done).toBe(true);
      if (!first.done) return;
      expect(first.rest.rest()).toBe('x');
      expect(skipTrivia(first.rest).done).toBe(false);
    });
  });

  describe('line comments', () => {
    test('runs through the line feed', () => {
      expect(restAfter(skipTrivia, '// comment\nx')).toBe('x');
    });

    test('runs to end of input', () => {
      expect(restAfter(skipTrivia, '// to the end')).toBe('');
    });

    test('doc comments are not trivia', () => {
      expect(restAfter(skipTrivia, '///x')).toBeUndefined();
      expect(restAfter(skipTrivia, '//!x')).toBeUndefined();
      expect(restAfter(skipTrivia, '  /// doc')).toBe('/// doc');
    });

    test('four or more slashes are a plain comment', () => {
      expect(restAfter(skipTrivia, '////x\ny')).toBe('y');
      expect(restAfter(skipTrivia, '////x')).toBe('');
    });
  });

  describe('block comments', () => {
    test('plain and nested comments are consumed whole', () => {
      expect(restAfter(skipTrivia, '/* */')).toBe('');
      expect(restAfter(skipTrivia, '/* /* */ */')).toBe('');
      expect(restAfter(skipTrivia, '/* a /* b /* c */ */ */x')).toBe('x');
    });

    test('an extra close is left for the caller', () => {
      expect(restAfter(skipTrivia, '/* */ */')).toBe('*/');
    });

    test('doc comments are not trivia', () => {
      expect(restAfter(skipTrivia, '/**x*/')).toBeUndefined();
      expect(restAfter(skipTrivia, '/*!x*/')).toBeUndefined();
      expect(restAfter(skipTrivia, ' /*!x*/')).toBe('/*!x*/');
    });

    test('three or more stars are a plain comment', () => {
      expect(restAfter(skipTrivia, '/***x*/')).toBe('');
    });

    test('unterminated comment fails the whole skip', () => {
      expect(parseWith(skipTrivia, '  /* /* */')).toEqual({
        rest: undefined,
        value: undefined,
        errors: [{ code: 'UnterminatedBlockComment', start: 2, end: 10, message: 'Unterminated block comment' }]
      });
    });
  });

  test('interleaved whitespace and comments', () => {
    expect(restAfter(skipTrivia, ' \t\n/* a */ // b\n  \u00A0\u200E////c\n/***/z')).toBe('z');
  });
});

describe('skipTriviaOrStay', () => {
  it('returns the cursor after trivia', () => {
    expect(skipTriviaOrStay(createCursor('  x')).rest()).toBe('x');
  });

  it('returns the same cursor when there is nothing to skip', () => {
    const cursor = createCursor('x');
    expect(skipTriviaOrStay(cursor)).toBe(cursor);
  });

  it('returns the same cursor when a comment never closes', () => {
    const cursor = createCursor(' /* open');
    expect(skipTriviaOrStay(cursor)).toBe(cursor);
  });
});

describe('blockComment', () => {
  it('returns the comment text', () => {
    expect(parseWith(blockComment, '/* a /* b */ c */rest')).toEqual({
      rest: 'rest',
      value: '/* a /* b */ c */',
      errors: []
    });
  });

  it('stops at the first balanced close', () => {
    expect(parseWith(blockComment, '/* */ */')).toEqual({ rest: ' */', value: '/* */', errors: [] });
  });

  it('needs an opening delimiter', () => {
    expect(parseWith(blockComment, 'x /* */')).toEqual({ rest: undefined, value: undefined, errors: [] });
  });

  it('overlapping delimiters do not close', () => {
    expect(parseWith(blockComment, '/*/').errors.map(e => e.code)).toEqual(['UnterminatedBlockComment']);
  });
});

describe('wordBreak', () => {
  it('succeeds at end of input', () => {
    expect(parseWith(wordBreak, '')).toEqual({ rest: '', value: undefined, errors: [] });
  });

  it('succeeds without consuming before a non-identifier character', () => {
    expect(restAfter(wordBreak, ' x')).toBe(' x');
    expect(restAfter(wordBreak, '(')).toBe('(');
    expect(restAfter(wordBreak, '-')).toBe('-');
  });

  it('fails before an identifier character', () => {
    expect(restAfter(wordBreak, 'a')).toBeUndefined();
    expect(restAfter(wordBreak, '_')).toBeUndefined();
    expect(restAfter(wordBreak, '1')).toBeUndefined();
    expect(restAfter(wordBreak, '\u00e9')).toBeUndefined();
  });
});
