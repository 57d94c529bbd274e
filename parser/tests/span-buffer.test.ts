import { describe, it, expect } from 'vitest';
import { createSpanBuffer, type SpanBufferDebugState } from '../scanner/span-buffer';

function debugState(sb: ReturnType<typeof createSpanBuffer>): SpanBufferDebugState {
  const dbg: SpanBufferDebugState = { spanCount: 0, spanCapacity: 0, decodedCount: 0 };
  sb.fillDebugState(dbg);
  return dbg;
}

describe('SpanBuffer', () => {
  it('materialize returns empty string when no spans were added', () => {
    const sb = createSpanBuffer({ source: 'hello world' });
    expect(sb.materialize()).toBe('');
  });

  it('single span returns exact substring and exact debug state', () => {
    const sb = createSpanBuffer({ source: 'hello world' });
    sb.addSpan(0, 5); // 'hello'
    expect(debugState(sb)).toEqual({ spanCount: 1, spanCapacity: 1, decodedCount: 0 });
    expect(sb.materialize()).toBe('hello');
  });

  it('adjacent spans merge into one', () => {
    const sb = createSpanBuffer({ source: 'foobar' });
    sb.addSpan(0, 3);
    sb.addSpan(3, 6);
    expect(debugState(sb)).toEqual({ spanCount: 1, spanCapacity: 1, decodedCount: 0 });
    expect(sb.materialize()).toBe('foobar');
  });

  it('separate spans join without a delimiter', () => {
    const sb = createSpanBuffer({ source: 'foo bar' });
    sb.addSpan(0, 3);
    sb.addSpan(4, 7);
    expect(debugState(sb)).toEqual({ spanCount: 2, spanCapacity: 2, decodedCount: 0 });
    expect(sb.materialize()).toBe('foobar');
  });

  it('empty spans are ignored', () => {
    const sb = createSpanBuffer({ source: 'abc' });
    sb.addSpan(2, 2);
    expect(debugState(sb).spanCount).toBe(0);
  });

  it('decoded characters interleave with source spans', () => {
    // source text of an escaped literal body: a\nb
    const sb = createSpanBuffer({ source: 'a\\nb' });
    sb.addSpan(0, 1);
    sb.addChar('\n');
    sb.addSpan(3, 4);
    expect(debugState(sb)).toEqual({ spanCount: 3, spanCapacity: 3, decodedCount: 1 });
    expect(sb.materialize()).toBe('a\nb');
  });

  it('repeated decoded characters share one registry entry', () => {
    const sb = createSpanBuffer({ source: '' });
    sb.addChar('x');
    sb.addChar('x');
    expect(debugState(sb)).toEqual({ spanCount: 2, spanCapacity: 2, decodedCount: 1 });
    expect(sb.materialize()).toBe('xx');
  });
});
