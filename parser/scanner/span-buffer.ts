/**
 * SpanBuffer - grow-only accumulator for decoded literal text.
 *
 * Verbatim runs of the source are recorded as [start, end) spans and only
 * copied out on materialize(); characters produced by escapes are recorded
 * in a small per-buffer registry.
 */

export interface SpanBuffer {
  // second parameter is end index (exclusive)
  addSpan(start: number, end: number): void;
  addChar(ch: string): void;
  materialize(): string;
  fillDebugState(state: SpanBufferDebugState): void;
}

export interface SpanBufferDebugState {
  spanCount: number;
  spanCapacity: number;
  decodedCount: number;
}

const MAX_SPANS = 1 << 24; // safety cap (very large, 24 bit number)

// Reusable parts array for materialization
const stringParts: string[] = [];

export function createSpanBuffer({ source }: { source: string }): SpanBuffer {
  // Pairs of [start, end) for source spans. Decoded characters are stored as
  // [-1, registryIndex].
  const spans: number[] = [];
  let spanCount = 0;
  const decodedChars: string[] = [];

  function ensureCapacity(): void {
    if (spanCount >= MAX_SPANS)
      throw new Error('SpanBuffer: exceeded maximum allowed spans');
  }

  function writePair(first: number, second: number): void {
    spans.push(first, second);
    spanCount++;
  }

  function addSpan(start: number, end: number): void {
    if (end <= start) return;
    ensureCapacity();

    // Adjacent source spans collapse into one.
    if (spanCount > 0) {
      const prev = (spanCount - 1) * 2;
      if (spans[prev] >= 0 && spans[prev + 1] === start) {
        spans[prev + 1] = end;
        return;
      }
    }

    writePair(start, end);
  }

  function addChar(ch: string): void {
    ensureCapacity();

    let idx = decodedChars.indexOf(ch);
    if (idx < 0) {
      idx = decodedChars.length;
      decodedChars.push(ch);
    }
    writePair(-1, idx);
  }

  function partAt(i: number): string {
    const first = spans[i * 2];
    const second = spans[i * 2 + 1];
    return first >= 0 ? source.substring(first, second) : decodedChars[second];
  }

  function materialize(): string {
    if (spanCount === 0) return '';
    if (spanCount === 1) return partAt(0);

    stringParts.length = 0;
    for (let i = 0; i < spanCount; i++)
      stringParts.push(partAt(i));
    const text = stringParts.join('');
    stringParts.length = 0;
    return text;
  }

  function fillDebugState(state: SpanBufferDebugState): void {
    state.spanCount = spanCount;
    state.spanCapacity = spans.length / 2;
    state.decodedCount = decodedChars.length;
  }

  return {
    addSpan,
    addChar,
    materialize,
    fillDebugState,
  };
}
