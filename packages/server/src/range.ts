/**
 * Half-open interval arithmetic over LSP positions.
 *
 * A range covers every position p with start <= p < end, compared by line
 * first and then by UTF-16 character.
 */

import type { Position, Range } from "vscode-languageserver";
import { RANGE_SIZE_LINE_WEIGHT } from "./constants";

export type { Position, Range };

export function range(
  startLine: number,
  startCharacter: number,
  endLine: number,
  endCharacter: number,
): Range {
  return {
    start: { line: startLine, character: startCharacter },
    end: { line: endLine, character: endCharacter },
  };
}

/** Negative when a precedes b, zero when equal. */
export function comparePositions(a: Position, b: Position): number {
  return a.line !== b.line ? a.line - b.line : a.character - b.character;
}

export function containsPosition(r: Range, p: Position): boolean {
  if (p.line < r.start.line || p.line > r.end.line) return false;
  if (p.line === r.start.line && p.character < r.start.character) return false;
  if (p.line === r.end.line && p.character >= r.end.character) return false;
  return true;
}

/**
 * Like containsPosition, but also accepts the position just past the end.
 * Used where the cursor sits right after the token being typed.
 */
export function touchesPosition(r: Range, p: Position): boolean {
  return containsPosition(r, p) || comparePositions(r.end, p) === 0;
}

export function rangesOverlap(a: Range, b: Range): boolean {
  return (
    comparePositions(a.start, b.end) < 0 && comparePositions(b.start, a.end) < 0
  );
}

/** True when inner lies entirely within outer (equal ranges included). */
export function rangeContains(outer: Range, inner: Range): boolean {
  return (
    comparePositions(outer.start, inner.start) <= 0 &&
    comparePositions(inner.end, outer.end) <= 0
  );
}

export function rangesEqual(a: Range, b: Range): boolean {
  return (
    a.start.line === b.start.line &&
    a.start.character === b.start.character &&
    a.end.line === b.end.line &&
    a.end.character === b.end.character
  );
}

/**
 * Ordering weight: multi-line ranges always outweigh single-line ones.
 * For multi-line ranges the end character stands in for the width.
 */
export function rangeSize(r: Range): number {
  const lines = r.end.line - r.start.line;
  const chars =
    lines === 0 ? r.end.character - r.start.character : r.end.character;
  return lines * RANGE_SIZE_LINE_WEIGHT + chars;
}

/** Smallest first; equal sizes fall back to document order. */
export function compareRanges(a: Range, b: Range): number {
  const bySize = rangeSize(a) - rangeSize(b);
  if (bySize !== 0) return bySize;
  return comparePositions(a.start, b.start);
}

export function rangeKey(r: Range): string {
  return `${r.start.line}:${r.start.character}:${r.end.line}:${r.end.character}`;
}

/**
 * A set of ranges with value equality on the four coordinates.
 */
export class RangeSet implements Iterable<Range> {
  private readonly entries = new Map<string, Range>();

  constructor(ranges: Iterable<Range> = []) {
    for (const r of ranges) this.add(r);
  }

  /** Returns false when an equal range was already present. */
  add(r: Range): boolean {
    const key = rangeKey(r);
    if (this.entries.has(key)) return false;
    this.entries.set(key, r);
    return true;
  }

  has(r: Range): boolean {
    return this.entries.has(rangeKey(r));
  }

  delete(r: Range): boolean {
    return this.entries.delete(rangeKey(r));
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<Range> {
    return this.entries.values();
  }
}

/** The entry with the smallest range containing p. */
export function smallestContaining<T>(
  items: Iterable<T>,
  p: Position,
  rangeOf: (item: T) => Range,
): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    const r = rangeOf(item);
    if (!containsPosition(r, p)) continue;
    if (best === undefined || compareRanges(r, rangeOf(best)) < 0) {
      best = item;
    }
  }
  return best;
}
