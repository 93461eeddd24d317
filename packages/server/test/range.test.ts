import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  comparePositions,
  compareRanges,
  containsPosition,
  range,
  RangeSet,
  rangesOverlap,
  smallestContaining,
  touchesPosition,
  type Position,
  type Range,
} from "../src/range";

const positionArb: fc.Arbitrary<Position> = fc.record({
  line: fc.nat({ max: 40 }),
  character: fc.nat({ max: 60 }),
});

const rangeArb: fc.Arbitrary<Range> = fc
  .tuple(positionArb, positionArb)
  .map(([a, b]) => (comparePositions(a, b) <= 0 ? { start: a, end: b } : { start: b, end: a }));

describe("containsPosition", () => {
  it("includes the start of a non-empty range and excludes its end", () => {
    fc.assert(
      fc.property(rangeArb, (r) => {
        const empty = comparePositions(r.start, r.end) === 0;
        expect(containsPosition(r, r.start)).toBe(!empty);
        expect(containsPosition(r, r.end)).toBe(false);
      }),
    );
  });

  it("agrees with ordering of positions", () => {
    fc.assert(
      fc.property(rangeArb, positionArb, (r, p) => {
        const expected =
          comparePositions(r.start, p) <= 0 && comparePositions(p, r.end) < 0;
        expect(containsPosition(r, p)).toBe(expected);
      }),
    );
  });

  it("handles ranges spanning several lines", () => {
    const r = range(1, 10, 3, 2);
    expect(containsPosition(r, { line: 2, character: 0 })).toBe(true);
    expect(containsPosition(r, { line: 1, character: 9 })).toBe(false);
    expect(containsPosition(r, { line: 3, character: 1 })).toBe(true);
    expect(containsPosition(r, { line: 3, character: 2 })).toBe(false);
  });

  it("touchesPosition also accepts the end", () => {
    const r = range(0, 4, 0, 8);
    expect(touchesPosition(r, { line: 0, character: 8 })).toBe(true);
    expect(touchesPosition(r, { line: 0, character: 9 })).toBe(false);
  });
});

describe("rangesOverlap", () => {
  it("is symmetric", () => {
    fc.assert(
      fc.property(rangeArb, rangeArb, (a, b) => {
        expect(rangesOverlap(a, b)).toBe(rangesOverlap(b, a));
      }),
    );
  });

  it("never reports touching ranges as overlapping", () => {
    fc.assert(
      fc.property(positionArb, positionArb, positionArb, (x, y, z) => {
        const [p, q, s] = [x, y, z].sort(comparePositions);
        expect(rangesOverlap({ start: p, end: q }, { start: q, end: s })).toBe(false);
      }),
    );
  });

  it("detects a shared stretch", () => {
    expect(rangesOverlap(range(0, 0, 0, 5), range(0, 4, 0, 9))).toBe(true);
  });
});

describe("RangeSet", () => {
  it("grows once when the same range is added twice", () => {
    fc.assert(
      fc.property(rangeArb, (r) => {
        const set = new RangeSet();
        expect(set.add(r)).toBe(true);
        expect(set.add({ start: { ...r.start }, end: { ...r.end } })).toBe(false);
        expect(set.size).toBe(1);
      }),
    );
  });

  it("keeps distinct ranges apart", () => {
    const set = new RangeSet([range(0, 0, 0, 1), range(0, 0, 0, 2), range(0, 0, 0, 1)]);
    expect(set.size).toBe(2);
    expect(set.has(range(0, 0, 0, 2))).toBe(true);
    expect(set.delete(range(0, 0, 0, 2))).toBe(true);
    expect(set.size).toBe(1);
  });
});

describe("ordering", () => {
  it("puts single-line ranges before multi-line ones", () => {
    expect(compareRanges(range(0, 0, 0, 200), range(0, 0, 1, 0))).toBeLessThan(0);
  });

  it("picks the smallest containing range", () => {
    const items = [range(0, 0, 0, 30), range(0, 10, 0, 20), range(0, 25, 0, 28)];
    expect(smallestContaining(items, { line: 0, character: 12 }, (r) => r)).toEqual(
      range(0, 10, 0, 20),
    );
    expect(smallestContaining(items, { line: 1, character: 0 }, (r) => r)).toBeUndefined();
  });
});
