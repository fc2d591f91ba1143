import { describe, it, expect } from "vitest";
import { collect, fromIterable, iterate } from "../src/cursor.js";
import { None, Some } from "../src/data/option.js";
import { unwrap } from "../src/errors.js";
import { Range } from "../src/range.js";
import { Stringer } from "../src/stringer.js";

describe("iterate", () => {
  it("drives for...of", () => {
    const seen: number[] = [];
    for (const n of iterate(unwrap(Range.init(0, 3, 1)))) seen.push(n);
    expect(seen).toEqual([0, 1, 2]);
  });

  it("pulls from the same cursor", () => {
    const range = unwrap(Range.init(0, 5, 1));
    for (const n of iterate(range)) {
      if (n === 1) break;
    }
    expect(range.next()).toEqual(Some(2));
  });

  it("spreads", () => {
    expect([...iterate(Stringer.init("hi"))]).toEqual([104, 105]);
  });
});

describe("collect", () => {
  it("drains what is left", () => {
    const range = unwrap(Range.init(0, 4, 1));
    range.next();
    expect(collect(range)).toEqual([1, 2, 3]);
    expect(collect(range)).toEqual([]);
  });
});

describe("fromIterable", () => {
  it("wraps native iterables", () => {
    const cursor = fromIterable(new Set(["a", "b"]));
    expect(cursor.next()).toEqual(Some("a"));
    expect(cursor.next()).toEqual(Some("b"));
    expect(cursor.next()).toEqual(None);
  });

  it("keeps exhaustion sticky", () => {
    let calls = 0;
    const resuming: Iterable<number> = {
      [Symbol.iterator]: () => ({
        next: (): IteratorResult<number> => {
          calls++;
          return calls === 2 ? { done: true, value: undefined } : { done: false, value: calls };
        },
      }),
    };

    const cursor = fromIterable(resuming);
    expect(cursor.next()).toEqual(Some(1));
    expect(cursor.next()).toEqual(None);
    expect(cursor.next()).toEqual(None);
    expect(calls).toBe(2);
  });
});
