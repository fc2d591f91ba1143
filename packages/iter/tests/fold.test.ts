import { describe, it, expect, vi } from "vitest";
import { SinglyLinkedList } from "@cursorkit/collections";
import { fromIterable, type Cursor } from "../src/cursor.js";
import { unwrap } from "../src/errors.js";
import { cursorIterableOnce, fold } from "../src/fold.js";
import { uint32 } from "../src/integer.js";
import { ListConsumer } from "../src/list-consumer.js";
import { Range } from "../src/range.js";
import { Stringer } from "../src/stringer.js";

const add = (a: number, b: number): number => a + b;
const mul = (a: number, b: number): number => a * b;

describe("fold", () => {
  it("adds a range onto the initial value", () => {
    const range = unwrap(Range.of(uint32).init(1, 10, 1));
    expect(fold(add, range, 17)).toBe(62);
  });

  it("multiplies a range", () => {
    const range = unwrap(Range.of(uint32).init(1, 10, 1));
    expect(fold(mul, range, 1)).toBe(362880);
  });

  it("sums a skipping range", () => {
    expect(fold(add, unwrap(Range.of(uint32).init(0, 10, 2)), 0)).toBe(20);
  });

  it("returns the initial value for an empty cursor", () => {
    const combine = vi.fn(add);
    expect(fold(combine, unwrap(Range.init(5, 5, 1)), 42)).toBe(42);
    expect(fold(combine, fromIterable<number>([]), -1)).toBe(-1);
    expect(combine).not.toHaveBeenCalled();
  });

  it("combines in production order", () => {
    const text = fold((acc: string, b: number) => acc + String.fromCharCode(b), Stringer.init("fold"), "");
    expect(text).toBe("fold");
  });

  it("accumulates into a different type", () => {
    const seen = fold((acc: number[], n: number) => [...acc, n * n], unwrap(Range.init(1, 4, 1)), []);
    expect(seen).toEqual([1, 4, 9]);
  });

  it("treats every cursor alike", () => {
    const cursors: Array<Cursor<number>> = [
      unwrap(Range.init(0, 4, 1)),
      Stringer.init("AB"),
      ListConsumer.init(SinglyLinkedList.of(5, 5)),
    ];
    expect(cursors.map((cursor) => fold(add, cursor, 0))).toEqual([6, 131, 10]);
  });

  it("leaves the cursor exhausted", () => {
    const range = unwrap(Range.init(0, 3, 1));
    fold(add, range, 0);
    expect(fold(add, range, 100)).toBe(100);
  });
});

describe("cursorIterableOnce", () => {
  it("folds in dictionary form", () => {
    const F = cursorIterableOnce<number>();
    expect(F.fold(unwrap(Range.init(1, 4, 1)), 0, add)).toBe(6);
  });
});
