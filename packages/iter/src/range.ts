/**
 * Range Cursor
 *
 * Arithmetic sequence from `start`, stepping by `step`, stopping before
 * `end` in the direction of travel:
 *
 * ```typescript
 * Range.of(uint32).init(0, 10, 2);   // 0, 2, 4, 6, 8
 * Range.of(int32).init(10, 0, -3);   // 10, 7, 4, 1
 * Range.init(5, 5, 1);               // empty
 * Range.init(0, 10, 0);              // Left(InvalidStepSize)
 * ```
 *
 * The direction is read from the sign of `step` on every call, so a step
 * pointing away from `end` gives an empty sequence.
 */

import { createLogger } from "@cursorkit/core";
import { Left, Right, type Either } from "./data/either.js";
import { None, Some, type Option } from "./data/option.js";
import type { Cursor } from "./cursor.js";
import { InvalidStepSize } from "./errors.js";
import { EQ, GT, LT, exceedsBounds, safeInteger, type Integer } from "./integer.js";

const log = createLogger("range");

export interface RangeFactory<T> {
  readonly integer: Integer<T>;
  init(start: T, end: T, step: T): Either<InvalidStepSize, Range<T>>;
}

export class Range<T> implements Cursor<T> {
  private nextValue: T;
  // Set when advancing would leave the integer type's bounds.
  private finished = false;

  private constructor(
    readonly integer: Integer<T>,
    readonly start: T,
    readonly end: T,
    readonly step: T,
  ) {
    this.nextValue = start;
  }

  /**
   * Bind the integer type the range counts in.
   */
  static of<T>(integer: Integer<T>): RangeFactory<T> {
    return {
      integer,
      init: (start, end, step) => {
        if (integer.compare(step, integer.zero) === EQ) {
          return Left(InvalidStepSize);
        }
        return Right(new Range(integer, start, end, step));
      },
    };
  }

  /**
   * Range over safe integers.
   */
  static init(start: number, end: number, step: number): Either<InvalidStepSize, Range<number>> {
    return Range.of(safeInteger).init(start, end, step);
  }

  next(): Option<T> {
    if (this.finished) return None;

    const I = this.integer;
    const current = this.nextValue;
    // Ascending ranges continue while below `end`, descending ones while above.
    const beforeEnd = I.compare(this.step, I.zero) === LT ? GT : LT;
    if (I.compare(current, this.end) !== beforeEnd) {
      return None;
    }

    const advanced = I.add(current, this.step);
    if (exceedsBounds(I, advanced)) {
      log.debug(`${String(current)} + ${String(this.step)} leaves ${I.name}; range finished`);
      this.finished = true;
    } else {
      this.nextValue = advanced;
    }
    return Some(current);
  }

  /**
   * Number of values still to come. Does not advance the cursor.
   *
   * Returned as a `number`: for bigint ranges a count above 2^53 is
   * rounded to the nearest double.
   */
  size(): number {
    if (this.finished) return 0;
    const I = this.integer;
    const remaining = I.ceilDiv(I.sub(this.end, this.nextValue), this.step);
    return Math.max(0, I.toNumber(remaining));
  }
}
