import { map, type Either } from "./data/either.js";
import type { InvalidStepSize } from "./errors.js";
import { fold } from "./fold.js";
import { uint32 } from "./integer.js";
import { Range } from "./range.js";

const mul = (acc: bigint, n: number): bigint => acc * BigInt(n);

/**
 * Product of `Range(1, n, 1)`. The range excludes `n`, so this is
 * `1 * 2 * ... * (n - 1)`: `factorial(10)` is 362880n.
 *
 * The product is a bigint, so it stays exact past 2^32 and 2^53.
 */
export function factorial(n: number): Either<InvalidStepSize, bigint> {
  return map(Range.of(uint32).init(1, n, 1), (range) => fold(mul, range, 1n));
}
