/**
 * Integer Instances
 *
 * Dictionary describing one integer type: the arithmetic a range needs
 * plus the inclusive bounds of the type (`undefined` for unbounded).
 *
 * @example
 * ```typescript
 * Range.of(uint32).init(0, 10, 2);
 * Range.of(int64).init(10n, 0n, -3n);
 * ```
 */

export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

export interface Integer<T> {
  readonly name: string;
  readonly zero: T;
  readonly min: T | undefined;
  readonly max: T | undefined;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  compare(a: T, b: T): Ordering;
  /** Division rounded towards positive infinity. */
  ceilDiv(a: T, b: T): T;
  toNumber(a: T): number;
}

/**
 * True when `value` lies outside the instance's bounds.
 */
export function exceedsBounds<T>(I: Integer<T>, value: T): boolean {
  if (I.min !== undefined && I.compare(value, I.min) === LT) return true;
  if (I.max !== undefined && I.compare(value, I.max) === GT) return true;
  return false;
}

// ============================================================================
// number-backed instances
// ============================================================================

function numberInteger(name: string, min: number, max: number): Integer<number> {
  return {
    name,
    zero: 0,
    min,
    max,
    add: (a, b) => a + b,
    sub: (a, b) => a - b,
    compare: (a, b) => (a < b ? LT : a > b ? GT : EQ),
    ceilDiv: (a, b) => Math.ceil(a / b),
    toNumber: (a) => a,
  };
}

export const int8 = numberInteger("int8", -0x80, 0x7f);
export const uint8 = numberInteger("uint8", 0, 0xff);
export const int16 = numberInteger("int16", -0x8000, 0x7fff);
export const uint16 = numberInteger("uint16", 0, 0xffff);
export const int32 = numberInteger("int32", -0x80000000, 0x7fffffff);
export const uint32 = numberInteger("uint32", 0, 0xffffffff);
export const safeInteger = numberInteger(
  "safeInteger",
  Number.MIN_SAFE_INTEGER,
  Number.MAX_SAFE_INTEGER,
);

// ============================================================================
// bigint-backed instances
// ============================================================================

function bigintInteger(
  name: string,
  min: bigint | undefined,
  max: bigint | undefined,
): Integer<bigint> {
  return {
    name,
    zero: 0n,
    min,
    max,
    add: (a, b) => a + b,
    sub: (a, b) => a - b,
    compare: (a, b) => (a < b ? LT : a > b ? GT : EQ),
    ceilDiv: (a, b) => {
      const q = a / b;
      return q * b !== a && (a > 0n) === (b > 0n) ? q + 1n : q;
    },
    toNumber: (a) => Number(a),
  };
}

export const int64 = bigintInteger("int64", -(2n ** 63n), 2n ** 63n - 1n);
export const uint64 = bigintInteger("uint64", 0n, 2n ** 64n - 1n);
export const bigInteger = bigintInteger("bigInteger", undefined, undefined);
