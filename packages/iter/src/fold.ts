/**
 * Left fold over any cursor.
 *
 * Runs the cursor to exhaustion, so it only returns for finite cursors.
 */

import { isSome } from "./data/option.js";
import type { Cursor } from "./cursor.js";

export function fold<T, Acc>(
  combine: (acc: Acc, value: T) => Acc,
  cursor: Cursor<T>,
  initial: Acc,
): Acc {
  let acc = initial;
  for (let opt = cursor.next(); isSome(opt); opt = cursor.next()) {
    acc = combine(acc, opt.value);
  }
  return acc;
}

// ============================================================================
// IterableOnce — one-shot fold in dictionary form
// ============================================================================

/**
 * A structure that can be consumed by folding, possibly only once.
 */
export interface IterableOnce<I, A> {
  fold<B>(i: I, z: B, f: (acc: B, a: A) => B): B;
}

export function cursorIterableOnce<A>(): IterableOnce<Cursor<A>, A> {
  return {
    fold: (i, z, f) => fold(f, i, z),
  };
}
