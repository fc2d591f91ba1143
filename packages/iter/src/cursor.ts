/**
 * Cursor Contract
 *
 * A pull-based cursor over a lazy sequence. `next()` returns `Some(value)`
 * while values remain and `None` once exhausted; after the first `None`
 * every later call returns `None` as well.
 *
 * Producers (`Range`, `Stringer`) and consumers (`ListConsumer`) implement
 * this interface, and `fold` reads any of them without knowing which.
 */

import { None, Some, isSome, type Option } from "./data/option.js";

export interface Cursor<T> {
  next(): Option<T>;
}

// ============================================================================
// Native interop
// ============================================================================

/**
 * Drive a cursor with `for...of` or spread. Pulls from the same cursor,
 * so values taken here are gone from it.
 */
export function* iterate<T>(cursor: Cursor<T>): IterableIterator<T> {
  for (let opt = cursor.next(); isSome(opt); opt = cursor.next()) {
    yield opt.value;
  }
}

/**
 * Drain a cursor into an array.
 */
export function collect<T>(cursor: Cursor<T>): T[] {
  return [...iterate(cursor)];
}

class IterableCursor<T> implements Cursor<T> {
  private readonly source: Iterator<T>;
  private done = false;

  constructor(iterable: Iterable<T>) {
    this.source = iterable[Symbol.iterator]();
  }

  next(): Option<T> {
    if (this.done) return None;
    const result = this.source.next();
    if (result.done) {
      this.done = true;
      return None;
    }
    return Some(result.value);
  }
}

/**
 * Wrap a native iterable. Exhaustion is sticky even when the underlying
 * iterator would resume.
 */
export function fromIterable<T>(iterable: Iterable<T>): Cursor<T> {
  return new IterableCursor(iterable);
}
