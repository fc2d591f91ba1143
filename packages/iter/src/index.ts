/**
 * @cursorkit/iter
 *
 * Pull-based cursors, the producers and consumers built on them, and a
 * generic left fold.
 */

// Data types
export * from "./data/index.js";

// Errors
export { InvalidStepSize, CursorError, unwrap, type CursorErrorReason } from "./errors.js";

// Integer instances
export {
  type Integer,
  type Ordering,
  LT,
  EQ,
  GT,
  exceedsBounds,
  int8,
  uint8,
  int16,
  uint16,
  int32,
  uint32,
  safeInteger,
  int64,
  uint64,
  bigInteger,
} from "./integer.js";

// Cursor contract
export { type Cursor, iterate, collect, fromIterable } from "./cursor.js";

// Producers
export { Range, type RangeFactory } from "./range.js";
export { Stringer } from "./stringer.js";

// Consumers
export { ListConsumer } from "./list-consumer.js";
export { fold, cursorIterableOnce, type IterableOnce } from "./fold.js";
export { factorial } from "./factorial.js";
