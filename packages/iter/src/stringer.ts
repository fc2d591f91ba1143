/**
 * Stringer — walks a byte sequence front to back, one byte per call.
 *
 * A `Uint8Array` is borrowed, not copied: the caller keeps it alive and
 * unchanged while the cursor is in use. A `string` is UTF-8 encoded first.
 */

import { None, Some, type Option } from "./data/option.js";
import type { Cursor } from "./cursor.js";

const encoder = new TextEncoder();

export class Stringer implements Cursor<number> {
  private p = 0;

  private constructor(private readonly bytes: Uint8Array) {}

  static init(bytes: Uint8Array | string): Stringer {
    return new Stringer(typeof bytes === "string" ? encoder.encode(bytes) : bytes);
  }

  next(): Option<number> {
    if (this.p >= this.bytes.length) return None;
    return Some(this.bytes[this.p++]);
  }

  remaining(): number {
    return Math.max(0, this.bytes.length - this.p);
  }
}
