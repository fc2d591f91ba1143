/**
 * ListConsumer — drains a SinglyLinkedList front to back.
 *
 * `init` takes ownership of the list. Nothing stops the caller from
 * keeping the old reference, but it must only be read (its length falls
 * as the consumer pops); mutating it interleaves with the drain.
 */

import { createLogger } from "@cursorkit/core";
import type { SinglyLinkedList } from "@cursorkit/collections";
import { None, Some, type Option } from "./data/option.js";
import type { Cursor } from "./cursor.js";

const log = createLogger("list-consumer");

export class ListConsumer<T> implements Cursor<T> {
  private constructor(private readonly list: SinglyLinkedList<T>) {}

  static init<T>(list: SinglyLinkedList<T>): ListConsumer<T> {
    return new ListConsumer(list);
  }

  next(): Option<T> {
    const node = this.list.popFront();
    return node === null ? None : Some(node.value);
  }

  /**
   * Drop the nodes a partial drain left behind. Later `next` calls
   * return `None`.
   */
  release(): void {
    const dropped = this.list.length;
    this.list.clear();
    if (dropped > 0) {
      log.debug(`released ${dropped} unconsumed node(s)`);
    }
  }
}
