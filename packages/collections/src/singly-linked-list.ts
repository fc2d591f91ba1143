/**
 * SinglyLinkedList<T> — a mutable, front-loaded linked list.
 *
 * The list owns its links. Callers only ever see a `ListNode`, a frozen
 * `{ value }` record: `popFront` hands one over detached, and
 * `prependNode` only takes nodes that are detached.
 */

export interface ListNode<T> {
  readonly value: T;
}

interface Link<T> {
  readonly node: ListNode<T>;
  next: Link<T> | null;
}

// Nodes owned by a caller rather than by a list.
const detached = new WeakSet<ListNode<unknown>>();

/**
 * Create a detached node, ready for `prependNode`.
 */
export function createNode<T>(value: T): ListNode<T> {
  const node: ListNode<T> = Object.freeze({ value });
  detached.add(node);
  return node;
}

export class SinglyLinkedList<T> implements Iterable<T> {
  private _head: Link<T> | null = null;
  private _length = 0;

  /**
   * Create a list whose front-to-back order matches the argument order.
   */
  static of<T>(...values: T[]): SinglyLinkedList<T> {
    return SinglyLinkedList.from(values);
  }

  /**
   * Create a list whose front-to-back order matches the iteration order.
   */
  static from<T>(values: Iterable<T>): SinglyLinkedList<T> {
    const list = new SinglyLinkedList<T>();
    const buffered = [...values];
    for (let i = buffered.length - 1; i >= 0; i--) {
      list.prepend(buffered[i]);
    }
    return list;
  }

  get length(): number {
    return this._length;
  }

  isEmpty(): boolean {
    return this._head === null;
  }

  /**
   * Push a new node carrying `value` onto the front. Returns the node.
   */
  prepend(value: T): ListNode<T> {
    return this.prependNode(createNode(value));
  }

  /**
   * Push a detached node onto the front.
   *
   * Throws for a node that is still held by a list, this one or another.
   */
  prependNode(node: ListNode<T>): ListNode<T> {
    if (!detached.has(node)) {
      throw new Error("`SinglyLinkedList#prependNode` was given a node that is still linked.");
    }
    detached.delete(node);
    this._head = { node, next: this._head };
    this._length++;
    return node;
  }

  /**
   * Detach and return the front node, or `null` when the list is empty.
   */
  popFront(): ListNode<T> | null {
    const link = this._head;
    if (link === null) return null;
    this._head = link.next;
    this._length--;
    detached.add(link.node);
    return link.node;
  }

  peekFront(): T | undefined {
    return this._head?.node.value;
  }

  /**
   * Drop every node. Dropped nodes are not handed to anyone, so they
   * cannot be prepended again.
   */
  clear(): void {
    this._head = null;
    this._length = 0;
  }

  /**
   * Non-destructive front-to-back walk.
   */
  *[Symbol.iterator](): IterableIterator<T> {
    let link = this._head;
    while (link !== null) {
      yield link.node.value;
      link = link.next;
    }
  }

  toArray(): T[] {
    const result: T[] = [];
    for (const value of this) result.push(value);
    return result;
  }
}
