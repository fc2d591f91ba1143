import { describe, it, expect, afterEach, vi } from "vitest";
import { SinglyLinkedList } from "@cursorkit/collections";
import { config } from "@cursorkit/core";
import { collect } from "../src/cursor.js";
import { None, Some, isSome } from "../src/data/option.js";
import { fold } from "../src/fold.js";
import { ListConsumer } from "../src/list-consumer.js";

describe("ListConsumer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("drains front to back", () => {
    const list = new SinglyLinkedList<number>();
    list.prepend(3);
    list.prepend(2);
    list.prepend(1);

    const consumer = ListConsumer.init(list);
    expect(consumer.next()).toEqual(Some(1));
    expect(consumer.next()).toEqual(Some(2));
    expect(consumer.next()).toEqual(Some(3));
    expect(consumer.next()).toEqual(None);
    expect(list.length).toBe(0);
  });

  it("shrinks the list as it pops", () => {
    const list = SinglyLinkedList.of("a", "b", "c");
    const consumer = ListConsumer.init(list);
    consumer.next();
    expect(list.length).toBe(2);
    expect(list.toArray()).toEqual(["b", "c"]);
  });

  it("stays exhausted", () => {
    const consumer = ListConsumer.init(new SinglyLinkedList<number>());
    expect(consumer.next()).toEqual(None);
    expect(consumer.next()).toEqual(None);
  });

  it("yields null and undefined payloads as values", () => {
    const consumer = ListConsumer.init(SinglyLinkedList.of<null | undefined>(null, undefined));
    const first = consumer.next();
    const second = consumer.next();
    expect(first).toStrictEqual(Some(null));
    expect(isSome(second)).toBe(true);
    expect(second).toStrictEqual(Some(undefined));
    expect(consumer.next()).toEqual(None);
  });

  it("feeds fold and leaves the list empty", () => {
    const list = SinglyLinkedList.of(1, 2, 3, 4);
    expect(fold((acc: number, n: number) => acc + n, ListConsumer.init(list), 0)).toBe(10);
    expect(list.length).toBe(0);
  });

  describe("release", () => {
    it("drops what a partial drain left behind", () => {
      const list = SinglyLinkedList.of(1, 2, 3, 4);
      const consumer = ListConsumer.init(list);
      consumer.next();
      consumer.release();
      expect(list.length).toBe(0);
      expect(consumer.next()).toEqual(None);
      expect(collect(consumer)).toEqual([]);
    });

    it("logs the dropped count when debug is on", () => {
      const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
      config.set({ debug: true });

      const consumer = ListConsumer.init(SinglyLinkedList.of(1, 2, 3, 4));
      consumer.next();
      consumer.release();

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith("[cursorkit:list-consumer] released 3 unconsumed node(s)");
    });

    it("does not log for a drained consumer", () => {
      const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
      config.set({ debug: true });

      const consumer = ListConsumer.init(SinglyLinkedList.of(1));
      collect(consumer);
      consumer.release();

      expect(spy).not.toHaveBeenCalled();
    });
  });
});
