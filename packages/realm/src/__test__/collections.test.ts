import { describe, test, expect } from "vitest";
import { IterationCursor, count, delItem, getItem, hasItem, setItem, typeName } from "../collections.js";
import { ErrInvalidCursor, ErrNotCountable, ErrNotIterable, ErrUndefinedOffset } from "../errors.js";
import { Realm } from "../realm.js";

class Bag {
  readonly items = new Map<unknown, unknown>();
  offsetExists(offset: unknown) {
    return this.items.has(offset);
  }
  offsetGet(offset: unknown) {
    return this.items.get(offset);
  }
  offsetSet(offset: unknown, value: unknown) {
    this.items.set(offset, value);
  }
  offsetUnset(offset: unknown) {
    this.items.delete(offset);
  }
  count() {
    return this.items.size;
  }
}

// -- typeName ------------------------------------------------------------------

describe("typeName", () => {
  test("names scalars, arrays and classes", () => {
    expect(typeName(null)).toBe("null");
    expect(typeName(1)).toBe("number");
    expect(typeName([])).toBe("array");
    expect(typeName(new Bag())).toBe("Bag");
  });
});

// -- count ---------------------------------------------------------------------

describe("count", () => {
  test("arrays, maps, sets and count() objects", () => {
    expect(count([1, 2, 3])).toBe(3);
    expect(count(new Map([[1, 1]]))).toBe(1);
    expect(count(new Set(["a", "b"]))).toBe(2);
    const bag = new Bag();
    bag.offsetSet("a", 1);
    expect(count(bag)).toBe(1);
  });

  test("strings are not countable", () => {
    try {
      count("abc");
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrNotCountable.is(err)) throw err;
      expect(err.message).toBe("Value of type 'string' is not countable");
    }
  });
});

// -- item access ---------------------------------------------------------------

describe("item access", () => {
  test("arrays by integer offset, including digit strings", () => {
    expect(getItem([10, 20], 1)).toBe(20);
    expect(getItem([10, 20], "0")).toBe(10);
    expect(hasItem([10, null], 1)).toBe(false);
    expect(hasItem([10], 0)).toBe(true);
  });

  test("a missing offset raises realm.undefined_offset", () => {
    expect(() => getItem([10], 5)).toThrow("Undefined offset: 5");
    expect(() => getItem(new Map([["a", 1]]), "b")).toThrow("Undefined offset: b");
    try {
      getItem([], 0);
      throw new Error("expected a throw");
    } catch (err) {
      expect(ErrUndefinedOffset.is(err)).toBe(true);
    }
  });

  test("setItem with a null offset appends", () => {
    const list = [1];
    setItem(list, null, 2);
    setItem(list, 0, 9);
    expect(list).toEqual([9, 2]);
  });

  test("maps by key", () => {
    const map = new Map<unknown, unknown>([["a", 1]]);
    setItem(map, "b", 2);
    delItem(map, "a");
    expect([...map]).toEqual([["b", 2]]);
    expect(hasItem(map, "b")).toBe(true);
  });

  test("delItem removes array elements", () => {
    const list = ["a", "b", "c"];
    delItem(list, 1);
    expect(list).toEqual(["a", "c"]);
  });

  test("offset protocol objects", () => {
    const bag = new Bag();
    setItem(bag, "k", "v");
    expect(hasItem(bag, "k")).toBe(true);
    expect(getItem(bag, "k")).toBe("v");
    delItem(bag, "k");
    expect(hasItem(bag, "k")).toBe(false);
  });

  test("plain values are not indexable", () => {
    expect(() => getItem(5, 0)).toThrow("Value of type 'number' does not support item access");
  });
});

// -- iteration -----------------------------------------------------------------

describe("IterationCursor", () => {
  test("steps through a map and stays exhausted", () => {
    const cursor = IterationCursor.over(new Map([["a", 1], ["b", 2]]));
    expect(cursor.next()).toEqual([true, "a", 1]);
    expect(cursor.next()).toEqual([true, "b", 2]);
    expect(cursor.next()).toEqual([false, null, null]);
    expect(cursor.next()).toEqual([false, null, null]);
  });

  test("arrays yield index and value", () => {
    const cursor = IterationCursor.over(["x", "y"]);
    expect(cursor.next()).toEqual([true, 0, "x"]);
    expect(cursor.next()).toEqual([true, 1, "y"]);
  });

  test("sets and generators yield positions", () => {
    const cursor = IterationCursor.over(new Set(["p"]));
    expect(cursor.next()).toEqual([true, 0, "p"]);

    function* letters() {
      yield "a";
      yield "b";
    }
    const gen = IterationCursor.over(letters());
    expect(gen.next()).toEqual([true, 0, "a"]);
    expect(gen.next()).toEqual([true, 1, "b"]);
    expect(gen.next()).toEqual([false, null, null]);
  });

  test("objects with entries() iterate through it", () => {
    const source = {
      *entries() {
        yield ["k1", 1];
        yield ["k2", 2];
      },
    };
    const cursor = IterationCursor.over(source);
    expect(cursor.next()).toEqual([true, "k1", 1]);
    expect(cursor.next()).toEqual([true, "k2", 2]);
  });

  test("plain objects iterate their own properties", () => {
    const cursor = IterationCursor.over({ name: "n" });
    expect(cursor.next()).toEqual([true, "name", "n"]);
    expect(cursor.next()).toEqual([false, null, null]);
  });

  test("scalars are not iterable", () => {
    try {
      IterationCursor.over(5);
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrNotIterable.is(err)) throw err;
      expect(err.data.valueType).toBe("number");
    }
  });

  test("advance rejects anything but a cursor", () => {
    expect(() => IterationCursor.advance({})).toThrow("Expected an iteration cursor, got 'Object'");
    try {
      IterationCursor.advance(null);
      throw new Error("expected a throw");
    } catch (err) {
      expect(ErrInvalidCursor.is(err)).toBe(true);
    }
  });
});

// -- evaluated collections -----------------------------------------------------

describe("collections built by evaluated code", () => {
  test("maps and sets count, index and iterate", () => {
    const realm = new Realm();
    const map = realm.evaluate("new Map([['a', 1], ['b', 2]])");
    const set = realm.evaluate("new Set(['x'])");

    expect(count(map)).toBe(2);
    expect(count(set)).toBe(1);
    expect(hasItem(map, "a")).toBe(true);
    expect(getItem(map, "b")).toBe(2);

    const cursor = IterationCursor.over(set);
    expect(cursor.next()).toEqual([true, 0, "x"]);
    expect(cursor.next()).toEqual([false, null, null]);
  });
});
