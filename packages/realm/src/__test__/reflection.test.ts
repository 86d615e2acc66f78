import { describe, test, expect } from "vitest";
import { describeClass, describeFunction, inferParams, isClassConstructor, parentClass } from "../reflection.js";

class Shape {
  static SIDES = 0;
  static create() {
    return new Shape();
  }
  area() {
    return 0;
  }
}

class Square extends Shape {
  constructor(readonly side = 1) {
    super();
  }
  override area() {
    return this.side * this.side;
  }
}

class Cube extends Square {}

const namer = (cls: Function) => (cls === Shape ? "Geo\\Shape" : cls === Square ? "Geo\\Square" : cls.name);

// -- inferParams ---------------------------------------------------------------

describe("inferParams", () => {
  test("reads names, literal defaults and rest parameters", () => {
    function pad(text: string, width = 8, fill = "-", ...extra: unknown[]) {
      return [text, width, fill, extra];
    }
    expect(inferParams(pad)).toEqual([
      { name: "text", type: null, hasDefault: false, default: null, isOptional: false, variadic: false },
      { name: "width", type: null, hasDefault: true, default: 8, isOptional: true, variadic: false },
      { name: "fill", type: null, hasDefault: true, default: "-", isOptional: true, variadic: false },
      { name: "extra", type: null, hasDefault: false, default: null, isOptional: true, variadic: true },
    ]);
  });

  test("non-literal defaults are reported without a value", () => {
    const stamp = (at = Date.now()) => at;
    expect(inferParams(stamp)).toEqual([
      { name: "at", type: null, hasDefault: true, default: null, isOptional: true, variadic: false },
    ]);
  });

  test("arrow functions", () => {
    const twice = (n: number) => n * 2;
    expect(inferParams(twice).map((p) => p.name)).toEqual(["n"]);
  });

  test("classes use their constructor, or their parent's", () => {
    expect(inferParams(Square).map((p) => [p.name, p.default])).toEqual([["side", 1]]);
    expect(inferParams(Cube).map((p) => p.name)).toEqual(["side"]);
    expect(inferParams(Shape)).toEqual([]);
  });

  test("native functions have no readable parameters", () => {
    expect(inferParams(Math.max)).toEqual([]);
  });
});

// -- class helpers -------------------------------------------------------------

describe("isClassConstructor / parentClass", () => {
  test("tells classes from plain functions", () => {
    expect(isClassConstructor(Shape)).toBe(true);
    expect(isClassConstructor(function plain() {})).toBe(false);
    expect(isClassConstructor("class")).toBe(false);
  });

  test("walks to the parent class", () => {
    expect(parentClass(Cube)).toBe(Square);
    expect(parentClass(Shape)).toBeUndefined();
  });
});

// -- descriptions --------------------------------------------------------------

describe("describeFunction", () => {
  test("metadata wins over inference", () => {
    const info = describeFunction("greet", (name: string) => name, {
      doc: "Say hello.",
      returnType: "string",
    });
    expect(info.name).toBe("greet");
    expect(info.doc).toBe("Say hello.");
    expect(info.returnType).toBe("string");
    expect(info.params.map((p) => p.name)).toEqual(["name"]);
  });

  test("without metadata there is no doc or return type", () => {
    const info = describeFunction("noop", () => undefined);
    expect(info).toEqual({ name: "noop", doc: null, params: [], returnType: null });
  });
});

describe("describeClass", () => {
  const info = describeClass("Geo\\Square", Square, { doc: "A square.", properties: ["side"] }, namer, () => undefined);

  test("names the class and its parent", () => {
    expect(info.name).toBe("Geo\\Square");
    expect(info.parent).toBe("Geo\\Shape");
    expect(info.doc).toBe("A square.");
    expect(info.properties).toEqual(["side"]);
  });

  test("collects inherited methods with their owner", () => {
    expect([...info.methods.keys()]).toEqual(["area", "create"]);
    expect(info.methods.get("area")).toMatchObject({ static: false, owner: "Geo\\Square" });
    expect(info.methods.get("create")).toMatchObject({ static: true, owner: "Geo\\Shape" });
  });

  test("static values become constants", () => {
    expect(info.consts).toEqual(new Map([["SIDES", 0]]));
  });

  test("flags default to false", () => {
    expect(info.isAbstract).toBe(false);
    expect(info.isInterface).toBe(false);
    expect(info.interfaces).toEqual([]);
  });
});
