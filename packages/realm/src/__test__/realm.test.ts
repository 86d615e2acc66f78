import { describe, test, expect } from "vitest";
import {
  ErrConstantAlreadyDefined,
  ErrExitRequested,
  ErrModuleLoadFailed,
  ErrUndefinedConstant,
  ErrUndefinedGlobal,
  ErrUnknownClass,
  ErrUnresolvableFunction,
} from "../errors.js";
import { GLOBALS, Realm } from "../realm.js";
import { Resource } from "../resource.js";

function recordingRealm() {
  const output: string[] = [];
  const realm = new Realm({ output: (text) => output.push(text) });
  return { realm, output };
}

class Point {
  constructor(
    public x: number,
    public y: number,
  ) {}
}

// -- constants -----------------------------------------------------------------

describe("constants", () => {
  test("define once, read many", () => {
    const realm = new Realm();
    realm.defineConstant("ANSWER", 42);
    expect(realm.getConstant("ANSWER")).toBe(42);
    expect(realm.constantNames()).toEqual(["ANSWER"]);
    expect(() => realm.defineConstant("ANSWER", 1)).toThrow("Constant 'ANSWER' already defined");
  });

  test("undefined constants raise realm.undefined_constant", () => {
    const realm = new Realm();
    try {
      realm.getConstant("DOES_NOT_EXIST");
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrUndefinedConstant.is(err)) throw err;
      expect(err.data.name).toBe("DOES_NOT_EXIST");
    }
    expect(ErrConstantAlreadyDefined.code).toBe("realm.constant_already_defined");
  });
});

// -- globals -------------------------------------------------------------------

describe("globals", () => {
  test("set and get", () => {
    const realm = new Realm();
    realm.setGlobal("counter", 1);
    expect(realm.getGlobal("counter")).toBe(1);
    expect(realm.globalNames()).toEqual(["counter"]);
  });

  test("GLOBALS holds every other global and never itself", () => {
    const realm = new Realm();
    realm.setGlobal("a", 1);
    realm.setGlobal("b", "two");
    expect(realm.getGlobal(GLOBALS)).toEqual(new Map<string, unknown>([["a", 1], ["b", "two"]]));
  });

  test("missing globals raise realm.undefined_global", () => {
    const realm = new Realm();
    expect(() => realm.getGlobal("missing")).toThrow("Global variable 'missing' does not exist");
    try {
      realm.getGlobal("missing");
    } catch (err) {
      expect(ErrUndefinedGlobal.is(err)).toBe(true);
    }
  });

  test("evaluated code shares the global scope", () => {
    const realm = new Realm();
    realm.setGlobal("x", 20);
    expect(realm.evaluate("var y = x + 1; y * 2")).toBe(42);
    expect(realm.getGlobal("y")).toBe(21);
  });
});

// -- functions -----------------------------------------------------------------

describe("functions", () => {
  test("registered functions are called with their arguments", () => {
    const realm = new Realm();
    realm.defineFunction("sum", (...ns: number[]) => ns.reduce((a, b) => a + b, 0));
    expect(realm.callFunction("sum", [1, 2, 3])).toBe(6);
  });

  test("language constructs answer when no function is registered", () => {
    const { realm, output } = recordingRealm();
    expect(realm.callFunction("print", ["hello"])).toBe(1);
    expect(realm.callFunction("echo", ["a", 1, true])).toBeNull();
    expect(realm.callFunction("int", ["7 apples"])).toBe(7);
    expect(output).toEqual(["hello", "a11"]);
  });

  test("a real function shadows the construct of the same name", () => {
    const realm = new Realm();
    realm.defineFunction("print", () => "mine");
    expect(realm.callFunction("print", ["x"])).toBe("mine");
    expect(realm.functionNames().filter((name) => name === "print")).toEqual(["print"]);
    expect(realm.functionNames()[0]).toBe("print");
  });

  test("unknown names raise realm.unresolvable_function", () => {
    const realm = new Realm();
    try {
      realm.callFunction("nope", []);
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrUnresolvableFunction.is(err)) throw err;
      expect(err.message).toBe("Could not resolve function 'nope'");
    }
  });

  test("functionInfo covers constructs", () => {
    const realm = new Realm();
    const info = realm.functionInfo("include");
    expect(info.doc).toBe("Load a module; a failure is a warning.");
    expect(info.params.map((p) => p.name)).toEqual(["file"]);
    expect(info.returnType).toBe("bool");
  });

  test("eval runs in the realm", () => {
    const realm = new Realm();
    realm.callFunction("eval", ["var z = 5"]);
    expect(realm.getGlobal("z")).toBe(5);
  });

  test("exit and die request the end of the session", () => {
    const { realm, output } = recordingRealm();
    try {
      realm.callFunction("exit", [3]);
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrExitRequested.is(err)) throw err;
      expect(err.data.status).toBe(3);
    }
    try {
      realm.callFunction("die", ["bye"]);
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrExitRequested.is(err)) throw err;
      expect(err.data.status).toBe(0);
    }
    expect(output).toEqual(["bye"]);
  });

  test("include degrades to false; require fails", async () => {
    const realm = new Realm();
    await expect(realm.callFunction("include", ["./no-such-module.js"])).resolves.toBe(false);
    try {
      await realm.callFunction("require", ["./no-such-module.js"]);
      throw new Error("expected a throw");
    } catch (err) {
      expect(ErrModuleLoadFailed.is(err)).toBe(true);
    }
  });
});

// -- classes -------------------------------------------------------------------

describe("classes", () => {
  test("construct registered classes", () => {
    const realm = new Realm();
    realm.defineClass("Geo\\Point", Point, { properties: ["x", "y"] });
    const point = realm.construct("Geo\\Point", [1, 2]);
    expect(point).toBeInstanceOf(Point);
    expect(realm.classNameOf(point)).toBe("Geo\\Point");
    expect(realm.classNames()).toEqual(["Geo\\Point"]);
  });

  test("unknown classes raise realm.unknown_class", () => {
    const realm = new Realm();
    expect(() => realm.construct("Nope", [])).toThrow("Class 'Nope' not found");
    expect(() => realm.classInfo("Nope")).toThrow("Class 'Nope' not found");
    try {
      realm.construct("Nope", []);
    } catch (err) {
      expect(ErrUnknownClass.is(err)).toBe(true);
    }
  });

  test("unregistered classes are named by their constructor", () => {
    const realm = new Realm();
    expect(realm.classNameOf(new Point(0, 0))).toBe("Point");
    expect(realm.classNameOf(Object.create(null))).toBe("Object");
  });

  test("non-default properties exclude the declared ones", () => {
    const realm = new Realm();
    realm.defineClass("Point", Point, { properties: ["x", "y"] });
    const point = Object.assign(new Point(1, 2), { label: "p" });
    expect(realm.nonDefaultProperties(point)).toEqual(["label"]);
  });
});

// -- resolveName ---------------------------------------------------------------

describe("resolveName", () => {
  test("constant beats function", () => {
    const realm = new Realm();
    realm.defineConstant("dup", 1);
    realm.defineFunction("dup", () => 0);
    expect(realm.resolveName("dup")).toEqual(["const", 1]);
  });

  test("function beats class, class beats global", () => {
    const realm = new Realm();
    realm.defineFunction("Point", () => 0);
    realm.defineClass("Point", Point);
    realm.defineClass("Shape", Point);
    realm.setGlobal("Shape", "global");
    expect(realm.resolveName("Point")).toEqual(["func", "Point"]);
    expect(realm.resolveName("Shape")).toEqual(["class", "Shape"]);
  });

  test("constructs resolve as functions", () => {
    expect(new Realm().resolveName("echo")).toEqual(["func", "echo"]);
  });

  test("globals carry their value; unknown names resolve to none", () => {
    const realm = new Realm();
    realm.setGlobal("g", [1]);
    expect(realm.resolveName("g")).toEqual(["global", [1]]);
    expect(realm.resolveName("unknown")).toEqual(["none", null]);
  });
});

// -- classifier ----------------------------------------------------------------

describe("classifier", () => {
  test("detects resources and names objects", () => {
    const realm = new Realm();
    realm.defineClass("Geo\\Point", Point);
    const { classifier } = realm;
    expect(classifier.resourceOf(new Resource(2, "stream"))).toEqual({ id: 2, kind: "stream" });
    expect(classifier.resourceOf(new Point(0, 0))).toBeUndefined();
    expect(classifier.classNameOf(new Point(0, 0))).toBe("Geo\\Point");
  });
});
