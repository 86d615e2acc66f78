import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { ErrResourceClosed } from "../errors.js";
import { Realm } from "../realm.js";
import { Resource, ResourceTable } from "../resource.js";
import { installStdlib } from "../stdlib.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "crossline-stdlib-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("ResourceTable", () => {
  test("ids are sequential and never reused", () => {
    const table = new ResourceTable();
    expect(table.allocateId()).toBe(1);
    expect(table.allocateId()).toBe(2);
    expect(new Resource(table.allocateId(), "process").id).toBe(3);
  });

  test("closing twice raises realm.resource_closed", () => {
    let released = 0;
    const resource = new Resource(1, "stream", () => released++);
    resource.close();
    expect(resource.isOpen).toBe(false);
    expect(released).toBe(1);
    try {
      resource.close();
      throw new Error("expected a throw");
    } catch (err) {
      if (!ErrResourceClosed.is(err)) throw err;
      expect(err.message).toBe("stream resource #1 is already closed");
    }
  });
});

describe("stdlib", () => {
  test("defines the standard constants", () => {
    const realm = new Realm();
    installStdlib(realm);
    expect(realm.getConstant("EOL")).toBe(os.EOL);
    expect(realm.getConstant("INT_MAX")).toBe(Number.MAX_SAFE_INTEGER);
  });

  test("streams write, read back and close", () => {
    const realm = new Realm();
    installStdlib(realm);
    const file = path.join(dir, "notes.txt");

    const out = realm.callFunction("fopen", [file, "wb"]);
    expect(realm.callFunction("get_resource_type", [out])).toBe("stream");
    expect(realm.callFunction("fwrite", [out, "hello"])).toBe(5);
    expect(realm.callFunction("fclose", [out])).toBe(true);
    expect(realm.callFunction("is_resource", [out])).toBe(false);
    expect(realm.callFunction("get_resource_type", [out])).toBe("Unknown");

    const input = realm.callFunction("fopen", [file]);
    expect(realm.callFunction("fread", [input, 3])).toEqual(Buffer.from("hel"));
    expect(realm.callFunction("fread", [input, 10])).toEqual(Buffer.from("lo"));
    expect(realm.callFunction("fread", [input, 10])).toEqual(Buffer.alloc(0));
    realm.callFunction("fclose", [input]);
  });

  test("reads split inside a character keep every byte", () => {
    const realm = new Realm();
    installStdlib(realm);
    const file = path.join(dir, "accent.txt");
    fs.writeFileSync(file, "é");

    const input = realm.callFunction("fopen", [file, "r"]);
    const first = realm.callFunction("fread", [input, 1]);
    const second = realm.callFunction("fread", [input, 1]);
    realm.callFunction("fclose", [input]);

    expect(first).toEqual(Buffer.from([0xc3]));
    expect(second).toEqual(Buffer.from([0xa9]));
    if (!Buffer.isBuffer(first) || !Buffer.isBuffer(second)) throw new Error("expected buffers");
    expect(Buffer.concat([first, second]).toString("utf8")).toBe("é");
  });

  test("bytes write back unchanged", () => {
    const realm = new Realm();
    installStdlib(realm);
    const file = path.join(dir, "raw.bin");
    const out = realm.callFunction("fopen", [file, "wb"]);
    expect(realm.callFunction("fwrite", [out, Buffer.from([0xff, 0x00, 0xc3])])).toBe(3);
    realm.callFunction("fclose", [out]);
    expect(fs.readFileSync(file)).toEqual(Buffer.from([0xff, 0x00, 0xc3]));
  });

  test("c mode writes from the start without truncating", () => {
    const realm = new Realm();
    installStdlib(realm);
    const file = path.join(dir, "keep.txt");
    fs.writeFileSync(file, "abcdef");

    const out = realm.callFunction("fopen", [file, "c"]);
    expect(realm.callFunction("fwrite", [out, "XY"])).toBe(2);
    realm.callFunction("fclose", [out]);
    expect(fs.readFileSync(file, "utf8")).toBe("XYcdef");

    const both = realm.callFunction("fopen", [file, "c+"]);
    expect(realm.callFunction("fread", [both, 3])).toEqual(Buffer.from("XYc"));
    realm.callFunction("fwrite", [both, "!"]);
    realm.callFunction("fclose", [both]);
    expect(fs.readFileSync(file, "utf8")).toBe("XYc!ef");
  });

  test("c mode creates a missing file", () => {
    const realm = new Realm();
    installStdlib(realm);
    const file = path.join(dir, "fresh.txt");
    const out = realm.callFunction("fopen", [file, "c"]);
    realm.callFunction("fwrite", [out, "new"]);
    realm.callFunction("fclose", [out]);
    expect(fs.readFileSync(file, "utf8")).toBe("new");
  });

  test("stream ids come from the realm's resource table", () => {
    const realm = new Realm();
    installStdlib(realm);
    const file = path.join(dir, "a.txt");
    const first = realm.callFunction("fopen", [file, "w"]);
    const second = realm.callFunction("fopen", [file, "r"]);
    expect(first).toBeInstanceOf(Resource);
    expect(realm.classifier.resourceOf(first instanceof Resource ? first : {})).toEqual({ id: 1, kind: "stream" });
    expect(realm.classifier.resourceOf(second instanceof Resource ? second : {})).toEqual({ id: 2, kind: "stream" });
    realm.callFunction("fclose", [first]);
    realm.callFunction("fclose", [second]);
  });

  test("exclusive mode refuses an existing file", () => {
    const realm = new Realm();
    installStdlib(realm);
    const file = path.join(dir, "exists.txt");
    fs.writeFileSync(file, "");
    expect(() => realm.callFunction("fopen", [file, "x"])).toThrow(/EEXIST/);
    expect(() => realm.callFunction("fopen", [file, "q"])).toThrow("fopen(): invalid mode 'q'");
  });

  test("closed streams cannot be written", () => {
    const realm = new Realm();
    installStdlib(realm);
    const stream = realm.callFunction("fopen", [path.join(dir, "b.txt"), "w"]);
    realm.callFunction("fclose", [stream]);
    expect(() => realm.callFunction("fwrite", [stream, "x"])).toThrow("stream resource #1 is already closed");
  });
});
