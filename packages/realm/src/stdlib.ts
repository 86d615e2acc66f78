/**
 * Standard library: the constants and stream functions every realm starts
 * with. Streams are resources, so they cross the wire by resource id.
 */

import * as fs from "node:fs"
import * as os from "node:os"
import { types } from "node:util"
import { toInt, toStr } from "./casts.js"
import { typeName } from "./collections.js"
import type { Realm } from "./realm.js"
import { Resource, StreamResource } from "./resource.js"

/** fopen-style modes to fs flags; `b` and `t` are accepted and ignored */
const MODES: Readonly<Record<string, string | number>> = {
  r: "r",
  "r+": "r+",
  w: "w",
  "w+": "w+",
  a: "a",
  "a+": "a+",
  x: "wx",
  "x+": "wx+",
  // create if missing, no truncation, position at the start
  c: fs.constants.O_WRONLY | fs.constants.O_CREAT,
  "c+": fs.constants.O_RDWR | fs.constants.O_CREAT,
}

function openStream(realm: Realm, file: string, mode: string): StreamResource {
  const flags = MODES[mode.replace(/[bt]/g, "")]
  if (flags === undefined) throw new TypeError(`fopen(): invalid mode '${mode}'`)
  const fd = fs.openSync(file, flags)
  return new StreamResource(realm.resources.allocateId(), fd, file, () => fs.closeSync(fd))
}

function asStream(value: unknown): StreamResource {
  if (value instanceof StreamResource) {
    value.assertOpen()
    return value
  }
  throw new TypeError(`Argument #1 must be a stream resource, ${typeName(value)} given`)
}

export function installStdlib(realm: Realm): void {
  realm.defineConstant("EOL", os.EOL)
  realm.defineConstant("NODE_VERSION", process.versions.node)
  realm.defineConstant("INT_MAX", Number.MAX_SAFE_INTEGER)
  realm.defineConstant("INT_MIN", Number.MIN_SAFE_INTEGER)

  realm.defineFunction("fopen", (file: unknown, mode: unknown = "r") => openStream(realm, toStr(file), toStr(mode)), {
    doc: "Open a file and return a stream resource.",
  })

  realm.defineFunction("fwrite", (stream: unknown, data: unknown) => {
    const fd = asStream(stream).fd
    return types.isUint8Array(data) ? fs.writeSync(fd, data) : fs.writeSync(fd, toStr(data))
  }, { doc: "Write a string or bytes to a stream; returns the number of bytes written." })

  realm.defineFunction("fread", (stream: unknown, length: unknown) => {
    const buffer = Buffer.alloc(Math.max(0, toInt(length)))
    const read = fs.readSync(asStream(stream).fd, buffer, 0, buffer.length, null)
    return buffer.subarray(0, read)
  }, { doc: "Read up to length bytes from a stream; the result crosses as bytes." })

  realm.defineFunction("fclose", (stream: unknown) => {
    asStream(stream).close()
    return true
  }, { doc: "Close a stream resource." })

  realm.defineFunction("is_resource", (value: unknown) => value instanceof Resource && value.isOpen, {
    doc: "Whether a value is an open resource.",
  })

  realm.defineFunction("get_resource_type", (value: unknown) => {
    if (!(value instanceof Resource)) throw new TypeError(`get_resource_type(): Argument #1 must be of type resource, ${typeName(value)} given`)
    return value.isOpen ? value.kind : "Unknown"
  }, { doc: "Kind of a resource, or 'Unknown' once it is closed." })
}
