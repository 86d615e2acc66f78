import { installStdlib, Realm } from "@crossline/realm";
import { CommandDispatcher } from "../command-dispatcher.js";
import { CommandSet } from "../command-set.js";
import { silentLogger } from "../logger.js";
import { LoopbackTransport } from "../transports/loopback-transport.js";

export class Point {
  constructor(
    public x: number,
    public y: number,
  ) {}
}

export function arrayFlip(values: unknown): Map<unknown, number> {
  if (!Array.isArray(values)) throw new TypeError("array_flip(): Argument #1 must be of type array");
  return new Map(values.map((value: unknown, index): [unknown, number] => [value, index]));
}

/** A realm with a few test functions and classes, served in memory */
export function harness() {
  const output: string[] = [];
  const realm = new Realm({ output: (text) => output.push(text) });
  installStdlib(realm);
  realm.defineFunction("array_flip", arrayFlip);
  realm.defineFunction("identity", (value: unknown) => value);
  realm.defineClass("Point", Point, { properties: ["x", "y"] });

  const commands = new CommandSet(realm);
  const dispatcher = new CommandDispatcher(commands, silentLogger());
  const client = new LoopbackTransport((line) => dispatcher.handleLine(line));
  return { realm, commands, dispatcher, client, output };
}
