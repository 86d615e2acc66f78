/**
 * ModuleLoader: brings code into the realm (`include`, `require`, `--preload`).
 *
 * A module either exports `register(realm)`, which installs whatever it
 * wants, or has its exports picked up by shape: classes become classes,
 * other functions become functions, anything else becomes a constant
 * (unless that constant already exists).
 */

import * as path from "node:path"
import { pathToFileURL } from "node:url"
import { ErrModuleLoadFailed } from "./errors.js"
import { isClassConstructor } from "./reflection.js"
import type { Realm } from "./realm.js"

function isPathLike(specifier: string): boolean {
  return specifier.startsWith(".") || path.isAbsolute(specifier)
}

export class ModuleLoader {
  private readonly loaded = new Set<string>()

  constructor(
    private readonly realm: Realm,
    private readonly baseDir: string = process.cwd(),
  ) {}

  /** The import specifier a path or package name resolves to */
  resolve(specifier: string): string {
    return isPathLike(specifier) ? pathToFileURL(path.resolve(this.baseDir, specifier)).href : specifier
  }

  isLoaded(specifier: string): boolean {
    return this.loaded.has(this.resolve(specifier))
  }

  /** Load a module and install its exports; fails with realm.module_load_failed */
  load(specifier: string): Promise<void> {
    const resolved = this.resolve(specifier)
    return ErrModuleLoadFailed.wrap({ specifier }, async () => {
      const namespace: unknown = await import(resolved)
      if (typeof namespace === "object" && namespace !== null) {
        await this.install(namespace)
      }
      this.loaded.add(resolved)
    })
  }

  /** Load unless already loaded; reports whether it loaded now */
  async loadOnce(specifier: string): Promise<boolean> {
    if (this.isLoaded(specifier)) return false
    await this.load(specifier)
    return true
  }

  private async install(namespace: object): Promise<void> {
    const register: unknown = Reflect.get(namespace, "register")
    if (typeof register === "function") {
      await Reflect.apply(register, undefined, [this.realm])
      return
    }

    for (const [name, value] of Object.entries(namespace)) {
      if (name === "default") continue
      if (isClassConstructor(value)) {
        this.realm.defineClass(name, value)
      } else if (typeof value === "function") {
        this.realm.defineFunction(name, value)
      } else if (!this.realm.hasConstant(name)) {
        this.realm.defineConstant(name, value)
      }
    }
  }
}
