import createDebug from "debug";

const debug = createDebug("hostbridge:core:aliases");

export type AliasMap = Record<string, unknown>;

/**
 * Installs short names onto a host object, `globalThis` by default. Names
 * the host already defines are left alone.
 */
export class AliasLoader {
  private installed: string[] = [];

  constructor(
    private readonly aliases: AliasMap,
    private readonly target: object = globalThis,
  ) {}

  install(): void {
    for (const [alias, value] of Object.entries(this.aliases)) {
      if (Reflect.has(this.target, alias)) {
        debug("alias %s already defined, skipping", alias);
        continue;
      }
      Reflect.defineProperty(this.target, alias, {
        value,
        configurable: true,
        enumerable: false,
        writable: true,
      });
      this.installed.push(alias);
    }
  }

  /** Removes only the names this loader installed. */
  uninstall(): void {
    for (const alias of this.installed) {
      Reflect.deleteProperty(this.target, alias);
    }
    this.installed = [];
  }

  getInstalled(): readonly string[] {
    return this.installed;
  }
}
