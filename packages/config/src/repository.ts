import createDebug from "debug";
import type { ConfigContract, ConfigValues } from "@hostbridge/types";

const debug = createDebug("hostbridge:config");

function isRecord(value: unknown): value is ConfigValues {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function segments(path: string): string[] {
  return path.split(".").filter((s) => s.length > 0);
}

/**
 * In-memory configuration store with dotted-path access over nested plain
 * objects. `set("database.default", "main")` and
 * `set({ "database.default": "main" })` are equivalent.
 */
export class ConfigRepository implements ConfigContract {
  private items: ConfigValues;

  constructor(items: ConfigValues = {}) {
    this.items = { ...items };
  }

  has(path: string): boolean {
    return this.lookup(path).found;
  }

  get<T = unknown>(path: string, defaultValue?: T): T {
    const { found, value } = this.lookup(path);
    // Callers name the type they stored; the store itself is untyped.
    return (found ? value : defaultValue) as T;
  }

  /** Returns the value at `path` or throws when nothing is stored there. */
  getOrThrow<T = unknown>(path: string): T {
    const { found, value } = this.lookup(path);
    if (!found) {
      throw new Error(`Config key "${path}" is not set`);
    }
    return value as T;
  }

  set(path: string, value: unknown): void;
  set(values: ConfigValues): void;
  set(pathOrValues: string | ConfigValues, value?: unknown): void {
    if (typeof pathOrValues === "string") {
      this.assign(pathOrValues, value);
      return;
    }
    for (const [path, entry] of Object.entries(pathOrValues)) {
      this.assign(path, entry);
    }
  }

  /** Appends a value to the array stored at `path`, creating it if needed. */
  push(path: string, value: unknown): void {
    this.assign(path, [...this.arrayAt(path), value]);
  }

  /** Prepends a value to the array stored at `path`, creating it if needed. */
  prepend(path: string, value: unknown): void {
    this.assign(path, [value, ...this.arrayAt(path)]);
  }

  forget(path: string): void {
    const keys = segments(path);
    const last = keys.pop();
    if (last === undefined) return;

    let node: unknown = this.items;
    for (const key of keys) {
      if (!isRecord(node)) return;
      node = node[key];
    }
    if (isRecord(node)) {
      debug("forget %s", path);
      delete node[last];
    }
  }

  all(): ConfigValues {
    return this.items;
  }

  private arrayAt(path: string): unknown[] {
    const current = this.get<unknown>(path, []);
    return Array.isArray(current) ? current : [current];
  }

  private lookup(path: string): { found: boolean; value: unknown } {
    let node: unknown = this.items;
    for (const key of segments(path)) {
      if (!isRecord(node) || !(key in node)) {
        return { found: false, value: undefined };
      }
      node = node[key];
    }
    return { found: true, value: node };
  }

  private assign(path: string, value: unknown): void {
    const keys = segments(path);
    const last = keys.pop();
    if (last === undefined) {
      throw new Error("Config path must not be empty");
    }

    debug("set %s", path);
    let node: ConfigValues = this.items;
    for (const key of keys) {
      const next = node[key];
      if (isRecord(next)) {
        node = next;
      } else {
        const created: ConfigValues = {};
        node[key] = created;
        node = created;
      }
    }
    node[last] = value;
  }
}
