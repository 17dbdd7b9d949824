import createDebug from "debug";
import type { Binding, DottedAccess, ServiceContainer, ServiceKey } from "@hostbridge/types";
import { CircularDependencyError, UnboundServiceError } from "../errors/errors";
import type { BridgeServices } from "./services";

const debug = createDebug("hostbridge:core:di");

export type Resolver<T> = (container: Container) => T;

type CloseEntry = {
  key: ServiceKey;
  value: object;
  close: () => Promise<void> | void;
};

const CLOSE_METHODS = ["close", "end", "quit", "disconnect", "destroy"] as const;

function detectCloseMethod(value: unknown): (() => Promise<void> | void) | null {
  if (typeof value !== "object" || value === null) return null;

  for (const method of CLOSE_METHODS) {
    const fn: unknown = Reflect.get(value, method);
    if (typeof fn === "function") {
      return () => Reflect.apply(fn, value, []);
    }
  }

  return null;
}

function isDottedAccess(value: unknown): value is DottedAccess {
  return (
    typeof value === "object" &&
    value !== null &&
    "get" in value &&
    typeof value.get === "function" &&
    "set" in value &&
    typeof value.set === "function" &&
    "has" in value &&
    typeof value.has === "function" &&
    "forget" in value &&
    typeof value.forget === "function"
  );
}

/**
 * String-keyed service registry with three binding kinds:
 * instances, memoized singletons and per-lookup factories.
 */
export class Container implements ServiceContainer {
  private bindings = new Map<ServiceKey, Binding<unknown, Container>>();
  private resolved = new Map<ServiceKey, unknown>();
  private resolving = new Set<ServiceKey>();
  private closeStack: CloseEntry[] = [];

  registerValue<T>(key: ServiceKey, value: T): void {
    debug("registerValue %s", key);
    this.drop(key);
    this.bindings.set(key, { kind: "instance", value });
    this.resolved.set(key, value);
    this.trackCloseable(key, value);
  }

  registerSingleton<T>(key: ServiceKey, create: Resolver<T>): void {
    debug("registerSingleton %s", key);
    this.drop(key);
    this.bindings.set(key, { kind: "singleton", create });
  }

  registerFactory<T>(key: ServiceKey, create: Resolver<T>): void {
    debug("registerFactory %s", key);
    this.drop(key);
    this.bindings.set(key, { kind: "factory", create });
  }

  resolve<K extends keyof BridgeServices>(key: K): BridgeServices[K];
  resolve<T = unknown>(key: ServiceKey): T;
  resolve(key: ServiceKey): unknown {
    const binding = this.bindings.get(key);
    if (!binding) {
      throw new UnboundServiceError(key);
    }

    if (binding.kind === "instance") {
      return binding.value;
    }

    if (binding.kind === "singleton" && this.resolved.has(key)) {
      debug("resolve %s → cached", key);
      return this.resolved.get(key);
    }

    if (this.resolving.has(key)) {
      throw new CircularDependencyError([...this.resolving, key]);
    }

    debug("resolve %s → constructing (%s)", key, binding.kind);
    this.resolving.add(key);
    try {
      const value = binding.create(this);
      if (binding.kind === "singleton") {
        this.resolved.set(key, value);
        this.trackCloseable(key, value);
      }
      return value;
    } finally {
      this.resolving.delete(key);
    }
  }

  bound(key: ServiceKey): boolean {
    return this.bindings.has(key);
  }

  isResolved(key: ServiceKey): boolean {
    return this.resolved.has(key);
  }

  /**
   * Removes a single binding together with its memoized value. A value that
   * was already materialized stays on the close stack until closeAll().
   */
  forget(key: ServiceKey): void {
    debug("forget %s", key);
    this.drop(key);
    this.bindings.delete(key);
  }

  /** Clears every binding and memoized value. Resources are not closed; see closeAll(). */
  flush(): void {
    debug("flush: %d bindings", this.bindings.size);
    this.bindings.clear();
    this.resolved.clear();
    this.resolving.clear();
    this.closeStack = [];
  }

  /**
   * Item-style access. Unbound dotted keys are routed through the longest
   * bound prefix when its value supports dotted access, so
   * `getItem("config.app.locale")` reads `app.locale` from the config store.
   */
  getItem(key: ServiceKey): unknown {
    if (this.bound(key)) {
      return this.resolve(key);
    }

    const target = this.dottedTarget(key);
    if (target && target.access.has(target.path)) {
      return target.access.get(target.path);
    }

    throw new UnboundServiceError(key);
  }

  setItem(key: ServiceKey, value: unknown): void {
    const target = this.bound(key) ? null : this.dottedTarget(key);
    if (target) {
      target.access.set(target.path, value);
      return;
    }
    this.registerValue(key, value);
  }

  hasItem(key: ServiceKey): boolean {
    if (this.bound(key)) return true;
    const target = this.dottedTarget(key);
    return target !== null && target.access.has(target.path);
  }

  unsetItem(key: ServiceKey): void {
    if (this.bound(key)) {
      this.forget(key);
      return;
    }
    const target = this.dottedTarget(key);
    target?.access.forget(target.path);
  }

  async closeAll(): Promise<void> {
    debug("closeAll: %d resources", this.closeStack.length);
    const entries = [...this.closeStack].reverse();
    this.closeStack = [];
    for (const entry of entries) {
      try {
        debug("closing %s", entry.key);
        await entry.close();
      } catch (error) {
        // Close failure is non-fatal, continue closing remaining services.
        debug("closing %s failed: %O", entry.key, error);
      }
    }
  }

  private dottedTarget(key: ServiceKey): { access: DottedAccess; path: string } | null {
    const parts = key.split(".");
    for (let i = parts.length - 1; i > 0; i--) {
      const prefix = parts.slice(0, i).join(".");
      if (!this.bound(prefix)) continue;

      const value = this.resolve(prefix);
      return isDottedAccess(value) ? { access: value, path: parts.slice(i).join(".") } : null;
    }
    return null;
  }

  private drop(key: ServiceKey): void {
    this.resolved.delete(key);
  }

  private trackCloseable(key: ServiceKey, value: unknown): void {
    const close = detectCloseMethod(value);
    if (!close || typeof value !== "object" || value === null) return;
    if (this.closeStack.some((entry) => entry.value === value)) return;
    this.closeStack.push({ key, value, close });
  }
}
