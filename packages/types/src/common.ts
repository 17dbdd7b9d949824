// Constructor type used for class-keyed events. `any[]` for the
// params because typed constructors are rejected against `unknown[]`.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Services are addressed by process-unique string keys, e.g. "config" or "db.connection".
export type ServiceKey = string;

/** Deferred construction callback. Receives the container that resolves it. */
export type ServiceFactory<T = unknown, C = unknown> = (container: C) => T;

export type InstanceBinding<T = unknown> = {
  kind: "instance";
  value: T;
};

export type SingletonBinding<T = unknown, C = unknown> = {
  kind: "singleton";
  create: ServiceFactory<T, C>;
};

export type FactoryBinding<T = unknown, C = unknown> = {
  kind: "factory";
  create: ServiceFactory<T, C>;
};

export type Binding<T = unknown, C = unknown> =
  | InstanceBinding<T>
  | SingletonBinding<T, C>
  | FactoryBinding<T, C>;

/** Values that expose nested, dot-separated path access (e.g. a config repository). */
export interface DottedAccess {
  has(path: string): boolean;
  get(path: string): unknown;
  set(path: string, value: unknown): void;
  forget(path: string): void;
}
