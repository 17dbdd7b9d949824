import type { Type } from "./common";

// Method-style declaration keeps listeners of specific events assignable to
// the general listener type.
export type EventListener<T = unknown> = { bivarianceHack(event: T): unknown }["bivarianceHack"];

/** Events are keyed by class (dispatched as instances) or by string name. */
export type EventKey<T = unknown> = Type<T> | string;

export interface EventDispatcherContract {
  listen<T extends object>(event: Type<T>, listener: EventListener<T>): void;
  listen(event: string, listener: EventListener): void;
  dispatch(event: object): unknown[];
  dispatch(event: string, payload?: unknown): unknown[];
  hasListeners(event: EventKey): boolean;
  forget(event: EventKey): void;
}
