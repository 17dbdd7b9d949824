import createDebug from "debug";
import type {
  EventDispatcherContract,
  EventKey,
  EventListener,
  Type,
} from "@hostbridge/types";

const debug = createDebug("hostbridge:core:events");

// Class keys are compared by constructor identity.
type ListenerKey = string | object;

function describe(key: ListenerKey): string {
  return typeof key === "string" ? key : String(Reflect.get(key, "name"));
}

/**
 * Synchronous event dispatcher. Class-keyed listeners receive dispatched
 * instances of that class; string-keyed listeners receive the payload.
 * Listener errors propagate to the dispatching caller.
 */
export class Dispatcher implements EventDispatcherContract {
  private listeners = new Map<ListenerKey, EventListener[]>();

  listen<T extends object>(event: Type<T>, listener: EventListener<T>): void;
  listen(event: string, listener: EventListener): void;
  listen(event: EventKey, listener: EventListener): void {
    debug("listen %s", describe(event));
    const existing = this.listeners.get(event) ?? [];
    existing.push(listener);
    this.listeners.set(event, existing);
  }

  dispatch(event: object): unknown[];
  dispatch(event: string, payload?: unknown): unknown[];
  dispatch(event: object | string, payload?: unknown): unknown[] {
    const key: ListenerKey = typeof event === "string" ? event : event.constructor;
    const listeners = this.listeners.get(key) ?? [];
    debug("dispatch %s → %d listeners", describe(key), listeners.length);

    const body = typeof event === "string" ? payload : event;
    return listeners.map((listener) => listener(body));
  }

  hasListeners(event: EventKey): boolean {
    return (this.listeners.get(event)?.length ?? 0) > 0;
  }

  forget(event: EventKey): void {
    this.listeners.delete(event);
  }
}
