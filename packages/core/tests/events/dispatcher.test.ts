import { describe, it, expect, beforeEach, vi } from "vitest";
import { Dispatcher } from "../../src/events/dispatcher";

class OrderPlaced {
  constructor(readonly orderId: string) {}
}

class OrderShipped {
  constructor(readonly orderId: string) {}
}

describe("Dispatcher", () => {
  let events: Dispatcher;

  beforeEach(() => {
    events = new Dispatcher();
  });

  it("should deliver class events to listeners of that class only", () => {
    const placed = vi.fn();
    const shipped = vi.fn();
    events.listen(OrderPlaced, placed);
    events.listen(OrderShipped, shipped);

    const event = new OrderPlaced("A-1");
    events.dispatch(event);

    expect(placed).toHaveBeenCalledWith(event);
    expect(shipped).not.toHaveBeenCalled();
  });

  it("should deliver named events with their payload", () => {
    const listener = vi.fn();
    events.listen("cache.cleared", listener);

    events.dispatch("cache.cleared", { store: "file" });

    expect(listener).toHaveBeenCalledWith({ store: "file" });
  });

  it("should call listeners in registration order and return their results", () => {
    events.listen("ping", () => "first");
    events.listen("ping", () => "second");

    expect(events.dispatch("ping")).toEqual(["first", "second"]);
  });

  it("should return an empty list when nobody listens", () => {
    expect(events.dispatch(new OrderPlaced("A-2"))).toEqual([]);
  });

  it("should propagate listener errors", () => {
    events.listen("explode", () => {
      throw new Error("listener failed");
    });

    expect(() => events.dispatch("explode")).toThrow("listener failed");
  });

  it("should report and forget listeners", () => {
    events.listen(OrderPlaced, () => undefined);

    expect(events.hasListeners(OrderPlaced)).toBe(true);
    expect(events.hasListeners("other")).toBe(false);

    events.forget(OrderPlaced);

    expect(events.hasListeners(OrderPlaced)).toBe(false);
  });
});
