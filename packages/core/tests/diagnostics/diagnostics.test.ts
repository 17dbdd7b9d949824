import { describe, it, expect, vi } from "vitest";
import type { BridgeLogger } from "@hostbridge/types";
import { DatabasePanel } from "../../src/diagnostics/database-panel";
import { Diagnostics } from "../../src/diagnostics/diagnostics";

function fakeLogger(): BridgeLogger {
  const logger: BridgeLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
    withContext: () => logger,
  };
  return logger;
}

describe("DatabasePanel", () => {
  it("should record queries with their connection and handle", () => {
    const panel = new DatabasePanel();
    const handle = { id: "handle" };

    panel.logQuery("select 1", [], 1.5, "default", handle);

    expect(panel.count()).toBe(1);
    expect(panel.getQueries()[0]).toEqual({
      sql: "select 1",
      bindings: [],
      time: 1.5,
      connectionName: "default",
      handle,
    });
  });

  it("should stop recording at the cap but keep accumulating time", () => {
    const panel = new DatabasePanel(2);

    panel.logQuery("q1", [], 1, "default", null);
    panel.logQuery("q2", [], 2, "default", null);
    panel.logQuery("q3", [], 4, "default", null);

    expect(panel.count()).toBe(2);
    expect(panel.getQueries().map((q) => q.sql)).toEqual(["q1", "q2"]);
    expect(panel.totalTime()).toBe(7);
  });

  it("should clear recorded queries and time", () => {
    const panel = new DatabasePanel();
    panel.logQuery("q1", [], 3, "default", null);

    panel.clear();

    expect(panel.count()).toBe(0);
    expect(panel.totalTime()).toBe(0);
  });

  it("should log each query at debug level", () => {
    const logger = fakeLogger();
    const panel = new DatabasePanel(100, logger);

    panel.logQuery("select * from users where id = ?", [7], 0.25, "main", null);

    expect(logger.debug).toHaveBeenCalledWith("query executed", {
      sql: "select * from users where id = ?",
      bindings: [7],
      time: 0.25,
      connectionName: "main",
    });
  });
});

describe("Diagnostics", () => {
  it("should enable the database panel by default", () => {
    const diagnostics = new Diagnostics();

    expect(diagnostics.enabled).toBe(true);
    expect(diagnostics.getPanel("database")).toBeInstanceOf(DatabasePanel);
  });

  it("should hide panels when disabled", () => {
    expect(new Diagnostics({ enabled: false }).getPanel("database")).toBeUndefined();
  });

  it("should omit the database panel when switched off", () => {
    expect(new Diagnostics({ panels: { database: false } }).getPanel("database")).toBeUndefined();
  });

  it("should pass the query cap to the panel", () => {
    const panel = new Diagnostics({ maxQueries: 1 }).getPanel("database");

    panel?.logQuery("q1", [], 1, "default", null);
    panel?.logQuery("q2", [], 1, "default", null);

    expect(panel?.count()).toBe(1);
  });
});
