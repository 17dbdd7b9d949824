import { describe, it, expect, afterEach, beforeAll, afterAll, vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigRepository } from "@hostbridge/config";
import { Bridge } from "../../src/bridge/bridge";
import { Facade } from "../../src/aliases/facade";
import { View } from "../../src/aliases/view";
import { Dispatcher } from "../../src/events/dispatcher";
import { Diagnostics } from "../../src/diagnostics/diagnostics";
import { QueryExecuted } from "../../src/database/events";
import { AbstractPaginator } from "../../src/pagination/abstract-paginator";
import { LengthAwarePaginator } from "../../src/pagination/length-aware-paginator";
import { EntryNotFoundError, UndefinedOperationError } from "../../src/errors/errors";
import { ServiceProvider } from "../../src/providers/service-provider";
import type { BridgeLogger } from "@hostbridge/types";
import type { Container } from "../../src/di/container";

const env = {
  REQUEST_METHOD: "GET",
  HTTP_HOST: "shop.test",
  REQUEST_URI: "/products?page=2",
  HOSTBRIDGE_LOG_FORMAT: "json",
  HOSTBRIDGE_LOG_LEVEL: "error",
};

function makeBridge(): Bridge {
  return new Bridge({ aliasTarget: {}, env });
}

let root: string;

beforeAll(() => {
  root = mkdtempSync(join(tmpdir(), "hostbridge-bridge-"));
  mkdirSync(join(root, "views"));
  mkdirSync(join(root, "compiled"));
  mkdirSync(join(root, "lang", "de"), { recursive: true });
  writeFileSync(join(root, "views", "greeting.tpl"), "Hi {{ name }}");
  writeFileSync(join(root, "lang", "de", "messages.json"), JSON.stringify({ hello: "Hallo" }));
});

afterAll(() => {
  rmSync(root, { recursive: true, force: true });
});

afterEach(() => {
  Bridge.resetInstance();
  Facade.setFacadeApplication(null);
  AbstractPaginator.useDefaultResolvers();
});

describe("Bridge bootstrap", () => {
  it("should bind the baseline services", () => {
    const bridge = makeBridge().bootstrap();

    expect(bridge.isBootstrapped()).toBe(true);
    for (const key of ["config", "request", "events", "files", "log"]) {
      expect(bridge.has(key)).toBe(true);
    }
    expect(bridge.get("config")).toBeInstanceOf(ConfigRepository);
    expect(bridge.getConfig().all()).toEqual({});
    expect(bridge.getEvents()).toBeInstanceOf(Dispatcher);
  });

  it("should capture the request from the environment", () => {
    const request = makeBridge().bootstrap().getRequest();

    expect(request.url()).toBe("http://shop.test/products");
    expect(request.input("page")).toBe("2");
  });

  it("should capture an empty request when running in a console", () => {
    const bridge = makeBridge().setupRunningInConsole();

    expect(bridge.getRequest().url()).toBe("http://localhost/");
  });

  it("should keep existing bindings when bootstrapped twice", () => {
    const bridge = makeBridge().bootstrap();
    const config = bridge.getConfig();

    bridge.bootstrap();

    expect(bridge.getConfig()).toBe(config);
  });

  it("should point facades at its container", () => {
    const bridge = makeBridge().bootstrap();

    expect(Facade.getFacadeApplication()).toBe(bridge.getContainer());
  });

  it("should install aliases without replacing existing names", () => {
    const own = class {};
    const target: Record<string, unknown> = { View: own };
    new Bridge({ aliasTarget: target, aliases: { View, Helper: "helper" }, env }).bootstrap();

    expect(target.View).toBe(own);
    expect(target.Helper).toBe("helper");
  });
});

describe("Bridge flash", () => {
  it("should clear bindings and allow bootstrapping again", () => {
    const target: Record<string, unknown> = {};
    const bridge = new Bridge({ aliasTarget: target, env }).bootstrap();
    bridge.getConfig().set("app.name", "demo");

    bridge.flash();

    expect(bridge.isBootstrapped()).toBe(false);
    expect(bridge.has("config")).toBe(false);
    expect(Reflect.has(target, "View")).toBe(false);
    expect(Facade.getFacadeApplication()).toBeNull();

    bridge.bootstrap();
    expect(bridge.getConfig().get("app.name")).toBeUndefined();
    expect(target.View).toBe(View);
  });

  it("should report unbound ids as missing entries", () => {
    const bridge = makeBridge().bootstrap();

    expect(() => bridge.get("mailer")).toThrow(EntryNotFoundError);
  });
});

describe("Bridge.call", () => {
  it("should forward enumerated container operations", () => {
    const bridge = makeBridge().bootstrap();

    bridge.call("registerValue", ["answer", 42]);

    expect(bridge.call("bound", ["answer"])).toBe(true);
    expect(bridge.call("resolve", ["answer"])).toBe(42);
  });

  it("should reject unknown operations", () => {
    const bridge = makeBridge().bootstrap();

    expect(() => bridge.call("makeCoffee")).toThrow(UndefinedOperationError);
    expect(() => bridge.call("toString")).toThrow("Undefined operation 'toString'");
  });

  it("should reject non-string keys", () => {
    const bridge = makeBridge().bootstrap();

    expect(() => bridge.call("resolve", [42])).toThrow(TypeError);
  });
});

describe("Bridge setup", () => {
  it("should bootstrap on first setup call", () => {
    const bridge = makeBridge().setupLocale("fr");

    expect(bridge.isBootstrapped()).toBe(true);
    expect(bridge.getConfig().get("app.locale")).toBe("fr");
  });

  it("should stage view configuration and render templates", () => {
    const bridge = makeBridge().setupView(join(root, "views"), join(root, "compiled"));

    expect(bridge.getConfig().get("view.paths")).toEqual([join(root, "views")]);
    expect(bridge.getConfig().get("view.compiled")).toBe(join(root, "compiled"));
    expect(View.make("greeting", { name: "Ada" }).render()).toBe("Hi Ada");
  });

  it("should share runningInConsole with views", () => {
    const bridge = makeBridge()
      .setupRunningInConsole()
      .setupView(join(root, "views"), join(root, "compiled"));

    expect(bridge.get<{ getShared(): Record<string, unknown> }>("view").getShared()).toEqual({
      runningInConsole: true,
    });
  });

  it("should stage database configuration", () => {
    const bridge = makeBridge().setupDatabase({ main: { driver: "sqlite" } }, "main", "array");

    expect(bridge.getConfig().get("database.default")).toBe("main");
    expect(bridge.getConfig().get("database.fetch")).toBe("array");
    expect(bridge.getConfig().get("database.connections")).toEqual({ main: { driver: "sqlite" } });
    expect(bridge.get("db.connection")).toBe(
      bridge.getContainer().resolve("db").connection("main"),
    );
  });

  it("should resolve paginator state from the bound request", () => {
    makeBridge().setupPagination();

    const paginator = new LengthAwarePaginator(["a"], 30, 10);

    expect(paginator.currentPage).toBe(2);
    expect(paginator.nextPageUrl()).toBe("http://shop.test/products?page=3");
  });

  it("should translate with the configured locale", () => {
    const bridge = makeBridge().setupLocale("de").setupTranslator(join(root, "lang"));

    expect(bridge.getContainer().resolve("translator").get("messages.hello")).toBe("Hallo");
  });

  it("should feed executed queries to the diagnostics panel", () => {
    const bridge = makeBridge()
      .setupDatabase({ default: { driver: "sqlite" } })
      .setupDiagnostics();

    const connection = bridge.getContainer().resolve("db").connection();
    connection.select("select ? as value", [1]);

    const panel = bridge.get<Diagnostics>("diagnostics").getPanel("database");
    expect(panel?.count()).toBe(1);
    expect(panel?.getQueries()[0]?.sql).toBe("select ? as value");
    expect(panel?.getQueries()[0]?.connectionName).toBe("default");
    expect(panel?.getQueries()[0]?.handle).toBe(connection.getHandle());
  });

  it("should log queries through the log service by default", () => {
    const diagnosticsLogger: BridgeLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => diagnosticsLogger,
      withContext: () => diagnosticsLogger,
    };
    const child = vi.fn(() => diagnosticsLogger);
    const bridge = makeBridge().setupDatabase({ default: { driver: "sqlite" } });
    bridge.getContainer().registerValue("log", { ...diagnosticsLogger, child });

    bridge.setupDiagnostics();
    bridge.getContainer().resolve("db").connection().select("select 1");

    expect(child).toHaveBeenCalledWith("diagnostics");
    expect(diagnosticsLogger.debug).toHaveBeenCalledWith(
      "query executed",
      expect.objectContaining({ sql: "select 1", connectionName: "default" }),
    );
  });

  it("should skip the listener when the database panel is off", () => {
    const bridge = makeBridge().setupDiagnostics({ panels: { database: false } });

    expect(bridge.getEvents().hasListeners(QueryExecuted)).toBe(false);
  });

  it("should run callable providers through register and boot", () => {
    const phases: string[] = [];
    class AuditProvider extends ServiceProvider {
      register(): void {
        phases.push("register");
        this.container.registerValue("audit", "on");
      }

      boot(container: Container): void {
        phases.push(`boot:${String(container.resolve("audit"))}`);
      }
    }

    const bridge = makeBridge().setupCallableProvider((container) => new AuditProvider(container));

    expect(phases).toEqual(["register", "boot:on"]);
    expect(bridge.get("audit")).toBe("on");
  });

  it("should copy the connection settings it stages", () => {
    const connections = { default: { driver: "sqlite", database: ":memory:" } };
    const bridge = makeBridge().setupDatabase(connections);

    bridge.getConfig().set("database.connections.default.database", "/tmp/other.sqlite");

    expect(connections.default.database).toBe(":memory:");
  });

  it("should close connections of a replaced database setup on shutdown", async () => {
    const bridge = makeBridge().setupDatabase({ default: { driver: "sqlite" } });
    const first = bridge.getContainer().resolve("db").connection().getHandle();
    bridge.setupDatabase({ default: { driver: "sqlite" } });
    const second = bridge.getContainer().resolve("db").connection().getHandle();

    await bridge.shutdown();

    expect(first).not.toBe(second);
    expect(first.open).toBe(false);
    expect(second.open).toBe(false);
  });

  it("should close database connections on shutdown", async () => {
    const bridge = makeBridge().setupDatabase({ default: { driver: "sqlite" } });
    const handle = bridge.getContainer().resolve("db").connection().getHandle();

    await bridge.shutdown();

    expect(handle.open).toBe(false);
    expect(bridge.isBootstrapped()).toBe(false);
  });
});

describe("Bridge singleton", () => {
  it("should create and bootstrap one shared instance", () => {
    const first = Bridge.getInstance();

    expect(first.isBootstrapped()).toBe(true);
    expect(Bridge.getInstance()).toBe(first);
  });

  it("should flash and rebootstrap the shared instance", () => {
    const first = Bridge.getInstance();
    first.getConfig().set("app.name", "demo");

    Bridge.flashInstance();

    expect(Bridge.getInstance()).toBe(first);
    expect(first.getConfig().get("app.name")).toBeUndefined();
  });

  it("should replace the shared instance after reset", () => {
    const first = Bridge.getInstance();

    Bridge.resetInstance();

    expect(Bridge.getInstance()).not.toBe(first);
  });
});
