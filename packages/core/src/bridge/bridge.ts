import createDebug from "debug";
import { ConfigRepository } from "@hostbridge/config";
import { createLogger, readLoggingEnv } from "@hostbridge/logging";
import type { BridgeLogger, ServiceLocatorContract } from "@hostbridge/types";
import type { IncomingMessage } from "node:http";
import { AliasLoader, type AliasMap } from "../aliases/alias-loader";
import { Facade } from "../aliases/facade";
import { View } from "../aliases/view";
import { Container } from "../di/container";
import { ServiceLocator } from "../di/locator";
import { UndefinedOperationError } from "../errors/errors";
import { Dispatcher } from "../events/dispatcher";
import { Filesystem } from "../filesystem/filesystem";
import { CapturedRequest } from "../http/request";
import { setupViaCallable, type ProviderFactory } from "../providers/run-provider";
import { ViewServiceProvider } from "../view/view-service-provider";
import type { FetchMode } from "../database/connection";
import type { ConnectionConfig } from "../database/connection-factory";
import { DatabaseServiceProvider } from "../database/database-service-provider";
import { QueryExecuted } from "../database/events";
import { AbstractPaginator } from "../pagination/abstract-paginator";
import { PaginationServiceProvider } from "../pagination/pagination-service-provider";
import { TranslationServiceProvider } from "../translation/translation-service-provider";
import { Diagnostics, type DiagnosticsConfig } from "../diagnostics/diagnostics";

const debug = createDebug("hostbridge:core:bridge");

export type BridgeOptions = {
  /** Short names installed onto `aliasTarget` during bootstrap. */
  aliases?: AliasMap;
  /** Object receiving the aliases. Defaults to `globalThis`. */
  aliasTarget?: object;
  /** Environment used for request capture and logger settings. */
  env?: NodeJS.ProcessEnv;
};

export const DEFAULT_ALIASES: AliasMap = { View };

type Delegate = (container: Container, args: readonly unknown[]) => unknown;

function keyArgument(operation: string, args: readonly unknown[]): string {
  const key = args[0];
  if (typeof key !== "string") {
    throw new TypeError(`Operation '${operation}' expects a service key as its first argument`);
  }
  return key;
}

// Container operations reachable through Bridge.call().
const DELEGATES: Readonly<Record<string, Delegate>> = {
  resolve: (c, args) => c.resolve(keyArgument("resolve", args)),
  bound: (c, args) => c.bound(keyArgument("bound", args)),
  isResolved: (c, args) => c.isResolved(keyArgument("isResolved", args)),
  registerValue: (c, args) => c.registerValue(keyArgument("registerValue", args), args[1]),
  forget: (c, args) => c.forget(keyArgument("forget", args)),
  flush: (c) => c.flush(),
};

/**
 * Composition root for hosts that are not built on the framework. Owns one
 * container, bootstraps the baseline services and activates optional
 * subsystems through their providers.
 */
export class Bridge implements ServiceLocatorContract {
  private static instance: Bridge | null = null;

  readonly aliases: AliasMap;
  private readonly container = new Container();
  private readonly locator = new ServiceLocator(this.container);
  private readonly aliasLoader: AliasLoader;
  private readonly env: NodeJS.ProcessEnv;
  private bootstrapped = false;

  constructor(options: BridgeOptions = {}) {
    this.aliases = { ...(options.aliases ?? DEFAULT_ALIASES) };
    this.aliasLoader = new AliasLoader(this.aliases, options.aliasTarget);
    this.env = options.env ?? process.env;
  }

  /** The process-wide bridge, created and bootstrapped on first access. */
  static getInstance(): Bridge {
    if (!Bridge.instance) {
      Bridge.instance = new Bridge();
    }
    if (!Bridge.instance.isBootstrapped()) {
      Bridge.instance.bootstrap();
    }
    return Bridge.instance;
  }

  /** Tears down bootstrap state of the process-wide bridge, keeping the object. */
  static flashInstance(): void {
    Bridge.getInstance().flash();
  }

  /** Drops the process-wide bridge entirely. */
  static resetInstance(): void {
    Bridge.instance?.flash();
    Bridge.instance = null;
  }

  bootstrap(): this {
    if (this.bootstrapped) {
      debug("bootstrap: already bootstrapped");
      return this;
    }

    debug("bootstrap: binding baseline services");
    this.container.registerValue("config", new ConfigRepository());
    this.container.registerSingleton("request", (c) =>
      c.bound("runningInConsole") && c.resolve("runningInConsole") === true
        ? CapturedRequest.capture({})
        : CapturedRequest.capture(this.env),
    );
    this.container.registerSingleton("events", () => new Dispatcher());
    this.container.registerSingleton("files", () => new Filesystem());
    this.container.registerSingleton("log", () =>
      createLogger(readLoggingEnv(this.env), this.env),
    );

    Facade.setFacadeApplication(this.container);
    this.aliasLoader.install();

    this.bootstrapped = true;
    return this;
  }

  isBootstrapped(): boolean {
    return this.bootstrapped;
  }

  /** Clears every binding and alias so that bootstrap() can run again. */
  flash(): void {
    debug("flash");
    this.container.flush();
    this.aliasLoader.uninstall();
    if (Facade.getFacadeApplication() === this.container) {
      Facade.setFacadeApplication(null);
      AbstractPaginator.useDefaultResolvers();
    }
    this.bootstrapped = false;
  }

  /** Closes container-managed resources such as database connections, then flashes. */
  async shutdown(): Promise<void> {
    await this.container.closeAll();
    this.flash();
  }

  has(id: string): boolean {
    return this.locator.has(id);
  }

  get<T = unknown>(id: string): T {
    return this.locator.get<T>(id);
  }

  /** Forwards one of the enumerated container operations by name. */
  call(operation: string, args: readonly unknown[] = []): unknown {
    const delegate = Object.hasOwn(DELEGATES, operation) ? DELEGATES[operation] : undefined;
    if (!delegate) {
      throw new UndefinedOperationError(operation);
    }
    return delegate(this.container, args);
  }

  getContainer(): Container {
    return this.container;
  }

  getConfig(): ConfigRepository {
    return this.container.resolve("config");
  }

  getEvents(): Dispatcher {
    return this.container.resolve("events");
  }

  getRequest(): CapturedRequest {
    return this.container.resolve("request");
  }

  getLogger(): BridgeLogger {
    return this.container.resolve("log");
  }

  setupRunningInConsole(is = true): this {
    this.ensureBootstrapped();
    this.container.setItem("runningInConsole", is);
    return this;
  }

  /** Binds `request` to a snapshot of a live Node request. */
  setupRequest(source: IncomingMessage): this {
    this.ensureBootstrapped();
    this.container.registerValue("request", CapturedRequest.fromIncoming(source));
    return this;
  }

  setupView(viewPath: string | string[], compiledPath: string): this {
    return this.setupCallableProvider((container) => {
      this.getConfig().set({
        "view.paths": Array.isArray(viewPath) ? [...viewPath] : [viewPath],
        "view.compiled": compiledPath,
      });

      return new ViewServiceProvider(container);
    });
  }

  setupDatabase(
    connections: Record<string, ConnectionConfig>,
    defaultName = "default",
    fetchMode: FetchMode = "object",
  ): this {
    return this.setupCallableProvider((container) => {
      this.getConfig().set({
        "database.connections": Object.fromEntries(
          Object.entries(connections).map(([name, connection]) => [name, { ...connection }]),
        ),
        "database.default": defaultName,
        "database.fetch": fetchMode,
      });

      return new DatabaseServiceProvider(container);
    });
  }

  setupPagination(): this {
    return this.setupCallableProvider((container) => new PaginationServiceProvider(container));
  }

  setupTranslator(langPath: string): this {
    return this.setupCallableProvider((container) => {
      container.registerValue("path.lang", langPath);

      return new TranslationServiceProvider(container);
    });
  }

  setupLocale(locale: string): this {
    this.ensureBootstrapped();
    this.container.setItem("config.app.locale", locale);
    return this;
  }

  /**
   * Activates the diagnostics bar and feeds executed queries to its database
   * panel. Query records go to the `log` service unless `config.logger` is set.
   */
  setupDiagnostics(config: DiagnosticsConfig = {}): this {
    this.ensureBootstrapped();
    const diagnostics = new Diagnostics({
      ...config,
      logger: config.logger ?? this.getLogger().child("diagnostics"),
    });
    this.container.registerValue("diagnostics", diagnostics);

    const panel = diagnostics.getPanel("database");
    if (!panel) {
      debug("setupDiagnostics: database panel disabled");
      return this;
    }

    this.getEvents().listen(QueryExecuted, (event) => {
      panel.logQuery(
        event.sql,
        event.bindings,
        event.time,
        event.connectionName,
        event.connection.getHandle(),
      );
    });
    return this;
  }

  /** Builds a provider from `factory` and runs its register and boot phases. */
  setupCallableProvider(factory: ProviderFactory): this {
    this.ensureBootstrapped();
    setupViaCallable(factory, this.container);
    return this;
  }

  private ensureBootstrapped(): void {
    if (!this.bootstrapped) {
      debug("setup before bootstrap, bootstrapping now");
      this.bootstrap();
    }
  }
}
