import createDebug from "debug";
import type { ConfigRepository } from "@hostbridge/config";
import type { EventDispatcherContract } from "@hostbridge/types";
import { ConnectionNotConfiguredError } from "../errors/errors";
import type { Connection, FetchMode } from "./connection";
import { isConnectionConfig, type ConnectionConfig, type ConnectionFactory } from "./connection-factory";

const debug = createDebug("hostbridge:core:database");

function isFetchMode(value: unknown): value is FetchMode {
  return value === "object" || value === "array";
}

/**
 * Resolves named connections from the `database.*` configuration and keeps
 * one open connection per name.
 */
export class DatabaseManager {
  private readonly connections = new Map<string, Connection>();
  private events: EventDispatcherContract | null = null;

  constructor(
    private readonly config: ConfigRepository,
    private readonly factory: ConnectionFactory,
  ) {}

  connection(name?: string): Connection {
    const connectionName = name ?? this.getDefaultConnection();
    const existing = this.connections.get(connectionName);
    if (existing) return existing;

    debug("connection %s: opening", connectionName);
    const connection = this.factory.make(
      this.configuration(connectionName),
      connectionName,
      this.fetchMode(),
    );
    connection.setEventDispatcher(this.events);
    this.connections.set(connectionName, connection);
    return connection;
  }

  getDefaultConnection(): string {
    const name = this.config.get<unknown>("database.default", "default");
    return typeof name === "string" ? name : "default";
  }

  setDefaultConnection(name: string): void {
    this.config.set("database.default", name);
  }

  /** Closes the named (or default) connection and forgets it. */
  purge(name?: string): void {
    const connectionName = name ?? this.getDefaultConnection();
    this.connections.get(connectionName)?.close();
    this.connections.delete(connectionName);
  }

  getConnections(): ReadonlyMap<string, Connection> {
    return this.connections;
  }

  /** Attaches the dispatcher to current and future connections. */
  setEventDispatcher(events: EventDispatcherContract): void {
    this.events = events;
    for (const connection of this.connections.values()) {
      connection.setEventDispatcher(events);
    }
  }

  getEventDispatcher(): EventDispatcherContract | null {
    return this.events;
  }

  close(): void {
    debug("close: %d connections", this.connections.size);
    for (const name of [...this.connections.keys()]) {
      this.purge(name);
    }
  }

  private configuration(name: string): ConnectionConfig {
    const connections = this.config.get<unknown>("database.connections", {});
    const config: unknown =
      typeof connections === "object" && connections !== null
        ? Reflect.get(connections, name)
        : undefined;

    if (!isConnectionConfig(config)) {
      throw new ConnectionNotConfiguredError(name);
    }
    return config;
  }

  private fetchMode(): FetchMode {
    const mode = this.config.get<unknown>("database.fetch", "object");
    return isFetchMode(mode) ? mode : "object";
  }
}
