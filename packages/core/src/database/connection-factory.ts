import Database from "better-sqlite3";
import createDebug from "debug";
import { UnsupportedDriverError } from "../errors/errors";
import { Connection, type FetchMode } from "./connection";

const debug = createDebug("hostbridge:core:database");

export type ConnectionConfig = {
  driver: string;
  /** File path, or ":memory:" for an in-memory database. */
  database?: string;
  readonly?: boolean;
  foreign_key_constraints?: boolean;
  /** Milliseconds to wait on a locked database. */
  busy_timeout?: number;
};

export function isConnectionConfig(value: unknown): value is ConnectionConfig {
  return (
    typeof value === "object" &&
    value !== null &&
    "driver" in value &&
    typeof value.driver === "string"
  );
}

/** Opens driver handles and wraps them in connections. */
export class ConnectionFactory {
  make(config: ConnectionConfig, name: string, fetchMode: FetchMode = "object"): Connection {
    switch (config.driver) {
      case "sqlite":
        return this.createSqliteConnection(config, name, fetchMode);
      default:
        throw new UnsupportedDriverError(config.driver);
    }
  }

  private createSqliteConnection(
    config: ConnectionConfig,
    name: string,
    fetchMode: FetchMode,
  ): Connection {
    const database = config.database ?? ":memory:";
    debug("open sqlite %s (%s)", name, database);

    const handle = new Database(database, {
      readonly: config.readonly ?? false,
      // The driver rejects an explicit undefined timeout.
      ...(config.busy_timeout !== undefined ? { timeout: config.busy_timeout } : {}),
    });
    if (config.foreign_key_constraints !== undefined) {
      handle.pragma(`foreign_keys = ${config.foreign_key_constraints ? "ON" : "OFF"}`);
    }

    return new Connection(handle, name, "sqlite", fetchMode);
  }
}
