import type { Connection } from "./connection";

/** Dispatched after every statement a connection runs. */
export class QueryExecuted {
  readonly connectionName: string;

  constructor(
    readonly sql: string,
    readonly bindings: readonly unknown[],
    /** Elapsed time in milliseconds. */
    readonly time: number,
    readonly connection: Connection,
  ) {
    this.connectionName = connection.getName();
  }
}
