import type Database from "better-sqlite3";
import createDebug from "debug";
import type { EventDispatcherContract } from "@hostbridge/types";
import { QueryError } from "../errors/errors";
import { QueryExecuted } from "./events";

const debug = createDebug("hostbridge:core:database");

/** "object" returns rows keyed by column, "array" returns positional rows. */
export type FetchMode = "object" | "array";

export type LoggedQuery = {
  query: string;
  bindings: readonly unknown[];
  time: number;
};

type Statement = Database.Statement<unknown[], unknown>;

function prepareBinding(value: unknown): unknown {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

export class Connection {
  private events: EventDispatcherContract | null = null;
  private loggingQueries = false;
  private queryLog: LoggedQuery[] = [];

  constructor(
    private readonly handle: Database.Database,
    private readonly name: string,
    private readonly driver: string,
    private fetchMode: FetchMode = "object",
  ) {}

  select(sql: string, bindings: readonly unknown[] = []): unknown[] {
    return this.run(sql, bindings, (params) => {
      const statement = this.prepare(sql);
      return this.fetchMode === "array" ? statement.raw(true).all(...params) : statement.all(...params);
    });
  }

  selectOne(sql: string, bindings: readonly unknown[] = []): unknown {
    return this.select(sql, bindings)[0];
  }

  insert(sql: string, bindings: readonly unknown[] = []): boolean {
    return this.statement(sql, bindings);
  }

  /** Returns the number of affected rows. */
  update(sql: string, bindings: readonly unknown[] = []): number {
    return this.affectingStatement(sql, bindings);
  }

  /** Returns the number of affected rows. */
  delete(sql: string, bindings: readonly unknown[] = []): number {
    return this.affectingStatement(sql, bindings);
  }

  statement(sql: string, bindings: readonly unknown[] = []): boolean {
    this.run(sql, bindings, (params) => this.prepare(sql).run(...params));
    return true;
  }

  affectingStatement(sql: string, bindings: readonly unknown[] = []): number {
    return this.run(sql, bindings, (params) => this.prepare(sql).run(...params).changes);
  }

  /** Runs raw SQL, possibly several statements, without bindings. */
  unprepared(sql: string): boolean {
    this.run(sql, [], () => this.handle.exec(sql));
    return true;
  }

  /** Runs `callback` inside a transaction, rolling back when it throws. */
  transaction<T>(callback: (connection: Connection) => T): T {
    return this.handle.transaction(() => callback(this))();
  }

  lastInsertId(): number | bigint {
    const row = this.handle.prepare("select last_insert_rowid() as id").get();
    if (typeof row === "object" && row !== null && "id" in row) {
      const id = row.id;
      if (typeof id === "number" || typeof id === "bigint") return id;
    }
    return 0;
  }

  enableQueryLog(): void {
    this.loggingQueries = true;
  }

  disableQueryLog(): void {
    this.loggingQueries = false;
  }

  getQueryLog(): readonly LoggedQuery[] {
    return this.queryLog;
  }

  flushQueryLog(): void {
    this.queryLog = [];
  }

  setEventDispatcher(events: EventDispatcherContract | null): void {
    this.events = events;
  }

  getEventDispatcher(): EventDispatcherContract | null {
    return this.events;
  }

  getFetchMode(): FetchMode {
    return this.fetchMode;
  }

  setFetchMode(mode: FetchMode): void {
    this.fetchMode = mode;
  }

  getName(): string {
    return this.name;
  }

  getDriverName(): string {
    return this.driver;
  }

  /** The underlying driver handle. */
  getHandle(): Database.Database {
    return this.handle;
  }

  close(): void {
    if (this.handle.open) {
      debug("close %s", this.name);
      this.handle.close();
    }
  }

  private prepare(sql: string): Statement {
    return this.handle.prepare(sql);
  }

  private run<T>(sql: string, bindings: readonly unknown[], execute: (params: unknown[]) => T): T {
    const start = performance.now();
    const params = bindings.map(prepareBinding);

    let result: T;
    try {
      result = execute(params);
    } catch (error) {
      throw new QueryError(this.name, sql, bindings, error);
    }

    this.logQuery(sql, bindings, Math.round((performance.now() - start) * 100) / 100);
    return result;
  }

  private logQuery(sql: string, bindings: readonly unknown[], time: number): void {
    debug("[%s] %s (%dms)", this.name, sql, time);
    if (this.loggingQueries) {
      this.queryLog.push({ query: sql, bindings, time });
    }
    this.events?.dispatch(new QueryExecuted(sql, bindings, time, this));
  }
}
