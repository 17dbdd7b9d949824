import type { BridgeLogger } from "@hostbridge/types";

export type QueryEntry = {
  sql: string;
  bindings: readonly unknown[];
  /** Milliseconds. */
  time: number;
  connectionName: string;
  handle: unknown;
};

/** Collects executed queries for display in the diagnostics bar. */
export class DatabasePanel {
  private queries: QueryEntry[] = [];
  private total = 0;

  constructor(
    private readonly maxQueries = 100,
    private readonly logger: BridgeLogger | null = null,
  ) {}

  logQuery(
    sql: string,
    bindings: readonly unknown[],
    time: number,
    connectionName: string,
    handle: unknown,
  ): void {
    this.total += time;
    if (this.queries.length < this.maxQueries) {
      this.queries.push({ sql, bindings, time, connectionName, handle });
    }
    this.logger?.debug("query executed", { sql, bindings: [...bindings], time, connectionName });
  }

  getQueries(): readonly QueryEntry[] {
    return this.queries;
  }

  /** Number of recorded entries, which stops growing at the cap. */
  count(): number {
    return this.queries.length;
  }

  /** Elapsed time of every logged query, including those past the cap. */
  totalTime(): number {
    return this.total;
  }

  clear(): void {
    this.queries = [];
    this.total = 0;
  }
}
