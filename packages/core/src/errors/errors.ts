export class UnboundServiceError extends Error {
  constructor(public readonly key: string) {
    super(`No binding registered for "${key}".`);
    this.name = "UnboundServiceError";
  }
}

/** Not-found signal surfaced through the service locator. */
export class EntryNotFoundError extends Error {
  constructor(
    public readonly id: string,
    options?: { cause?: unknown },
  ) {
    super(`No entry was found for "${id}".`, options);
    this.name = "EntryNotFoundError";
  }
}

export class UndefinedOperationError extends Error {
  constructor(public readonly operation: string) {
    super(`Undefined operation '${operation}'`);
    this.name = "UndefinedOperationError";
  }
}

export class CircularDependencyError extends Error {
  constructor(public readonly path: readonly string[]) {
    super(`Circular dependency detected: ${path.join(" → ")}`);
    this.name = "CircularDependencyError";
  }
}

export class FileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`File does not exist at path ${path}.`);
    this.name = "FileNotFoundError";
  }
}

export class UnsupportedDriverError extends Error {
  constructor(public readonly driver: string) {
    super(`Unsupported database driver [${driver}].`);
    this.name = "UnsupportedDriverError";
  }
}

export class ConnectionNotConfiguredError extends Error {
  constructor(public readonly connection: string) {
    super(`Database connection [${connection}] not configured.`);
    this.name = "ConnectionNotConfiguredError";
  }
}

export class ViewNotFoundError extends Error {
  constructor(public readonly view: string) {
    super(`View [${view}] not found.`);
    this.name = "ViewNotFoundError";
  }
}

/** A statement failed; carries the SQL and bindings alongside the driver error. */
export class QueryError extends Error {
  constructor(
    public readonly connectionName: string,
    public readonly sql: string,
    public readonly bindings: readonly unknown[],
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${reason} (Connection: ${connectionName}, SQL: ${sql})`, { cause });
    this.name = "QueryError";
  }
}
