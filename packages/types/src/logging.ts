export type LogLevel = "debug" | "info" | "warn" | "error";

/** Application logger bound in the container as `log`. */
export interface BridgeLogger {
  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  /** Logger for one subsystem. Adds `component` to all of its records. */
  child(name: string, attributes?: Record<string, unknown>): BridgeLogger;

  /** Create a logger enriched with additional context attributes. */
  withContext(attributes: Record<string, unknown>): BridgeLogger;
}
