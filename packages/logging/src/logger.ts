import pino from "pino";
import type { BridgeLogger, LogLevel } from "@hostbridge/types";
import type { LoggingConfig } from "./env";

type Attributes = Record<string, unknown>;

/**
 * The `log` service. Root records carry the service name as `name`; loggers
 * handed to subsystems through child() add a `component` field instead, so
 * the service name survives in every record.
 */
export class PinoBridgeLogger implements BridgeLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Attributes): void {
    this.write("debug", message, attributes);
  }

  info(message: string, attributes?: Attributes): void {
    this.write("info", message, attributes);
  }

  warn(message: string, attributes?: Attributes): void {
    this.write("warn", message, attributes);
  }

  error(message: string, attributes?: Attributes): void {
    this.write("error", message, attributes);
  }

  child(component: string, attributes?: Attributes): BridgeLogger {
    return new PinoBridgeLogger(this.pinoLogger.child({ ...attributes, component }));
  }

  withContext(attributes: Attributes): BridgeLogger {
    return new PinoBridgeLogger(this.pinoLogger.child(attributes));
  }

  getLevel(): LogLevel {
    const current: string = this.pinoLogger.level;
    return current === "debug" || current === "warn" || current === "error" ? current : "info";
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }

  private write(level: LogLevel, message: string, attributes: Attributes | undefined): void {
    if (!this.pinoLogger.isLevelEnabled(level)) return;
    if (attributes === undefined) {
      this.pinoLogger[level](message);
      return;
    }
    this.pinoLogger[level](attributes, message);
  }
}

function usesHumanFormat(config: LoggingConfig, env: NodeJS.ProcessEnv): boolean {
  if (config.logFormat === "auto") {
    return env.NODE_ENV !== "production";
  }
  return config.logFormat === "human";
}

function destinations(config: LoggingConfig, env: NodeJS.ProcessEnv): pino.StreamEntry[] {
  const terminal = usesHumanFormat(config, env)
    ? pino.transport({ target: "pino-pretty", options: { destination: 1 } })
    : pino.destination(1);
  const entries: pino.StreamEntry[] = [{ level: config.logLevel, stream: terminal }];

  if (config.logFilePath) {
    // Files always get JSON lines.
    entries.push({ level: config.logLevel, stream: pino.destination(config.logFilePath) });
  }
  return entries;
}

/** Builds the `log` service from HOSTBRIDGE_LOG_* settings. */
export function createLogger(
  config: LoggingConfig,
  env: NodeJS.ProcessEnv = process.env,
): PinoBridgeLogger {
  const logger = pino(
    {
      name: config.serviceName,
      level: config.logLevel,
      redact:
        config.redactKeys.length > 0
          ? { paths: config.redactKeys, censor: "[REDACTED]" }
          : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(destinations(config, env)),
  );

  return new PinoBridgeLogger(logger);
}
