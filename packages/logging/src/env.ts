import type { LogLevel } from "@hostbridge/types";

export type LogFormat = "json" | "human" | "auto";

export type LoggingConfig = {
  serviceName: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
  redactKeys: string[];
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "human", "auto"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

export function readLoggingEnv(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const rawLevel = env.HOSTBRIDGE_LOG_LEVEL;
  const rawFormat = env.HOSTBRIDGE_LOG_FORMAT;

  return {
    serviceName: env.HOSTBRIDGE_SERVICE_NAME ?? "hostbridge",
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "auto",
    logFilePath: env.HOSTBRIDGE_LOG_FILE_PATH ?? null,
    redactKeys: resolveRedactKeys(env.HOSTBRIDGE_LOG_REDACT_KEYS),
  };
}

function resolveRedactKeys(keys: string | undefined): string[] {
  if (!keys) return [];
  return keys
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}
