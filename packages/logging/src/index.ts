export { PinoBridgeLogger, createLogger } from "./logger";
export { readLoggingEnv } from "./env";
export type { LoggingConfig, LogFormat } from "./env";
