import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { PinoBridgeLogger, createLogger } from "../src/logger";
import type { LoggingConfig } from "../src/env";

/** Collect pino JSON output lines via a writable stream. */
function createCapture(): { stream: Writable; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, cb) {
      chunks.push(chunk.toString());
      cb();
    },
  });
  return {
    stream,
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter(Boolean)
        .map((l) => JSON.parse(l) as Record<string, unknown>),
  };
}

describe("PinoBridgeLogger", () => {
  it("should delegate info() to pino", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoBridgeLogger(pino({ level: "debug" }, stream));

    logger.info("hello");
    expect(lines()).toHaveLength(1);
    expect(lines()[0]!.msg).toBe("hello");
  });

  it("should pass attributes as first argument to pino", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoBridgeLogger(pino({ level: "debug" }, stream));

    logger.info("query logged", { connection: "default" });
    const line = lines()[0]!;
    expect(line.msg).toBe("query logged");
    expect(line.connection).toBe("default");
  });

  it("should delegate all log levels", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoBridgeLogger(pino({ level: "debug" }, stream));

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines().map((l) => l.msg)).toEqual(["d", "i", "w", "e"]);
  });

  it("should tag child loggers with their component", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoBridgeLogger(pino({ name: "shop", level: "debug" }, stream));

    logger.child("database", { driver: "sqlite" }).info("connected");

    const line = lines()[0]!;
    expect(line.name).toBe("shop");
    expect(line.component).toBe("database");
    expect(line.driver).toBe("sqlite");
    expect(line.msg).toBe("connected");
  });

  it("should create a context logger via withContext", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoBridgeLogger(pino({ level: "debug" }, stream));

    logger.withContext({ requestPath: "/users" }).info("rendered");

    const line = lines()[0]!;
    expect(line.requestPath).toBe("/users");
    expect(line.msg).toBe("rendered");
  });

  it("should update level via setLevel", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoBridgeLogger(pino({ level: "info" }, stream));

    logger.debug("should not appear");
    expect(lines()).toHaveLength(0);

    logger.setLevel("debug");
    logger.debug("now it appears");
    expect(lines()).toHaveLength(1);
    expect(lines()[0]!.msg).toBe("now it appears");
  });

  it("should report the current level", () => {
    const logger = new PinoBridgeLogger(pino({ level: "warn" }, createCapture().stream));

    expect(logger.getLevel()).toBe("warn");
    logger.setLevel("debug");
    expect(logger.getLevel()).toBe("debug");
  });

  it("should filter messages below the configured level", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoBridgeLogger(pino({ level: "warn" }, stream));

    logger.debug("skip");
    logger.info("skip");
    logger.warn("keep");
    logger.error("keep");

    expect(lines().map((l) => l.msg)).toEqual(["keep", "keep"]);
  });
});

describe("createLogger", () => {
  const baseConfig: LoggingConfig = {
    serviceName: "test",
    logLevel: "info",
    logFormat: "json",
    logFilePath: null,
    redactKeys: [],
  };

  it("should create a logger that outputs JSON to stdout", () => {
    expect(createLogger(baseConfig)).toBeInstanceOf(PinoBridgeLogger);
  });

  it("should create a logger with redaction paths", () => {
    const logger = createLogger({ ...baseConfig, redactKeys: ["password", "secret"] });
    expect(logger).toBeInstanceOf(PinoBridgeLogger);
  });

  it("should not throw when creating with file output", () => {
    const config: LoggingConfig = {
      ...baseConfig,
      logFilePath: join(tmpdir(), "hostbridge-test-log.json"),
    };
    expect(() => createLogger(config)).not.toThrow();
  });

  it("should use JSON output for auto format in production", () => {
    const config: LoggingConfig = { ...baseConfig, logFormat: "auto" };
    expect(() => createLogger(config, { NODE_ENV: "production" })).not.toThrow();
  });
});
