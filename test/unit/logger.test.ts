import { Writable } from "node:stream";
import pino from "pino";
import { describe, it, expect } from "vitest";
import { createLogger, REDACT_PATHS } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("defaults to the info level", () => {
    expect(createLogger({ json: true }).level).toBe("info");
  });

  it("takes the configured level", () => {
    expect(createLogger({ level: "debug", json: true }).level).toBe("debug");
    expect(createLogger({ level: "warn", json: true }).level).toBe("warn");
  });

  it("creates child loggers at the parent level", () => {
    const logger = createLogger({ level: "info", json: true });
    const child = logger.child({ channel: "evolution" });
    expect(child.level).toBe("info");
  });

  it("accepts the silent level", () => {
    const logger = createLogger({ level: "silent", json: true });
    expect(logger.isLevelEnabled("error")).toBe(false);
  });
});

describe("REDACT_PATHS", () => {
  it("masks credentials nested one level deep", () => {
    const lines: string[] = [];
    const sink = new Writable({
      write(chunk, _encoding, cb) {
        lines.push(String(chunk));
        cb();
      },
    });
    const logger = pino({ redact: { paths: REDACT_PATHS, censor: "[redacted]" } }, sink);

    logger.info({ evolution: { apiKey: "test-secret", instanceId: "relay" } }, "config");

    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({ evolution: { apiKey: "[redacted]", instanceId: "relay" } });
  });
});
