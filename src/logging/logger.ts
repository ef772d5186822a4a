import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/** Credentials that can end up in logged config objects or request errors. */
export const REDACT_PATHS = [
  "apiKey",
  "authToken",
  "adminToken",
  "redisUrl",
  "*.apiKey",
  "*.authToken",
  "*.adminToken",
  "*.redisUrl",
  "headers.apikey",
  "headers.authorization",
];

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const json = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = {
    level,
    base: { service: "turnrelay" },
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, mkdir: true }));
  }
  if (json) {
    return pino(options);
  }
  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,service" },
    },
  });
}
