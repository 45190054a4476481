import { pino, type Logger, type LoggerOptions } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type AppLogger = Logger;

const REDACT_PATHS = [
  "secret",
  "*.secret",
  "endpoint.secret",
  "headers.authorization",
  "headers.Authorization",
  'headers["X-SmartPay-Signature"]',
  'headers["mockpay-signature"]',
];

export function createLogger(level: LogLevel = "info"): AppLogger {
  const options: LoggerOptions = {
    level,
    base: {
      pid: process.pid,
      service: "smartpay-webhook-outbox",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
  };
  return pino(options);
}

export function componentLogger(root: AppLogger, component: string): AppLogger {
  return root.child({ component });
}

export const silentLogger: AppLogger = pino({ level: "silent" });
