import { AppError } from "./app-error.js";
import type { LogLevel } from "./logger.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export const DEFAULT_API_KEY = "dev_smartpay_key";
export const DEFAULT_MOCK_PROVIDER_SECRET = "dev_mockpay_secret";

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKeys: string[];
  logLevel: LogLevel;
  metricsEnabled: boolean;
  idempotencyBackend: "memory" | "postgres";
  idempotencyTtlSeconds: number;
  idempotencyKeyMaxLength: number;
  idempotencySweepSeconds: number;
  postgresUrl?: string;
  notificationsEnabled: boolean;
  webhooksEnabled: boolean;
  webhookSender: "http" | "memory";
  webhookTimeoutSeconds: number;
  webhookMaxAttempts: number;
  webhookInitialBackoffMs: number;
  webhookMaxBackoffMs: number;
  webhookPollIntervalMs: number;
  webhookEndpointsFile?: string;
  webhookEndpointsJson?: string;
  mockProviderSecret: string;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("SMARTPAY_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("SMARTPAY_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const logLevel = parseEnumEnv(
    "SMARTPAY_LOG_LEVEL",
    ["debug", "info", "warn", "error", "silent"] as const,
    "info",
  );
  const metricsEnabled = parseBooleanEnv("SMARTPAY_METRICS_ENABLED", true);
  const idempotencyBackend = parseEnumEnv(
    "SMARTPAY_IDEMPOTENCY_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const idempotencyTtlSeconds = parseIntegerEnv("SMARTPAY_IDEMPOTENCY_TTL_SECONDS", 86400, 1, 2_592_000);
  const idempotencyKeyMaxLength = parseIntegerEnv("SMARTPAY_IDEMPOTENCY_KEY_MAX_LENGTH", 128, 128, 1024);
  const idempotencySweepSeconds = parseIntegerEnv("SMARTPAY_IDEMPOTENCY_SWEEP_SECONDS", 300, 0, 86400);
  const postgresUrl = parseOptionalStringEnv("SMARTPAY_POSTGRES_URL", 12);
  const notificationsEnabled = parseBooleanEnv("SMARTPAY_NOTIFICATIONS_ENABLED", true);
  const webhooksEnabled = parseBooleanEnv("SMARTPAY_WEBHOOKS_ENABLED", true);
  const webhookSender = parseEnumEnv("SMARTPAY_WEBHOOK_SENDER", ["http", "memory"] as const, "http");
  const webhookTimeoutSeconds = parseIntegerEnv("SMARTPAY_WEBHOOK_TIMEOUT_SECONDS", 5, 1, 300);
  const webhookMaxAttempts = parseIntegerEnv("SMARTPAY_WEBHOOK_MAX_ATTEMPTS", 5, 1, 20);
  const webhookInitialBackoffMs = parseIntegerEnv("SMARTPAY_WEBHOOK_INITIAL_BACKOFF_MS", 300, 1, 60000);
  const webhookMaxBackoffMs = parseIntegerEnv("SMARTPAY_WEBHOOK_MAX_BACKOFF_MS", 5000, 1, 300000);
  const webhookPollIntervalMs = parseIntegerEnv("SMARTPAY_WEBHOOK_POLL_INTERVAL_MS", 200, 10, 10000);
  const webhookEndpointsFile = parseOptionalStringEnv("SMARTPAY_WEBHOOK_ENDPOINTS_FILE", 1);
  const webhookEndpointsJson = parseOptionalStringEnv("SMARTPAY_WEBHOOK_ENDPOINTS", 2);
  const mockProviderSecret = parseStringEnv("SMARTPAY_MOCK_PROVIDER_SECRET", DEFAULT_MOCK_PROVIDER_SECRET, 8);

  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "SMARTPAY_API_KEYS" : "SMARTPAY_API_KEY",
      "must not include default key value in production",
    );
  }
  if (process.env.NODE_ENV === "production" && mockProviderSecret === DEFAULT_MOCK_PROVIDER_SECRET) {
    throw invalidConfig("SMARTPAY_MOCK_PROVIDER_SECRET", "must not use default value in production");
  }
  if (webhookInitialBackoffMs > webhookMaxBackoffMs) {
    throw invalidConfig(
      "SMARTPAY_WEBHOOK_INITIAL_BACKOFF_MS",
      "must be lower or equal to SMARTPAY_WEBHOOK_MAX_BACKOFF_MS",
    );
  }
  if (webhookEndpointsFile && webhookEndpointsJson) {
    throw invalidConfig(
      "SMARTPAY_WEBHOOK_ENDPOINTS",
      "must not be set together with SMARTPAY_WEBHOOK_ENDPOINTS_FILE",
    );
  }
  if (idempotencyBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("SMARTPAY_POSTGRES_URL", "is required when the postgres idempotency backend is enabled");
  }

  return {
    host,
    port,
    apiKeys,
    logLevel,
    metricsEnabled,
    idempotencyBackend,
    idempotencyTtlSeconds,
    idempotencyKeyMaxLength,
    idempotencySweepSeconds,
    notificationsEnabled,
    webhooksEnabled,
    webhookSender,
    webhookTimeoutSeconds,
    webhookMaxAttempts,
    webhookInitialBackoffMs,
    webhookMaxBackoffMs,
    webhookPollIntervalMs,
    mockProviderSecret,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(webhookEndpointsFile ? { webhookEndpointsFile } : {}),
    ...(webhookEndpointsJson ? { webhookEndpointsJson } : {}),
  };
}
