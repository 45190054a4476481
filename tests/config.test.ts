import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppError } from "../src/infra/app-error.js";
import { loadRuntimeConfig } from "../src/infra/config.js";

const originalEnv = { ...process.env };

function resetEnv(): void {
  process.env = { ...originalEnv };
  for (const name of Object.keys(process.env)) {
    if (name.startsWith("SMARTPAY_")) {
      delete process.env[name];
    }
  }
  delete process.env.HOST;
  delete process.env.PORT;
}

beforeEach(() => {
  resetEnv();
});

afterEach(() => {
  process.env = { ...originalEnv };
});

describe("Runtime config", () => {
  it("loads defaults", () => {
    const config = loadRuntimeConfig();

    expect(config).toEqual({
      host: "0.0.0.0",
      port: 8080,
      apiKeys: ["dev_smartpay_key"],
      logLevel: "info",
      metricsEnabled: true,
      idempotencyBackend: "memory",
      idempotencyTtlSeconds: 86400,
      idempotencyKeyMaxLength: 128,
      idempotencySweepSeconds: 300,
      notificationsEnabled: true,
      webhooksEnabled: true,
      webhookSender: "http",
      webhookTimeoutSeconds: 5,
      webhookMaxAttempts: 5,
      webhookInitialBackoffMs: 300,
      webhookMaxBackoffMs: 5000,
      webhookPollIntervalMs: 200,
      mockProviderSecret: "dev_mockpay_secret",
    });
  });

  it("reads webhook delivery settings", () => {
    process.env.SMARTPAY_WEBHOOK_MAX_ATTEMPTS = "8";
    process.env.SMARTPAY_WEBHOOK_TIMEOUT_SECONDS = "10";
    process.env.SMARTPAY_WEBHOOK_INITIAL_BACKOFF_MS = "100";
    process.env.SMARTPAY_WEBHOOK_MAX_BACKOFF_MS = "60000";
    process.env.SMARTPAY_WEBHOOK_SENDER = "memory";
    process.env.SMARTPAY_WEBHOOKS_ENABLED = "0";
    process.env.SMARTPAY_WEBHOOK_ENDPOINTS_FILE = "config/webhook-endpoints.example.json";

    const config = loadRuntimeConfig();
    expect(config.webhookMaxAttempts).toBe(8);
    expect(config.webhookTimeoutSeconds).toBe(10);
    expect(config.webhookInitialBackoffMs).toBe(100);
    expect(config.webhookMaxBackoffMs).toBe(60000);
    expect(config.webhookSender).toBe("memory");
    expect(config.webhooksEnabled).toBe(false);
    expect(config.webhookEndpointsFile).toBe("config/webhook-endpoints.example.json");
    expect(config.webhookEndpointsJson).toBeUndefined();
  });

  it("rejects invalid port range", () => {
    process.env.PORT = "99999";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects non-integer attempt counts with a descriptive error", () => {
    process.env.SMARTPAY_WEBHOOK_MAX_ATTEMPTS = "three";

    expect(() => loadRuntimeConfig()).toThrowError(
      "Environment variable 'SMARTPAY_WEBHOOK_MAX_ATTEMPTS' must be an integer.",
    );
  });

  it("rejects an initial backoff above the maximum backoff", () => {
    process.env.SMARTPAY_WEBHOOK_INITIAL_BACKOFF_MS = "6000";
    process.env.SMARTPAY_WEBHOOK_MAX_BACKOFF_MS = "5000";

    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects unknown enum values", () => {
    process.env.SMARTPAY_IDEMPOTENCY_BACKEND = "redis";

    expect(() => loadRuntimeConfig()).toThrowError(
      "Environment variable 'SMARTPAY_IDEMPOTENCY_BACKEND' must be one of: memory, postgres.",
    );
  });

  it("rejects invalid booleans", () => {
    process.env.SMARTPAY_METRICS_ENABLED = "yes";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("requires a postgres url for the postgres idempotency backend", () => {
    process.env.SMARTPAY_IDEMPOTENCY_BACKEND = "postgres";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);

    process.env.SMARTPAY_POSTGRES_URL = "postgres://localhost:5432/smartpay";
    const config = loadRuntimeConfig();
    expect(config.idempotencyBackend).toBe("postgres");
    expect(config.postgresUrl).toBe("postgres://localhost:5432/smartpay");
  });

  it("rejects endpoints configured both inline and by file", () => {
    process.env.SMARTPAY_WEBHOOK_ENDPOINTS_FILE = "config/webhook-endpoints.example.json";
    process.env.SMARTPAY_WEBHOOK_ENDPOINTS = '{"tenants":{}}';

    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects default API key in production", () => {
    process.env.NODE_ENV = "production";
    process.env.SMARTPAY_MOCK_PROVIDER_SECRET = "prod_mock_secret";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects default mock provider secret in production", () => {
    process.env.NODE_ENV = "production";
    process.env.SMARTPAY_API_KEY = "prod_test_key_1234";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("accepts explicit production credentials", () => {
    process.env.NODE_ENV = "production";
    process.env.SMARTPAY_API_KEY = "prod_test_key_1234";
    process.env.SMARTPAY_MOCK_PROVIDER_SECRET = "prod_mock_secret";

    const config = loadRuntimeConfig();
    expect(config.apiKeys).toEqual(["prod_test_key_1234"]);
    expect(config.mockProviderSecret).toBe("prod_mock_secret");
  });

  it("supports API key rotation list", () => {
    process.env.SMARTPAY_API_KEYS = "new_key_12345678,old_key_12345678,new_key_12345678";

    const config = loadRuntimeConfig();
    expect(config.apiKeys).toEqual(["new_key_12345678", "old_key_12345678"]);
  });

  it("rejects empty API key rotation list", () => {
    process.env.SMARTPAY_API_KEYS = " , ";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("rejects default API key in production when rotation list is configured", () => {
    process.env.NODE_ENV = "production";
    process.env.SMARTPAY_API_KEYS = "dev_smartpay_key,prod_key_12345678";
    process.env.SMARTPAY_MOCK_PROVIDER_SECRET = "prod_mock_secret";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });
});
