import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

const TENANT_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;
const TOPIC_PATTERN = /^[a-z0-9_]+(\.[a-z0-9_]+)*$/;
const IDEMPOTENCY_KEY_PATTERN = /^[A-Za-z0-9._:-]+$/;
const MAX_TOPIC_LENGTH = 128;

export interface PublishNotificationInput {
  topic: string;
  payload: unknown;
}

export interface MockProviderWebhookInput {
  type: string;
  intentId: string;
  tenantId: string;
}

export function requireTenantId(headers: Record<string, unknown>): string {
  const raw = headers["x-tenant-id"];
  if (typeof raw !== "string" || raw.trim().length === 0) {
    throw new AppError(400, "missing_tenant", "X-Tenant-Id header is required.");
  }
  const tenantId = raw.trim();
  if (!TENANT_ID_PATTERN.test(tenantId)) {
    throw new AppError(422, "invalid_tenant", "X-Tenant-Id contains invalid characters or is too long.");
  }
  return tenantId;
}

export function normalizeIdempotencyKey(headers: Record<string, unknown>, maxLength: number): string | undefined {
  const raw = headers["idempotency-key"];
  if (raw === undefined) {
    return undefined;
  }
  if (typeof raw !== "string" || raw.trim().length === 0) {
    throw new AppError(422, "invalid_idempotency_key", "Idempotency-Key must not be empty.");
  }
  const key = raw.trim();
  if (key.length > maxLength) {
    throw new AppError(422, "invalid_idempotency_key", `Idempotency-Key length must be <= ${maxLength}.`);
  }
  if (!IDEMPOTENCY_KEY_PATTERN.test(key)) {
    throw new AppError(422, "invalid_idempotency_key", "Idempotency-Key contains invalid characters.");
  }
  return key;
}

export function assertPublishNotificationInput(payload: unknown): asserts payload is PublishNotificationInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  const { topic } = payload;
  if (!isString(topic) || topic.length > MAX_TOPIC_LENGTH || !TOPIC_PATTERN.test(topic)) {
    throw new AppError(422, "invalid_topic", "topic must be a dotted lowercase event name.");
  }
  if (!("payload" in payload) || payload.payload === undefined) {
    throw new AppError(422, "invalid_payload", "payload is required.");
  }
}

export function parseMockProviderWebhookInput(rawBody: string): MockProviderWebhookInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    throw new AppError(400, "invalid_request_body", "Request body must be valid JSON.");
  }
  if (!isObject(parsed)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  const { type, intentId, tenantId } = parsed;
  if (!isString(type)) {
    throw new AppError(422, "invalid_event_type", "type is required.");
  }
  if (!isString(intentId)) {
    throw new AppError(422, "invalid_intent_id", "intentId is required.");
  }
  const tenant = tenantId === undefined ? "default" : tenantId;
  if (!isString(tenant) || !TENANT_ID_PATTERN.test(tenant)) {
    throw new AppError(422, "invalid_tenant", "tenantId contains invalid characters or is too long.");
  }
  return { type, intentId, tenantId: tenant };
}

export function normalizeLimit(raw: string | undefined, defaultValue: number, maxValue: number): number {
  if (raw === undefined) {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > maxValue) {
    throw new AppError(422, "invalid_limit", `limit must be an integer between 1 and ${maxValue}.`);
  }
  return value;
}
