export interface BackoffOptions {
  initialBackoffMs: number;
  maxBackoffMs: number;
}

export const MIN_DELIVERY_TIMEOUT_SECONDS = 2;
export const MAX_DELIVERY_TIMEOUT_SECONDS = 30;

export function isSuccessfulDelivery(statusCode: number | undefined): boolean {
  return statusCode !== undefined && statusCode >= 200 && statusCode < 300;
}

export function computeBackoffMs(attempt: number, options: BackoffOptions): number {
  const exponent = Math.max(0, attempt);
  const raw = options.initialBackoffMs * 2 ** exponent;
  return Math.min(options.maxBackoffMs, raw);
}

export function hasAttemptsRemaining(attempt: number, maxAttempts: number): boolean {
  return attempt + 1 < maxAttempts;
}

export function clampDeliveryTimeoutMs(timeoutSeconds: number): number {
  const clamped = Math.min(
    MAX_DELIVERY_TIMEOUT_SECONDS,
    Math.max(MIN_DELIVERY_TIMEOUT_SECONDS, timeoutSeconds),
  );
  return clamped * 1000;
}
