import { createHmac, timingSafeEqual } from "node:crypto";

export const WEBHOOK_SIGNATURE_HEADER = "X-SmartPay-Signature";
export const DEFAULT_SIGNATURE_TOLERANCE_SECONDS = 300;

const SIGNATURE_PATTERN = /^t=(\d+),\s*v1=([0-9a-f]+)$/;

export interface ParsedWebhookSignature {
  timestamp: number;
  v1: string;
}

export type WebhookSignatureVerification =
  | { valid: true }
  | { valid: false; reason: "malformed_signature" | "timestamp_out_of_tolerance" | "signature_mismatch" };

export function computeWebhookDigest(secret: string, timestampUnix: number, body: string): string {
  return createHmac("sha256", secret).update(`t=${timestampUnix}.${body}`).digest("hex");
}

export function signWebhookPayload(secret: string, timestampUnix: number, body: string): string {
  return `t=${timestampUnix}, v1=${computeWebhookDigest(secret, timestampUnix, body)}`;
}

export function parseWebhookSignature(header: string): ParsedWebhookSignature | null {
  const match = SIGNATURE_PATTERN.exec(header.trim());
  if (!match) {
    return null;
  }
  const [, timestampRaw, v1] = match;
  const timestamp = Number(timestampRaw);
  if (!Number.isSafeInteger(timestamp) || !v1) {
    return null;
  }
  return { timestamp, v1 };
}

interface VerifyWebhookSignatureInput {
  secret: string;
  header: string;
  body: string;
  nowUnix: number;
  toleranceSeconds?: number;
}

export function verifyWebhookSignature(input: VerifyWebhookSignatureInput): WebhookSignatureVerification {
  const parsed = parseWebhookSignature(input.header);
  if (!parsed) {
    return { valid: false, reason: "malformed_signature" };
  }
  const tolerance = input.toleranceSeconds ?? DEFAULT_SIGNATURE_TOLERANCE_SECONDS;
  if (Math.abs(input.nowUnix - parsed.timestamp) > tolerance) {
    return { valid: false, reason: "timestamp_out_of_tolerance" };
  }
  const expected = Buffer.from(computeWebhookDigest(input.secret, parsed.timestamp, input.body), "utf8");
  const actual = Buffer.from(parsed.v1, "utf8");
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return { valid: false, reason: "signature_mismatch" };
  }
  return { valid: true };
}
