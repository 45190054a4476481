import { randomUUID } from "node:crypto";
import type {
  WebhookDeadLetter,
  WebhookDeliveryOutcome,
  WebhookEndpoint,
  WebhookEnvelope,
} from "../domain/types.js";
import { unixSeconds, type ClockPort } from "../infra/clock.js";
import { abortableDelay, type DelayFn } from "../infra/delay.js";
import { componentLogger, silentLogger, type AppLogger } from "../infra/logger.js";
import type { DeadLetterSinkPort } from "../ports/dead-letter-sink.js";
import type { EndpointRegistryPort } from "../ports/endpoint-registry.js";
import type { OutboxQueuePort } from "../ports/outbox-queue.js";
import type { WebhookSendResult, WebhookSenderPort } from "../ports/webhook-sender.js";
import {
  clampDeliveryTimeoutMs,
  computeBackoffMs,
  hasAttemptsRemaining,
  isSuccessfulDelivery,
} from "./webhook-delivery-policy.js";
import { WEBHOOK_SIGNATURE_HEADER, signWebhookPayload } from "./webhook-signing.js";

export const WEBHOOK_HEADERS = {
  signature: WEBHOOK_SIGNATURE_HEADER,
  topic: "X-SmartPay-Topic",
  tenant: "X-SmartPay-Tenant",
  eventId: "X-SmartPay-Event-Id",
  attempt: "X-SmartPay-Delivery-Attempt",
} as const;

const LOOP_ERROR_BACKOFF_MS = 1000;

export interface WebhookDeliveryWorkerOptions {
  maxAttempts: number;
  timeoutSeconds: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  pollIntervalMs: number;
}

export interface DeliveryObserver {
  recordWebhookAttempt(outcome: WebhookDeliveryOutcome, durationSeconds: number): void;
}

export interface WebhookDeliveryWorkerDependencies {
  queue: OutboxQueuePort;
  registry: EndpointRegistryPort;
  sender: WebhookSenderPort;
  clock: ClockPort;
  deadLetters?: DeadLetterSinkPort;
  logger?: AppLogger;
  observer?: DeliveryObserver;
  delay?: DelayFn;
}

/**
 * Drains the outbox and pushes each envelope to every active endpoint of its
 * tenant.
 *
 * A failed (envelope, endpoint) pair goes back onto the queue as its own work
 * item once its backoff elapses, bound to that endpoint and carrying
 * `attempt + 1`. The loop never waits on a backoff, so one failing receiver
 * does not hold up other envelopes or tenants.
 */
export class WebhookDeliveryWorker {
  private readonly queue: OutboxQueuePort;
  private readonly registry: EndpointRegistryPort;
  private readonly sender: WebhookSenderPort;
  private readonly clock: ClockPort;
  private readonly deadLetters: DeadLetterSinkPort | undefined;
  private readonly logger: AppLogger;
  private readonly observer: DeliveryObserver | undefined;
  private readonly delay: DelayFn;
  private readonly timeoutMs: number;
  private readonly pendingRetries = new Set<Promise<void>>();
  private readonly detachedSignal = new AbortController().signal;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    dependencies: WebhookDeliveryWorkerDependencies,
    private readonly options: WebhookDeliveryWorkerOptions,
  ) {
    this.queue = dependencies.queue;
    this.registry = dependencies.registry;
    this.sender = dependencies.sender;
    this.clock = dependencies.clock;
    this.deadLetters = dependencies.deadLetters;
    this.logger = componentLogger(dependencies.logger ?? silentLogger, "webhook-delivery-worker");
    this.observer = dependencies.observer;
    this.delay = dependencies.delay ?? abortableDelay;
    this.timeoutMs = clampDeliveryTimeoutMs(options.timeoutSeconds);
  }

  get running(): boolean {
    return this.loop !== null;
  }

  get pendingRetryCount(): number {
    return this.pendingRetries.size;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.logger.info(
      {
        tenants: this.registry.listTenants().length,
        maxAttempts: this.options.maxAttempts,
        timeoutMs: this.timeoutMs,
      },
      "Webhook delivery worker started",
    );
    this.loop = this.run(controller.signal);
  }

  /**
   * Waits for the attempt in flight. Retries still waiting on a backoff are
   * abandoned; envelopes still queued stay queued for the next `start()`.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller || !loop) {
      return;
    }
    controller.abort();
    await loop;
    await this.settleRetries();
    const remaining = await this.queue.size();
    this.controller = null;
    this.loop = null;
    this.logger.info({ queuedEnvelopes: remaining }, "Webhook delivery worker stopped");
  }

  async processNext(): Promise<boolean> {
    return this.processNextWith(this.controller?.signal ?? this.detachedSignal);
  }

  async drain(): Promise<void> {
    for (;;) {
      const processed = await this.processNext();
      if (processed) {
        continue;
      }
      if (this.pendingRetries.size === 0) {
        return;
      }
      await this.settleRetries();
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const processed = await this.processNextWith(signal);
        if (!processed) {
          await this.delay(this.options.pollIntervalMs, signal);
        }
      } catch (error) {
        this.logger.error({ err: error }, "Webhook delivery loop error");
        await this.delay(LOOP_ERROR_BACKOFF_MS, signal);
      }
    }
  }

  private async processNextWith(signal: AbortSignal): Promise<boolean> {
    const envelope = await this.queue.dequeue();
    if (!envelope) {
      return false;
    }
    const targets = this.resolveTargets(envelope);
    await Promise.all(targets.map((endpoint) => this.attemptDelivery(envelope, endpoint, signal)));
    return true;
  }

  private resolveTargets(envelope: WebhookEnvelope): WebhookEndpoint[] {
    if (!envelope.destination) {
      const endpoints = this.registry.listActiveEndpoints(envelope.tenantId);
      if (endpoints.length === 0) {
        this.logger.debug(
          { envelopeId: envelope.id, tenantId: envelope.tenantId, topic: envelope.topic },
          "No active webhook endpoints for tenant",
        );
      }
      return endpoints;
    }

    const endpoint = this.registry.findEndpoint(envelope.tenantId, envelope.destination.endpointName);
    if (!endpoint || !endpoint.active) {
      this.logger.warn(
        {
          envelopeId: envelope.id,
          tenantId: envelope.tenantId,
          endpoint: envelope.destination.endpointName,
          attempt: envelope.attempt,
        },
        "Dropping webhook retry for unknown or inactive endpoint",
      );
      return [];
    }
    return [endpoint];
  }

  private async attemptDelivery(
    envelope: WebhookEnvelope,
    endpoint: WebhookEndpoint,
    signal: AbortSignal,
  ): Promise<WebhookDeliveryOutcome> {
    const startedAtMs = this.clock.nowMs();
    const result = await this.send(envelope, endpoint);
    const durationSeconds = Math.max(0, this.clock.nowMs() - startedAtMs) / 1000;
    const context = {
      envelopeId: envelope.id,
      tenantId: envelope.tenantId,
      topic: envelope.topic,
      endpoint: endpoint.name,
      attempt: envelope.attempt,
      ...(result.statusCode !== undefined ? { statusCode: result.statusCode } : {}),
      ...(result.errorCode ? { errorCode: result.errorCode } : {}),
    };

    let outcome: WebhookDeliveryOutcome;
    if (result.ok && (result.statusCode === undefined || isSuccessfulDelivery(result.statusCode))) {
      outcome = "delivered";
      this.logger.info({ ...context, url: endpoint.url }, "Webhook delivered");
    } else if (hasAttemptsRemaining(envelope.attempt, this.options.maxAttempts)) {
      outcome = "retry_scheduled";
      const backoffMs = computeBackoffMs(envelope.attempt, this.options);
      this.logger.warn({ ...context, backoffMs }, "Webhook attempt failed; retry scheduled");
      this.scheduleRetry(
        {
          ...envelope,
          attempt: envelope.attempt + 1,
          destination: { endpointName: endpoint.name, url: endpoint.url },
        },
        backoffMs,
        signal,
      );
    } else {
      outcome = "dead_lettered";
      this.logger.error(
        { ...context, attempts: envelope.attempt + 1 },
        "Webhook delivery failed permanently",
      );
      await this.recordDeadLetter(envelope, endpoint, result);
    }

    this.observer?.recordWebhookAttempt(outcome, durationSeconds);
    return outcome;
  }

  private async send(envelope: WebhookEnvelope, endpoint: WebhookEndpoint): Promise<WebhookSendResult> {
    try {
      const signature = signWebhookPayload(endpoint.secret, unixSeconds(this.clock), envelope.payload);
      return await this.sender.send({
        url: endpoint.url,
        headers: {
          "Content-Type": "application/json",
          [WEBHOOK_HEADERS.signature]: signature,
          [WEBHOOK_HEADERS.topic]: envelope.topic,
          [WEBHOOK_HEADERS.tenant]: envelope.tenantId,
          [WEBHOOK_HEADERS.eventId]: envelope.id,
          [WEBHOOK_HEADERS.attempt]: String(envelope.attempt),
        },
        body: envelope.payload,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      this.logger.warn(
        { err: error, envelopeId: envelope.id, endpoint: endpoint.name, attempt: envelope.attempt },
        "Webhook attempt threw",
      );
      return { ok: false, errorCode: "webhook_attempt_error" };
    }
  }

  private scheduleRetry(next: WebhookEnvelope, backoffMs: number, signal: AbortSignal): void {
    const retry: Promise<void> = this.delay(backoffMs, signal)
      .then(async () => {
        if (signal.aborted) {
          this.logger.warn(
            { envelopeId: next.id, endpoint: next.destination?.endpointName, attempt: next.attempt },
            "Webhook retry abandoned on shutdown",
          );
          return;
        }
        await this.queue.enqueue(next);
      })
      .catch((error: unknown) => {
        this.logger.error(
          { err: error, envelopeId: next.id, endpoint: next.destination?.endpointName },
          "Failed to re-enqueue webhook retry",
        );
      })
      .finally(() => {
        this.pendingRetries.delete(retry);
      });
    this.pendingRetries.add(retry);
  }

  private async settleRetries(): Promise<void> {
    while (this.pendingRetries.size > 0) {
      await Promise.all([...this.pendingRetries]);
    }
  }

  private async recordDeadLetter(
    envelope: WebhookEnvelope,
    endpoint: WebhookEndpoint,
    result: WebhookSendResult,
  ): Promise<void> {
    if (!this.deadLetters) {
      return;
    }
    const deadLetter: WebhookDeadLetter = {
      id: `wdl_${randomUUID()}`,
      envelopeId: envelope.id,
      tenantId: envelope.tenantId,
      topic: envelope.topic,
      endpointName: endpoint.name,
      endpointUrl: endpoint.url,
      attempts: envelope.attempt + 1,
      failedAt: this.clock.nowIso(),
      ...(result.statusCode !== undefined ? { lastStatusCode: result.statusCode } : {}),
      ...(result.errorCode ? { lastErrorCode: result.errorCode } : {}),
    };
    try {
      await this.deadLetters.record(deadLetter);
    } catch (error) {
      this.logger.error(
        { err: error, envelopeId: envelope.id, endpoint: endpoint.name },
        "Failed to record webhook dead letter",
      );
    }
  }
}
