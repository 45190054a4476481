import Fastify, { type FastifyInstance } from "fastify";
import { Pool } from "pg";
import { NotificationPublisher } from "./application/notification-publisher.js";
import { WebhookDeliveryWorker } from "./application/webhook-delivery-worker.js";
import { verifyWebhookSignature } from "./application/webhook-signing.js";
import { HttpWebhookSender } from "./adapters/http/webhook-sender.js";
import { InMemoryDeadLetterSink } from "./adapters/inmemory/dead-letter-sink.js";
import { InMemoryIdempotencyStore } from "./adapters/inmemory/idempotency-store.js";
import { InMemoryOutboxQueue } from "./adapters/inmemory/outbox-queue.js";
import { InMemoryRealtimeHub } from "./adapters/inmemory/realtime-hub.js";
import { InMemoryWebhookSender } from "./adapters/inmemory/webhook-sender.js";
import { PostgresIdempotencyStore } from "./adapters/postgres/idempotency-store.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, unixSeconds, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { StaticEndpointRegistry } from "./infra/endpoint-registry.js";
import { componentLogger, createLogger, type AppLogger } from "./infra/logger.js";
import { SmartPayMetricsRegistry } from "./infra/metrics.js";
import type { DeadLetterSinkPort } from "./ports/dead-letter-sink.js";
import type { EndpointRegistryPort } from "./ports/endpoint-registry.js";
import type { IdempotencyStorePort } from "./ports/idempotency-store.js";
import type { OutboxQueuePort } from "./ports/outbox-queue.js";
import type { WebhookSenderPort } from "./ports/webhook-sender.js";
import {
  assertPublishNotificationInput,
  normalizeIdempotencyKey,
  normalizeLimit,
  parseMockProviderWebhookInput,
  requireTenantId,
} from "./api/validators.js";

export const MOCK_PROVIDER_SIGNATURE_HEADER = "mockpay-signature";
const DEAD_LETTER_DEFAULT_LIMIT = 50;
const DEAD_LETTER_MAX_LIMIT = 500;

export interface WebhookRuntime {
  worker: WebhookDeliveryWorker;
  outbox: OutboxQueuePort;
  publisher: NotificationPublisher;
  realtime: InMemoryRealtimeHub;
  deadLetters: DeadLetterSinkPort;
  idempotency: IdempotencyStorePort;
}

declare module "fastify" {
  interface FastifyInstance {
    webhooks: WebhookRuntime;
  }
}

export interface AppOverrides {
  logger?: AppLogger;
  clock?: ClockPort;
  sender?: WebhookSenderPort;
  registry?: EndpointRegistryPort;
  startWorker?: boolean;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function isPublicRoute(url: string, metricsEnabled: boolean): boolean {
  if (url.startsWith("/health/") || url.startsWith("/v1/webhooks/mock-provider")) {
    return true;
  }
  return metricsEnabled && url === "/metrics";
}

export function buildApp(config: RuntimeConfig = loadRuntimeConfig(), overrides: AppOverrides = {}): FastifyInstance {
  const app = Fastify({ logger: false });
  const rootLogger = overrides.logger ?? createLogger(config.logLevel);
  const httpLogger = componentLogger(rootLogger, "http");
  const metrics = new SmartPayMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys);
  const closeActions: Array<() => Promise<void>> = [];
  const requestStartNs = new WeakMap<object, bigint>();

  const clock = overrides.clock ?? new SystemClock();
  const registry = overrides.registry ?? StaticEndpointRegistry.load(config);

  let idempotencyStore: IdempotencyStorePort;
  if (config.idempotencyBackend === "postgres") {
    if (!config.postgresUrl) {
      throw new AppError(500, "invalid_runtime_config", "Postgres idempotency requested without PostgreSQL.");
    }
    const postgresPool = new Pool({ connectionString: config.postgresUrl });
    closeActions.push(async () => {
      await postgresPool.end();
    });
    idempotencyStore = new PostgresIdempotencyStore(postgresPool);
  } else {
    idempotencyStore = new InMemoryIdempotencyStore({ clock });
  }

  const sender: WebhookSenderPort =
    overrides.sender ?? (config.webhookSender === "memory" ? new InMemoryWebhookSender() : new HttpWebhookSender());
  const outbox = new InMemoryOutboxQueue();
  const realtime = new InMemoryRealtimeHub(rootLogger);
  const deadLetters = new InMemoryDeadLetterSink();

  const publisher = new NotificationPublisher(
    {
      realtime,
      outbox,
      clock,
      logger: rootLogger,
      onPublished: (topic) => {
        if (config.metricsEnabled) {
          metrics.recordNotificationPublished(topic);
        }
      },
    },
    {
      realtimeEnabled: config.notificationsEnabled,
      webhooksEnabled: config.webhooksEnabled,
    },
  );

  const worker = new WebhookDeliveryWorker(
    {
      queue: outbox,
      registry,
      sender,
      clock,
      deadLetters,
      logger: rootLogger,
      ...(config.metricsEnabled ? { observer: metrics } : {}),
    },
    {
      maxAttempts: config.webhookMaxAttempts,
      timeoutSeconds: config.webhookTimeoutSeconds,
      initialBackoffMs: config.webhookInitialBackoffMs,
      maxBackoffMs: config.webhookMaxBackoffMs,
      pollIntervalMs: config.webhookPollIntervalMs,
    },
  );

  app.decorate("webhooks", {
    worker,
    outbox,
    publisher,
    realtime,
    deadLetters,
    idempotency: idempotencyStore,
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    httpLogger.error({ err: error, requestId: request.id }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  const startWorker = config.webhooksEnabled && overrides.startWorker !== false;
  if (!config.webhooksEnabled) {
    rootLogger.info("Webhook outbox disabled");
  }
  app.addHook("onReady", async () => {
    if (startWorker) {
      worker.start();
    }
    if (config.idempotencySweepSeconds > 0) {
      const sweep = setInterval(() => {
        idempotencyStore
          .purgeExpired()
          .then((purged) => {
            if (purged > 0) {
              rootLogger.debug({ purged }, "Purged expired idempotency keys");
            }
          })
          .catch((error: unknown) => {
            rootLogger.error({ err: error }, "Idempotency sweep failed");
          });
      }, config.idempotencySweepSeconds * 1000);
      sweep.unref();
      closeActions.push(async () => {
        clearInterval(sweep);
      });
    }
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    const webhookWorker = !config.webhooksEnabled ? "disabled" : worker.running ? "running" : "stopped";
    return reply.status(200).send({
      status: "ready",
      webhook_worker: webhookWorker,
      outbox_depth: await outbox.size(),
    });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartNs.set(request, process.hrtime.bigint());
    if (isPublicRoute(request.url, config.metricsEnabled)) {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStartNs.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_, reply) => {
      metrics.setOutboxDepth(await outbox.size());
      return reply
        .status(200)
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .send(metrics.renderPrometheus());
    });
  }

  app.post("/v1/notifications", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const idempotencyKey = normalizeIdempotencyKey(request.headers, config.idempotencyKeyMaxLength);
    assertPublishNotificationInput(request.body);

    if (idempotencyKey) {
      reply.header("Idempotency-Key", idempotencyKey);
      const accepted = await idempotencyStore.tryAdd(tenantId, idempotencyKey, config.idempotencyTtlSeconds);
      if (!accepted) {
        if (config.metricsEnabled) {
          metrics.recordIdempotencyReplay("publish_notification");
        }
        reply.header("Idempotent-Replay", "true");
        return reply.status(200).send({
          tenant_id: tenantId,
          topic: request.body.topic,
          status: "replayed",
        });
      }
    }

    const envelope = await publisher.publish(tenantId, request.body.topic, request.body.payload);
    return reply.status(202).send({
      id: envelope?.id ?? null,
      tenant_id: tenantId,
      topic: request.body.topic,
      status: envelope ? "queued" : "not_queued",
    });
  });

  app.get<{ Querystring: { limit?: string } }>("/v1/webhook-dead-letters", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const limit = normalizeLimit(request.query.limit, DEAD_LETTER_DEFAULT_LIMIT, DEAD_LETTER_MAX_LIMIT);
    const data = await deadLetters.listByTenant(tenantId, limit);
    return reply.status(200).send({ data });
  });

  app.register(async (scope) => {
    scope.addContentTypeParser("application/json", { parseAs: "string" }, async (_request: unknown, body: string) => body);

    scope.post("/v1/webhooks/mock-provider", async (request, reply) => {
      const rawBody = typeof request.body === "string" ? request.body : "";
      const signature = request.headers[MOCK_PROVIDER_SIGNATURE_HEADER];
      const verification =
        typeof signature === "string"
          ? verifyWebhookSignature({
            secret: config.mockProviderSecret,
            header: signature,
            body: rawBody,
            nowUnix: unixSeconds(clock),
          })
          : { valid: false as const, reason: "malformed_signature" as const };
      if (!verification.valid) {
        httpLogger.warn({ reason: verification.reason }, "Rejected mock provider webhook");
        throw new AppError(400, "invalid_signature", "Mock provider signature is invalid.");
      }

      const input = parseMockProviderWebhookInput(rawBody);
      if (input.type === "payment_intent.succeeded") {
        await publisher.publish(input.tenantId, "payment.intent.succeeded", { intentId: input.intentId });
      }
      return reply.status(200).send({ received: true });
    });
  });

  app.addHook("onClose", async () => {
    await worker.stop();
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
