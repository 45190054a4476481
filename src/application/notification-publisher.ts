import { randomUUID } from "node:crypto";
import type { WebhookEnvelope } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { componentLogger, silentLogger, type AppLogger } from "../infra/logger.js";
import type { OutboxQueuePort } from "../ports/outbox-queue.js";
import type { RealtimeNotifierPort } from "../ports/realtime-notifier.js";

interface NotificationPublisherOptions {
  realtimeEnabled: boolean;
  webhooksEnabled: boolean;
}

interface NotificationPublisherDependencies {
  realtime: RealtimeNotifierPort;
  outbox: OutboxQueuePort;
  clock: ClockPort;
  logger?: AppLogger;
  onPublished?: (topic: string) => void;
}

function serializePayload(payload: unknown): string {
  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(payload);
  } catch {
    throw new AppError(422, "invalid_payload", "Notification payload must be JSON-serializable.");
  }
  if (serialized === undefined) {
    throw new AppError(422, "invalid_payload", "Notification payload must be JSON-serializable.");
  }
  return serialized;
}

export class NotificationPublisher {
  private readonly realtime: RealtimeNotifierPort;
  private readonly outbox: OutboxQueuePort;
  private readonly clock: ClockPort;
  private readonly logger: AppLogger;
  private readonly onPublished: ((topic: string) => void) | undefined;

  constructor(
    dependencies: NotificationPublisherDependencies,
    private readonly options: NotificationPublisherOptions,
  ) {
    this.realtime = dependencies.realtime;
    this.outbox = dependencies.outbox;
    this.clock = dependencies.clock;
    this.logger = componentLogger(dependencies.logger ?? silentLogger, "notification-publisher");
    this.onPublished = dependencies.onPublished;
  }

  // Outbox failures are logged, never thrown: realtime subscribers were already notified.
  async publish(tenantId: string, topic: string, payload: unknown): Promise<WebhookEnvelope | null> {
    const body = serializePayload(payload);

    if (this.options.realtimeEnabled) {
      await this.realtime.publish({ tenantId, topic, payload });
    }
    this.onPublished?.(topic);

    if (!this.options.webhooksEnabled) {
      return null;
    }

    const envelope: WebhookEnvelope = {
      id: `whe_${randomUUID()}`,
      tenantId,
      topic,
      payload: body,
      attempt: 0,
      createdAt: this.clock.nowIso(),
    };
    try {
      await this.outbox.enqueue(envelope);
    } catch (error) {
      this.logger.error({ err: error, envelopeId: envelope.id, tenantId, topic }, "Failed to enqueue webhook envelope");
      return null;
    }
    return envelope;
  }
}
