import { describe, expect, it } from "vitest";
import { InMemoryOutboxQueue } from "../src/adapters/inmemory/outbox-queue.js";
import { InMemoryRealtimeHub } from "../src/adapters/inmemory/realtime-hub.js";
import { NotificationPublisher } from "../src/application/notification-publisher.js";
import type { WebhookEnvelope } from "../src/domain/types.js";
import { AppError } from "../src/infra/app-error.js";
import type { OutboxQueuePort } from "../src/ports/outbox-queue.js";
import type { RealtimeMessage } from "../src/ports/realtime-notifier.js";
import { FixedClock, captureLogger } from "./fakes.js";

function buildPublisher(options: { realtimeEnabled?: boolean; webhooksEnabled?: boolean; outbox?: OutboxQueuePort } = {}) {
  const realtime = new InMemoryRealtimeHub();
  const outbox = options.outbox ?? new InMemoryOutboxQueue();
  const published: string[] = [];
  const captured = captureLogger();
  const publisher = new NotificationPublisher(
    {
      realtime,
      outbox,
      clock: new FixedClock(),
      logger: captured.logger,
      onPublished: (topic) => {
        published.push(topic);
      },
    },
    {
      realtimeEnabled: options.realtimeEnabled ?? true,
      webhooksEnabled: options.webhooksEnabled ?? true,
    },
  );
  return { publisher, realtime, outbox, published, captured };
}

describe("NotificationPublisher", () => {
  it("notifies realtime subscribers and queues one envelope", async () => {
    const { publisher, realtime, outbox, published } = buildPublisher();
    const received: RealtimeMessage[] = [];
    realtime.subscribe("blue", async (message) => {
      received.push(message);
    });

    const envelope = await publisher.publish("blue", "payment.intent.succeeded", { id: "pi_1", amount: 1000 });

    expect(received).toEqual([
      { tenantId: "blue", topic: "payment.intent.succeeded", payload: { id: "pi_1", amount: 1000 } },
    ]);
    expect(envelope).toMatchObject({
      tenantId: "blue",
      topic: "payment.intent.succeeded",
      payload: '{"id":"pi_1","amount":1000}',
      attempt: 0,
      createdAt: "2026-02-08T10:00:00.000Z",
    });
    expect(envelope?.id).toMatch(/^whe_/);
    expect(envelope?.destination).toBeUndefined();
    expect(await outbox.size()).toBe(1);
    expect(await outbox.dequeue()).toEqual(envelope);
    expect(published).toEqual(["payment.intent.succeeded"]);
  });

  it("only notifies subscribers of the same tenant", async () => {
    const { publisher, realtime } = buildPublisher();
    const greenMessages: RealtimeMessage[] = [];
    realtime.subscribe("green", async (message) => {
      greenMessages.push(message);
    });

    await publisher.publish("blue", "payment.intent.succeeded", { id: "pi_1" });

    expect(greenMessages).toEqual([]);
  });

  it("keeps publishing when a realtime subscriber fails", async () => {
    const { publisher, realtime, outbox } = buildPublisher();
    const delivered: string[] = [];
    realtime.subscribe("blue", async () => {
      throw new Error("socket closed");
    });
    realtime.subscribe("blue", async (message) => {
      delivered.push(message.topic);
    });

    await publisher.publish("blue", "refund.created", { id: "re_1" });

    expect(delivered).toEqual(["refund.created"]);
    expect(await outbox.size()).toBe(1);
  });

  it("queues nothing when webhooks are disabled", async () => {
    const { publisher, realtime, outbox } = buildPublisher({ webhooksEnabled: false });
    const received: RealtimeMessage[] = [];
    realtime.subscribe("blue", async (message) => {
      received.push(message);
    });

    const envelope = await publisher.publish("blue", "payment.intent.succeeded", { id: "pi_1" });

    expect(envelope).toBeNull();
    expect(received).toHaveLength(1);
    expect(await outbox.size()).toBe(0);
  });

  it("skips realtime fan-out when notifications are disabled", async () => {
    const { publisher, realtime, outbox } = buildPublisher({ realtimeEnabled: false });
    const received: RealtimeMessage[] = [];
    realtime.subscribe("blue", async (message) => {
      received.push(message);
    });

    await publisher.publish("blue", "payment.intent.succeeded", { id: "pi_1" });

    expect(received).toEqual([]);
    expect(await outbox.size()).toBe(1);
  });

  it("rejects payloads that cannot be serialized", async () => {
    const { publisher, outbox } = buildPublisher();
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    await expect(publisher.publish("blue", "payment.intent.succeeded", circular)).rejects.toMatchObject({
      statusCode: 422,
      code: "invalid_payload",
    });
    await expect(publisher.publish("blue", "payment.intent.succeeded", undefined)).rejects.toBeInstanceOf(AppError);
    expect(await outbox.size()).toBe(0);
  });

  it("logs and swallows outbox failures", async () => {
    const failingOutbox: OutboxQueuePort = {
      async enqueue(_envelope: WebhookEnvelope) {
        throw new Error("outbox unavailable");
      },
      async dequeue() {
        return null;
      },
      async size() {
        return 0;
      },
    };
    const { publisher, captured } = buildPublisher({ outbox: failingOutbox });

    const envelope = await publisher.publish("blue", "payment.intent.succeeded", { id: "pi_1" });

    expect(envelope).toBeNull();
    const failure = captured.lines.find((line) => line.msg === "Failed to enqueue webhook envelope");
    expect(failure).toMatchObject({ level: 50, tenantId: "blue", topic: "payment.intent.succeeded" });
  });
});
