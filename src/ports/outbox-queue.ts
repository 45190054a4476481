import type { WebhookEnvelope } from "../domain/types.js";

export interface OutboxQueuePort {
  enqueue(envelope: WebhookEnvelope): Promise<void>;
  dequeue(): Promise<WebhookEnvelope | null>;
  size(): Promise<number>;
}
