import type { WebhookEnvelope } from "../../domain/types.js";
import type { OutboxQueuePort } from "../../ports/outbox-queue.js";

const COMPACT_THRESHOLD = 1024;

export class InMemoryOutboxQueue implements OutboxQueuePort {
  private items: Array<WebhookEnvelope | undefined> = [];
  private head = 0;

  async enqueue(envelope: WebhookEnvelope): Promise<void> {
    this.items.push(envelope);
  }

  async dequeue(): Promise<WebhookEnvelope | null> {
    if (this.head >= this.items.length) {
      return null;
    }
    const envelope = this.items[this.head];
    this.items[this.head] = undefined;
    this.head += 1;
    this.compact();
    return envelope ?? null;
  }

  async size(): Promise<number> {
    return this.items.length - this.head;
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
      return;
    }
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
