import type { WebhookDeadLetter } from "../../domain/types.js";
import type { DeadLetterSinkPort } from "../../ports/dead-letter-sink.js";

interface InMemoryDeadLetterSinkOptions {
  maxEntries?: number;
}

export class InMemoryDeadLetterSink implements DeadLetterSinkPort {
  private readonly entries: WebhookDeadLetter[] = [];
  private readonly maxEntries: number;

  constructor(options: InMemoryDeadLetterSinkOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  async record(deadLetter: WebhookDeadLetter): Promise<void> {
    this.entries.unshift(deadLetter);
    if (this.entries.length > this.maxEntries) {
      this.entries.length = this.maxEntries;
    }
  }

  async listByTenant(tenantId: string, limit: number): Promise<WebhookDeadLetter[]> {
    return this.entries
      .filter((entry) => entry.tenantId === tenantId)
      .slice(0, Math.max(1, limit));
  }
}
