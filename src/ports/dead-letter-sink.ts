import type { WebhookDeadLetter } from "../domain/types.js";

export interface DeadLetterSinkPort {
  record(deadLetter: WebhookDeadLetter): Promise<void>;
  listByTenant(tenantId: string, limit: number): Promise<WebhookDeadLetter[]>;
}
