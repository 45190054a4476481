export interface WebhookDestination {
  endpointName: string;
  url: string;
}

export interface WebhookEnvelope {
  id: string;
  tenantId: string;
  topic: string;
  payload: string;
  attempt: number;
  createdAt: string;
  destination?: WebhookDestination;
}

export interface WebhookEndpoint {
  name: string;
  url: string;
  secret: string;
  active: boolean;
}

export interface IdempotencyRecord {
  tenantId: string;
  key: string;
  expiresAtMs: number;
}

export interface WebhookDeadLetter {
  id: string;
  envelopeId: string;
  tenantId: string;
  topic: string;
  endpointName: string;
  endpointUrl: string;
  attempts: number;
  lastStatusCode?: number;
  lastErrorCode?: string;
  failedAt: string;
}

export type WebhookDeliveryOutcome = "delivered" | "retry_scheduled" | "dead_lettered";
