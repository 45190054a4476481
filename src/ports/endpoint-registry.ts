import type { WebhookEndpoint } from "../domain/types.js";

export interface EndpointRegistryPort {
  listTenants(): string[];
  listActiveEndpoints(tenantId: string): WebhookEndpoint[];
  findEndpoint(tenantId: string, name: string): WebhookEndpoint | undefined;
}
