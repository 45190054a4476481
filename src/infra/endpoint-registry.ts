import { readFileSync } from "node:fs";
import type { WebhookEndpoint } from "../domain/types.js";
import type { EndpointRegistryPort } from "../ports/endpoint-registry.js";
import { AppError } from "./app-error.js";

interface EndpointRegistrySource {
  webhookEndpointsFile?: string;
  webhookEndpointsJson?: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function invalidEndpoint(location: string, expectation: string): AppError {
  return new AppError(500, "invalid_webhook_endpoint", `Webhook endpoint ${location} ${expectation}.`);
}

function parseEndpoint(tenantId: string, index: number, raw: unknown): WebhookEndpoint {
  const location = `tenants.${tenantId}[${index}]`;
  if (!isObject(raw)) {
    throw invalidEndpoint(location, "must be an object");
  }
  const { name, url, secret, active } = raw;
  if (typeof name !== "string" || name.trim().length === 0) {
    throw invalidEndpoint(location, "must have a non-empty name");
  }
  if (typeof secret !== "string" || secret.length === 0) {
    throw invalidEndpoint(`'${name}' (${location})`, "must have a non-empty secret");
  }
  if (typeof url !== "string" || !URL.canParse(url)) {
    throw invalidEndpoint(`'${name}' (${location})`, "must have an absolute url");
  }
  const protocol = new URL(url).protocol;
  if (protocol !== "http:" && protocol !== "https:") {
    throw invalidEndpoint(`'${name}' (${location})`, "url must use http or https");
  }
  if (active !== undefined && typeof active !== "boolean") {
    throw invalidEndpoint(`'${name}' (${location})`, "active must be a boolean");
  }
  return {
    name: name.trim(),
    url,
    secret,
    active: active ?? true,
  };
}

export class StaticEndpointRegistry implements EndpointRegistryPort {
  private readonly byTenant: ReadonlyMap<string, readonly WebhookEndpoint[]>;

  private constructor(byTenant: Map<string, WebhookEndpoint[]>) {
    this.byTenant = byTenant;
  }

  static empty(): StaticEndpointRegistry {
    return new StaticEndpointRegistry(new Map());
  }

  static fromDocument(document: unknown): StaticEndpointRegistry {
    if (!isObject(document) || !isObject(document.tenants)) {
      throw new AppError(500, "invalid_webhook_endpoint", "Webhook endpoint document must contain a 'tenants' object.");
    }
    const byTenant = new Map<string, WebhookEndpoint[]>();
    for (const [tenantId, list] of Object.entries(document.tenants)) {
      if (tenantId.trim().length === 0) {
        throw new AppError(500, "invalid_webhook_endpoint", "Webhook endpoint tenant ids must be non-empty.");
      }
      if (!Array.isArray(list)) {
        throw invalidEndpoint(`list for tenant '${tenantId}'`, "must be an array");
      }
      const endpoints = list.map((raw: unknown, index) => parseEndpoint(tenantId, index, raw));
      const names = new Set<string>();
      for (const endpoint of endpoints) {
        if (names.has(endpoint.name)) {
          throw invalidEndpoint(`'${endpoint.name}' (tenant '${tenantId}')`, "is declared more than once");
        }
        names.add(endpoint.name);
      }
      byTenant.set(tenantId, endpoints.map((endpoint) => Object.freeze(endpoint)));
    }
    return new StaticEndpointRegistry(byTenant);
  }

  static load(source: EndpointRegistrySource): StaticEndpointRegistry {
    if (source.webhookEndpointsJson) {
      return StaticEndpointRegistry.fromDocument(parseJson(source.webhookEndpointsJson, "SMARTPAY_WEBHOOK_ENDPOINTS"));
    }
    if (source.webhookEndpointsFile) {
      let contents: string;
      try {
        contents = readFileSync(source.webhookEndpointsFile, "utf8");
      } catch (error) {
        throw new AppError(
          500,
          "invalid_webhook_endpoint",
          `Webhook endpoint file '${source.webhookEndpointsFile}' could not be read: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      return StaticEndpointRegistry.fromDocument(parseJson(contents, source.webhookEndpointsFile));
    }
    return StaticEndpointRegistry.empty();
  }

  listTenants(): string[] {
    return [...this.byTenant.keys()];
  }

  listActiveEndpoints(tenantId: string): WebhookEndpoint[] {
    return (this.byTenant.get(tenantId) ?? []).filter((endpoint) => endpoint.active);
  }

  findEndpoint(tenantId: string, name: string): WebhookEndpoint | undefined {
    return this.byTenant.get(tenantId)?.find((endpoint) => endpoint.name === name);
  }
}

function parseJson(raw: string, origin: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new AppError(500, "invalid_webhook_endpoint", `Webhook endpoint document in ${origin} is not valid JSON.`);
  }
}
