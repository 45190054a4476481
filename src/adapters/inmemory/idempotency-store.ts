import type { IdempotencyRecord } from "../../domain/types.js";
import type { ClockPort } from "../../infra/clock.js";
import { SystemClock } from "../../infra/clock.js";
import type { IdempotencyStorePort } from "../../ports/idempotency-store.js";

interface InMemoryIdempotencyStoreOptions {
  clock?: ClockPort;
}

export class InMemoryIdempotencyStore implements IdempotencyStorePort {
  private readonly recordsByTenant = new Map<string, Map<string, IdempotencyRecord>>();
  private readonly clock: ClockPort;

  constructor(options: InMemoryIdempotencyStoreOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
  }

  // No await between the lookup and the write: concurrent callers cannot both see the key as absent.
  async tryAdd(tenantId: string, key: string, ttlSeconds: number): Promise<boolean> {
    const nowMs = this.clock.nowMs();
    let records = this.recordsByTenant.get(tenantId);
    if (!records) {
      records = new Map<string, IdempotencyRecord>();
      this.recordsByTenant.set(tenantId, records);
    }
    const existing = records.get(key);
    if (existing && existing.expiresAtMs > nowMs) {
      return false;
    }
    records.set(key, {
      tenantId,
      key,
      expiresAtMs: nowMs + ttlSeconds * 1000,
    });
    return true;
  }

  async purgeExpired(): Promise<number> {
    const nowMs = this.clock.nowMs();
    let purged = 0;
    for (const [tenantId, records] of this.recordsByTenant) {
      for (const [key, record] of records) {
        if (record.expiresAtMs <= nowMs) {
          records.delete(key);
          purged += 1;
        }
      }
      if (records.size === 0) {
        this.recordsByTenant.delete(tenantId);
      }
    }
    return purged;
  }

  size(): number {
    let total = 0;
    for (const records of this.recordsByTenant.values()) {
      total += records.size;
    }
    return total;
  }
}
