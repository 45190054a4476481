import type { Pool } from "pg";
import type { IdempotencyStorePort } from "../../ports/idempotency-store.js";

/**
 * Durable variant of the idempotency store. The upsert only overwrites a row
 * whose `expires_at` has passed, so `RETURNING` yields a row exactly when the
 * key is accepted.
 */
export class PostgresIdempotencyStore implements IdempotencyStorePort {
  constructor(private readonly pool: Pool) {}

  async tryAdd(tenantId: string, key: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.pool.query<{ key: string }>(
      `
        INSERT INTO smartpay_idempotency_keys (tenant_id, key, expires_at)
        VALUES ($1, $2, now() + make_interval(secs => $3))
        ON CONFLICT (tenant_id, key) DO UPDATE
          SET expires_at = EXCLUDED.expires_at
          WHERE smartpay_idempotency_keys.expires_at <= now()
        RETURNING key
      `,
      [tenantId, key, ttlSeconds],
    );
    return result.rows.length > 0;
  }

  async purgeExpired(): Promise<number> {
    const result = await this.pool.query(
      `
        DELETE FROM smartpay_idempotency_keys
        WHERE expires_at <= now()
      `,
    );
    return result.rowCount ?? 0;
  }
}
