export interface IdempotencyStorePort {
  tryAdd(tenantId: string, key: string, ttlSeconds: number): Promise<boolean>;
  purgeExpired(): Promise<number>;
}
