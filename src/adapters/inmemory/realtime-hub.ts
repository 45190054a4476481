import { componentLogger, silentLogger, type AppLogger } from "../../infra/logger.js";
import type {
  RealtimeMessage,
  RealtimeNotifierPort,
  RealtimeSubscriber,
} from "../../ports/realtime-notifier.js";

export function tenantGroup(tenantId: string): string {
  return `tenant::${tenantId}`;
}

export class InMemoryRealtimeHub implements RealtimeNotifierPort {
  private readonly groups = new Map<string, Set<RealtimeSubscriber>>();
  private readonly logger: AppLogger;

  constructor(logger: AppLogger = silentLogger) {
    this.logger = componentLogger(logger, "realtime-hub");
  }

  subscribe(tenantId: string, subscriber: RealtimeSubscriber): () => void {
    const group = tenantGroup(tenantId);
    const members = this.groups.get(group) ?? new Set<RealtimeSubscriber>();
    members.add(subscriber);
    this.groups.set(group, members);
    return () => {
      members.delete(subscriber);
      if (members.size === 0) {
        this.groups.delete(group);
      }
    };
  }

  subscriberCount(tenantId: string): number {
    return this.groups.get(tenantGroup(tenantId))?.size ?? 0;
  }

  async publish(message: RealtimeMessage): Promise<void> {
    const members = this.groups.get(tenantGroup(message.tenantId));
    if (!members) {
      return;
    }
    for (const subscriber of [...members]) {
      try {
        await subscriber(message);
      } catch (error) {
        this.logger.warn(
          { err: error, tenantId: message.tenantId, topic: message.topic },
          "Realtime subscriber failed",
        );
      }
    }
  }
}
