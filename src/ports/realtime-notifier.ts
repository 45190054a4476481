export interface RealtimeMessage {
  tenantId: string;
  topic: string;
  payload: unknown;
}

export type RealtimeSubscriber = (message: RealtimeMessage) => Promise<void>;

export interface RealtimeNotifierPort {
  publish(message: RealtimeMessage): Promise<void>;
}
