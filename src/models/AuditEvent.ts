/**
 * Audit journal models
 */

export type AuditEventType =
  | 'ORDER_PLACED'
  | 'ORDER_FILLED'
  | 'ORDER_CANCELLED'
  | 'ORDER_SEEDED'
  | 'BACKTEST_STARTED'
  | 'BACKTEST_COMPLETED'
  | 'BOT_RUN_SUCCEEDED'
  | 'BOT_RUN_FAILED'
  | 'BOT_STOPPED'
  | 'CONFIG_LOADED';

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  eventType: AuditEventType;
  botId?: string;
  exchange?: string;
  details: Record<string, unknown>;
  signature: string;
}
