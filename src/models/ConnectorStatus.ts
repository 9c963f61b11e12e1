/**
 * Exchange connector health models
 */

export type ConnectorHealthStatus = 'healthy' | 'degraded' | 'offline';

export interface ConnectorStatus {
  connectorId: string;
  name: string;
  status: ConnectorHealthStatus;
  lastHealthCheck: Date;
  latency: number;
  errorRate: number;
}
