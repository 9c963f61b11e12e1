// Data models
export * from './Order';
export * from './Candle';
export * from './Ledger';
export * from './AuditEvent';
export * from './ConnectorStatus';
