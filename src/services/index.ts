export * from './AuditService';
export * from './Strategy';
export * from './BacktestDriver';
export * from './PerformanceRecorder';
export * from './StrategyRegistry';
export * from './StrategyRepository';
export * from './CredentialsRepository';
export * from './BotCoordinator';
