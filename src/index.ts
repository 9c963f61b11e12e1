/**
 * Candle Replay - Main Entry Point
 * Deterministic execution engine, portfolio ledger and backtest driver for trading strategies
 */

export * from './models';
export * from './services';
export * from './connectors';
export * from './config';
export * from './utils';
export * from './strategies';

export { APP_VERSION, APP_NAME } from './version';
