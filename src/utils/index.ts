export * from './TradingErrors';
export * from './SeriesValidator';
