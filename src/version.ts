export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Candle Replay';
