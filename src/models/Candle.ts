/**
 * Candle data models
 */

export interface Candle {
  time: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Reference prices an execution client settles against
 */
export type CandlePrices = Pick<Candle, 'open' | 'high' | 'low' | 'close'> & Partial<Pick<Candle, 'time' | 'volume'>>;

/**
 * Raw record as delivered by a data pipeline, before validation.
 * The timestamp may sit under `time` or `timestamp`, as a Date, epoch ms or ISO-8601 string.
 */
export type CandleRecord = Record<string, unknown>;

export const OHLCV_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;
export const TIME_FIELDS = ['time', 'timestamp'] as const;

export function minutesBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 60000;
}
