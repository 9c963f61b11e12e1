/**
 * Candle series validation
 * Turns raw pipeline records into typed candles, rejecting malformed or unsorted series
 */

import { Candle, CandleRecord, OHLCV_FIELDS, TIME_FIELDS } from '../models/Candle';
import { InvalidColumnTypeError, MissingColumnError, UnsortedSeriesError } from './TradingErrors';

const COMPONENT = 'SeriesValidator';

export class SeriesValidator {
  /**
   * Normalizes every record, then checks the timestamps never go backwards.
   * Equal consecutive timestamps are allowed.
   */
  static validate(records: readonly CandleRecord[]): Candle[] {
    const candles = records.map((record, index) => SeriesValidator.normalize(record, index));
    SeriesValidator.assertSorted(candles);
    return candles;
  }

  static normalize(record: CandleRecord, index: number = 0): Candle {
    const timeField = TIME_FIELDS.find(field => record[field] !== undefined && record[field] !== null);
    if (timeField === undefined) {
      throw new MissingColumnError('time', { operation: 'normalize', component: COMPONENT, metadata: { index } });
    }

    const time = SeriesValidator.parseTime(record[timeField], timeField, index);
    const [open, high, low, close, volume] = OHLCV_FIELDS.map(field => SeriesValidator.parseNumber(record, field, index));

    return { time, open, high, low, close, volume };
  }

  static assertSorted(candles: readonly Candle[]): void {
    for (let i = 1; i < candles.length; i++) {
      if (candles[i].time.getTime() < candles[i - 1].time.getTime()) {
        throw new UnsortedSeriesError(
          `Candle ${i} at ${candles[i].time.toISOString()} precedes candle ${i - 1} at ${candles[i - 1].time.toISOString()}`,
          { operation: 'assertSorted', component: COMPONENT, metadata: { index: i } }
        );
      }
    }
  }

  private static parseTime(value: unknown, field: string, index: number): Date {
    let time: Date | undefined;
    if (value instanceof Date) {
      time = new Date(value.getTime());
    } else if (typeof value === 'number' || typeof value === 'string') {
      time = new Date(value);
    }

    if (time === undefined || Number.isNaN(time.getTime())) {
      throw new InvalidColumnTypeError(field, `Field "${field}" of candle ${index} is not a valid timestamp: ${String(value)}`, {
        operation: 'normalize',
        component: COMPONENT,
        metadata: { index }
      });
    }
    return time;
  }

  private static parseNumber(record: CandleRecord, field: string, index: number): number {
    const value = record[field];
    if (value === undefined || value === null) {
      throw new MissingColumnError(field, { operation: 'normalize', component: COMPONENT, metadata: { index } });
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidColumnTypeError(field, `Field "${field}" of candle ${index} must be a finite number, got: ${String(value)}`, {
        operation: 'normalize',
        component: COMPONENT,
        metadata: { index }
      });
    }
    return value;
  }
}
