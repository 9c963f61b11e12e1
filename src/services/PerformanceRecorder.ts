/**
 * Performance recording for backtests
 */

import { Candle } from '../models/Candle';
import { ReadonlyLedger } from '../models/Ledger';

export interface PerformanceRow {
  time: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  totalValueInQuote: number;
  returnSinceStart: number;
  /** Buy-and-hold benchmark from the start candle's open */
  marketReturnSinceStart: number;
  totalBase: number;
  totalQuote: number;
  numberOfTransactions: number;
  openOrders: number;
}

export class PerformanceRecorder {
  /**
   * Pure snapshot of the ledger valued at the candle's open
   */
  static snapshot(candle: Candle, startCandle: Candle, ledger: ReadonlyLedger, startValueInQuote: number): PerformanceRow {
    const totalValueInQuote = ledger.totalValueInQuote(candle.open);

    return {
      time: candle.time,
      open: candle.open,
      high: candle.high,
      low: candle.low,
      close: candle.close,
      volume: candle.volume,
      totalValueInQuote,
      returnSinceStart: startValueInQuote > 0 ? totalValueInQuote / startValueInQuote - 1 : 0,
      marketReturnSinceStart: startCandle.open > 0 ? candle.open / startCandle.open - 1 : 0,
      totalBase: ledger.totalBase,
      totalQuote: ledger.totalQuote,
      numberOfTransactions: ledger.numberOfTransactions,
      openOrders: ledger.openOrders.length
    };
  }

  private readonly rows: PerformanceRow[] = [];

  record(row: PerformanceRow): void {
    this.rows.push(row);
  }

  getRows(): PerformanceRow[] {
    return [...this.rows];
  }
}
