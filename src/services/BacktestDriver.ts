/**
 * Backtest driver
 * Replays a candle series through a strategy with a trailing analysis window
 */

import { Strategy } from './Strategy';
import { PerformanceRecorder, PerformanceRow } from './PerformanceRecorder';
import { AuditService } from './AuditService';
import { SimulatedExecutionClient } from '../connectors/SimulatedExecutionClient';
import { Candle, CandleRecord, minutesBetween } from '../models/Candle';
import { SeriesValidator } from '../utils/SeriesValidator';
import { InsufficientHistoryError, InvalidExecutorError } from '../utils/TradingErrors';

const COMPONENT = 'BacktestDriver';
const MINUTE_MS = 60000;

export interface BacktestReport {
  rows: PerformanceRow[];
  startValueInQuote: number;
  endValueInQuote: number;
  totalReturn: number;
  numberOfTransactions: number;
  candlesSimulated: number;
}

export interface BacktestDriverOptions {
  auditService?: AuditService;
  /** Called after each simulated step */
  onStep?: (row: PerformanceRow, index: number) => void;
}

export class BacktestDriver {
  private readonly options: BacktestDriverOptions;

  constructor(options: BacktestDriverOptions = {}) {
    this.options = options;
  }

  async run(strategy: Strategy, records: readonly CandleRecord[]): Promise<BacktestReport> {
    const candles = SeriesValidator.validate(records);

    const executor = strategy.executor;
    if (!(executor instanceof SimulatedExecutionClient)) {
      throw new InvalidExecutorError(`Backtests need a simulated execution client, got: ${executor.kind}`, {
        operation: 'run',
        component: COMPONENT
      });
    }

    const windowMinutes = strategy.analysisWindowMinutes;
    const span = candles.length > 0 ? minutesBetween(candles[0].time, candles[candles.length - 1].time) : 0;
    if (candles.length === 0 || span < windowMinutes) {
      throw new InsufficientHistoryError(
        `Series spans ${span} minutes but the strategy needs ${windowMinutes}`,
        { operation: 'run', component: COMPONENT, metadata: { span, windowMinutes } }
      );
    }

    const windowMs = windowMinutes * MINUTE_MS;
    const startTime = candles[0].time.getTime() + windowMs;
    const firstIndex = candles.findIndex(candle => candle.time.getTime() >= startTime);
    const startCandle = candles[firstIndex];
    const startValueInQuote = strategy.state.totalValueInQuote(startCandle.open);

    this.options.auditService?.logEvent('BACKTEST_STARTED', {
      strategyType: strategy.strategyType,
      candles: candles.length,
      startTime: startCandle.time.toISOString(),
      startValueInQuote
    });

    const recorder = new PerformanceRecorder();
    let left = 0;
    let right = firstIndex;

    for (let i = firstIndex; i < candles.length; i++) {
      const candle = candles[i];
      const now = candle.time.getTime();

      while (candles[left].time.getTime() < now - windowMs) {
        left++;
      }
      while (right + 1 < candles.length && candles[right + 1].time.getTime() <= now) {
        right++;
      }

      const window: Candle[] = candles.slice(left, right + 1).map(c => ({ ...c, time: new Date(c.time.getTime()) }));

      executor.setCurrentCandle(candle);
      await strategy.run(window);

      const row = PerformanceRecorder.snapshot(candle, startCandle, strategy.state, startValueInQuote);
      recorder.record(row);
      this.options.onStep?.(row, i - firstIndex);
    }

    const rows = recorder.getRows();
    const endValueInQuote = rows[rows.length - 1].totalValueInQuote;
    const report: BacktestReport = {
      rows,
      startValueInQuote,
      endValueInQuote,
      totalReturn: startValueInQuote > 0 ? endValueInQuote / startValueInQuote - 1 : 0,
      numberOfTransactions: strategy.state.numberOfTransactions,
      candlesSimulated: rows.length
    };

    this.options.auditService?.logEvent('BACKTEST_COMPLETED', {
      strategyType: strategy.strategyType,
      candlesSimulated: report.candlesSimulated,
      endValueInQuote,
      totalReturn: report.totalReturn,
      numberOfTransactions: report.numberOfTransactions
    });

    return report;
  }
}
