import { RSI } from 'technicalindicators';
import { Strategy, StrategyParams } from '../services/Strategy';
import { IExecutionClient } from '../connectors/ExecutionClient';
import { DataPipeline } from '../connectors/DataPipeline';
import { Candle } from '../models/Candle';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/TradingErrors';

export const RSI_STRATEGY_TYPE = 'rsi';

const THIRTY_DAYS_IN_MINUTES = 60 * 24 * 30;

export interface RsiParams {
  lowerThreshold: number;
  higherThreshold: number;
  period: number;
  analysisWindowMinutes: number;
}

/**
 * Buys with all available quote when RSI crosses down through the lower threshold,
 * sells all available base when it crosses up through the higher one.
 */
export class RsiStrategy extends Strategy {
  readonly params: RsiParams;

  constructor(executor: IExecutionClient, params: StrategyParams, dataPipeline?: DataPipeline) {
    super(executor, dataPipeline);
    this.params = RsiStrategy.parseParams(params);
  }

  static parseParams(params: StrategyParams): RsiParams {
    const lowerThreshold = params.lowerThreshold ?? 30;
    const higherThreshold = params.higherThreshold ?? 70;
    const period = params.period ?? 14;
    const analysisWindowMinutes = params.analysisWindowMinutes ?? THIRTY_DAYS_IN_MINUTES;

    const invalid = (reason: string): ApplicationError => new ApplicationError(
      `Invalid RSI parameters: ${reason}`,
      'INVALID_STRATEGY_PARAMS',
      ErrorCategory.VALIDATION,
      ErrorSeverity.MEDIUM,
      { operation: 'parseParams', component: 'RsiStrategy', metadata: { params }, timestamp: new Date() }
    );

    if (typeof lowerThreshold !== 'number' || typeof higherThreshold !== 'number') {
      throw invalid('thresholds must be numbers');
    }
    if (!(lowerThreshold > 0 && lowerThreshold < higherThreshold && higherThreshold < 100)) {
      throw invalid('expected 0 < lowerThreshold < higherThreshold < 100');
    }
    if (typeof period !== 'number' || !Number.isInteger(period) || period < 2) {
      throw invalid('period must be an integer of at least 2');
    }
    if (typeof analysisWindowMinutes !== 'number' || !(analysisWindowMinutes >= 0)) {
      throw invalid('analysisWindowMinutes must be a non-negative number');
    }

    return { lowerThreshold, higherThreshold, period, analysisWindowMinutes };
  }

  get analysisWindowMinutes(): number {
    return this.params.analysisWindowMinutes;
  }

  get strategyType(): string {
    return RSI_STRATEGY_TYPE;
  }

  getParams(): StrategyParams {
    return { ...this.params };
  }

  protected async execute(window: readonly Candle[]): Promise<void> {
    const values = RSI.calculate({ values: window.map(candle => candle.close), period: this.params.period });
    if (values.length < 2) {
      return;
    }

    const previous = values[values.length - 2];
    const current = values[values.length - 1];
    const state = this.state;

    if (previous >= this.params.lowerThreshold && current < this.params.lowerThreshold && state.quoteAvailable > 0) {
      await this.executor.placeMarketBuyOrder(state.base, state.quoteAvailable);
    } else if (previous <= this.params.higherThreshold && current > this.params.higherThreshold && state.baseAvailable > 0) {
      await this.executor.placeMarketSellOrder(state.base, state.baseAvailable);
    }
  }
}
