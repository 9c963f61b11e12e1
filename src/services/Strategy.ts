/**
 * Strategy base class
 * A strategy decides on each step from the analysis window and the reconciled ledger.
 * It never writes the ledger directly; every change goes through its execution client.
 */

import { IExecutionClient } from '../connectors/ExecutionClient';
import { DataPipeline, DataPipelineSnapshot } from '../connectors/DataPipeline';
import { Candle } from '../models/Candle';
import { LedgerSnapshot, ReadonlyLedger } from '../models/Ledger';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/TradingErrors';

export type StrategyParams = Record<string, unknown>;

export interface StrategySnapshot {
  strategyType: string;
  params: StrategyParams;
  ledger: LedgerSnapshot;
  dataPipeline?: DataPipelineSnapshot;
}

export abstract class Strategy {
  readonly executor: IExecutionClient;
  protected readonly dataPipeline?: DataPipeline;

  constructor(executor: IExecutionClient, dataPipeline?: DataPipeline) {
    this.executor = executor;
    this.dataPipeline = dataPipeline;
  }

  get state(): ReadonlyLedger {
    return this.executor.state;
  }

  /**
   * Trailing span of history, in minutes, the strategy needs per decision
   */
  abstract get analysisWindowMinutes(): number;

  /**
   * Registry key used to restore the strategy from a snapshot
   */
  abstract get strategyType(): string;

  abstract getParams(): StrategyParams;

  /**
   * Decision step. `window` holds no candle newer than the current one.
   */
  protected abstract execute(window: readonly Candle[]): Promise<void>;

  /**
   * One step: reconcile open orders against the current candle, then decide
   */
  async run(window: readonly Candle[]): Promise<void> {
    await this.executor.updateState();
    await this.execute(window);
  }

  /**
   * Source of market data for live and resumed runs
   */
  getDataPipeline(): DataPipeline {
    if (this.dataPipeline) {
      return this.dataPipeline;
    }
    throw new ApplicationError(
      `Strategy ${this.strategyType} does not provide a data pipeline`,
      'NOT_IMPLEMENTED',
      ErrorCategory.SYSTEM,
      ErrorSeverity.HIGH,
      { operation: 'getDataPipeline', component: 'Strategy', timestamp: new Date() },
      { isRetryable: false }
    );
  }

  toSnapshot(): StrategySnapshot {
    const dataPipeline = this.dataPipeline?.toSnapshot?.();
    return {
      strategyType: this.strategyType,
      params: this.getParams(),
      ledger: this.state.toSnapshot(),
      ...(dataPipeline !== undefined && { dataPipeline })
    };
  }
}
