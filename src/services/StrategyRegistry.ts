import { Strategy, StrategyParams, StrategySnapshot } from './Strategy';
import { IExecutionClient } from '../connectors/ExecutionClient';
import { DataPipeline, restoreDataPipeline } from '../connectors/DataPipeline';
import { StrategyNotRegisteredError } from '../utils/TradingErrors';

export type StrategyFactory = (executor: IExecutionClient, params: StrategyParams, dataPipeline?: DataPipeline) => Strategy;

/**
 * Maps a persisted strategy type back to the code that rebuilds it
 */
export class StrategyRegistry {
  private readonly factories: Map<string, StrategyFactory> = new Map();

  register(strategyType: string, factory: StrategyFactory): this {
    this.factories.set(strategyType, factory);
    return this;
  }

  has(strategyType: string): boolean {
    return this.factories.has(strategyType);
  }

  create(strategyType: string, executor: IExecutionClient, params: StrategyParams, dataPipeline?: DataPipeline): Strategy {
    const factory = this.factories.get(strategyType);
    if (!factory) {
      throw new StrategyNotRegisteredError(strategyType, { operation: 'create', component: 'StrategyRegistry' });
    }
    return factory(executor, params, dataPipeline);
  }

  /**
   * Rebuilds a strategy around an executor whose ledger was restored from the snapshot,
   * along with the data pipeline the snapshot names
   */
  restore(snapshot: StrategySnapshot, executor: IExecutionClient): Strategy {
    const dataPipeline = snapshot.dataPipeline ? restoreDataPipeline(snapshot.dataPipeline) : undefined;
    return this.create(snapshot.strategyType, executor, snapshot.params, dataPipeline);
  }
}
